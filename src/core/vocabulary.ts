/** Names fixed by the EVE API response format. */
export const ROWSET_TAG = "rowset";
export const ROWSET_KEY_ATTR = "key";
export const ROWSET_NAME_ATTR = "name";

/** Keys the converter writes into the ResultMap. */
export const TEXT_KEY = "text";
export const ATTRIBUTES_KEY = "attributes";
