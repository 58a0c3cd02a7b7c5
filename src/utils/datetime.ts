import { isValid, parse } from "date-fns";

export const EVE_DATE_FORMAT = "yyyy-MM-dd HH:mm:ss";

/**
 * Parse an EVE timestamp such as "2011-08-30 22:37:24".
 * Anything past the seconds (e.g. ".123456") is cut off. Empty or missing
 * input gives undefined. The result is in local time, like the string itself
 * carries no zone.
 */
export function parseEveDateTime(text: string | null | undefined): Date | undefined {
  if (text == null || text.length === 0) return undefined;

  const d = parse(text.slice(0, 19), EVE_DATE_FORMAT, new Date(0));
  if (!isValid(d)) throw new RangeError(`Not an EVE date-time: '${text}'`);
  return d;
}
