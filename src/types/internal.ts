export type KeyPath = ReadonlyArray<string>;

export interface TextNode {
  kind: "text";
  value: string;
}

export interface ElementNode {
  kind: "element";
  tagName: string;
  attributes: Readonly<Record<string, string>>;
  children: ReadonlyArray<DocumentNode>;
}

export type DocumentNode = TextNode | ElementNode;

/** Parsed document: the parent of the root element. */
export interface XmlDocument {
  children: ReadonlyArray<DocumentNode>;
}

/** Anything whose children the converter can walk. */
export type ParentNode = XmlDocument | ElementNode;
