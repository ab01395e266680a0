/**
 * @fileoverview Safe XML parsing into a typed node tree, plus total accessor
 * functions over that tree.
 *
 * fast-xml-parser produces loosely typed objects where a tag may map to a
 * string, an object, or an array of either. {@link toXmlNode} turns that into
 * an explicit tagged variant so lookups can tell an absent field (`undefined`)
 * from a present but empty one (`""`).
 *
 * @module src/services/NCBI/parsing/xmlNode
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";
import { BaseErrorCode, McpError } from "../../../types-global/errors.js";

export interface XmlText {
  kind: "text";
  value: string;
}

export interface XmlList {
  kind: "list";
  items: XmlNode[];
}

export interface XmlElement {
  kind: "element";
  children: Record<string, XmlNode>;
}

export type XmlNode = XmlText | XmlList | XmlElement;

export type JsonValue = string | JsonValue[] | { [key: string]: JsonValue };

/** Key under which an element's own text sits when it also has attributes or children. */
export const TEXT_NODE_NAME = "#text";

// Entity declarations are the vector for billion-laughs expansion and
// external entity resolution. Text inside comments and CDATA sections cannot
// declare anything and is ignored. A DOCTYPE that just names an external DTD
// is accepted and never fetched.
const COMMENT_OR_CDATA = /<!--[\s\S]*?-->|<!\[CDATA\[[\s\S]*?\]\]>/g;
const ENTITY_DECLARATION = /<!ENTITY/i;

function declaresEntities(xml: string): boolean {
  return ENTITY_DECLARATION.test(xml.replace(COMMENT_OR_CDATA, ""));
}

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@",
  textNodeName: TEXT_NODE_NAME,
  parseTagValue: false,
  parseAttributeValue: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  trimValues: true,
  // Decodes numeric character references (&#233; &#x3b1;) as well.
  htmlEntities: true,
});

/**
 * Converts a value produced by fast-xml-parser into an {@link XmlNode}.
 */
export function toXmlNode(value: unknown): XmlNode {
  if (Array.isArray(value)) {
    return { kind: "list", items: value.map((item: unknown) => toXmlNode(item)) };
  }
  if (value !== null && typeof value === "object") {
    return {
      kind: "element",
      children: Object.fromEntries(
        Object.entries(value).map(([name, child]) => [name, toXmlNode(child)]),
      ),
    };
  }
  if (value === undefined || value === null) {
    return { kind: "text", value: "" };
  }
  return { kind: "text", value: String(value) };
}

/**
 * Parses an XML document into an element whose children are the document's
 * root elements.
 * @throws {McpError} `NCBI_PARSING_ERROR` when the text declares entities or
 *   is not well-formed.
 */
export function parseXmlDocument(xml: string): XmlElement {
  if (declaresEntities(xml)) {
    throw new McpError(
      BaseErrorCode.NCBI_PARSING_ERROR,
      "XML entity declarations are not allowed",
    );
  }

  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new McpError(
      BaseErrorCode.NCBI_PARSING_ERROR,
      `Malformed XML: ${validation.err.msg} (line ${validation.err.line}, column ${validation.err.col})`,
      { code: validation.err.code },
    );
  }

  const parsed: unknown = xmlParser.parse(xml);
  const document = toXmlNode(parsed);
  return document.kind === "element"
    ? document
    : { kind: "element", children: {} };
}

/**
 * The child `name` of an element, or `undefined` when `node` is not an
 * element or has no such child.
 */
export function childOf(
  node: XmlNode | undefined,
  name: string,
): XmlNode | undefined {
  if (node?.kind !== "element") return undefined;
  return Object.prototype.hasOwnProperty.call(node.children, name)
    ? node.children[name]
    : undefined;
}

/** Follows `names` from `node`, one child lookup per name. */
export function atPath(
  node: XmlNode | undefined,
  ...names: string[]
): XmlNode | undefined {
  return names.reduce<XmlNode | undefined>(
    (current, name) => childOf(current, name),
    node,
  );
}

/** The first item of a repeated element, or the node itself. */
export function firstOf(node: XmlNode | undefined): XmlNode | undefined {
  return node?.kind === "list" ? node.items[0] : node;
}

/** Every occurrence of a possibly repeated element. */
export function allOf(node: XmlNode | undefined): XmlNode[] {
  if (node === undefined) return [];
  return node.kind === "list" ? node.items : [node];
}

/**
 * Text content of a node: the value of a text node, or the `#text` child of
 * an element with attributes. `undefined` for lists, elements without text,
 * and absent nodes.
 */
export function textOf(node: XmlNode | undefined): string | undefined {
  if (node === undefined || node.kind === "list") return undefined;
  if (node.kind === "text") return node.value;
  const text = node.children[TEXT_NODE_NAME];
  return text?.kind === "text" ? text.value : undefined;
}

/** Converts a node tree back into plain JSON for serialization. */
export function toJsonValue(node: XmlNode): JsonValue {
  switch (node.kind) {
    case "text":
      return node.value;
    case "list":
      return node.items.map(toJsonValue);
    case "element":
      return Object.fromEntries(
        Object.entries(node.children).map(([name, child]) => [
          name,
          toJsonValue(child),
        ]),
      );
  }
}
