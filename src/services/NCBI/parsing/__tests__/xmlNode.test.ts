import { describe, expect, it } from "vitest";
import { BaseErrorCode, McpError } from "../../../../types-global/errors.js";
import {
  allOf,
  atPath,
  childOf,
  firstOf,
  parseXmlDocument,
  textOf,
  toJsonValue,
  toXmlNode,
} from "../xmlNode.js";

function parseError(xml: string): McpError {
  try {
    parseXmlDocument(xml);
  } catch (error) {
    if (error instanceof McpError) return error;
    throw error;
  }
  throw new Error("expected parseXmlDocument to throw");
}

describe("toXmlNode", () => {
  it("tags strings, arrays and objects", () => {
    expect(toXmlNode({ a: "x", b: ["1", "2"] })).toEqual({
      kind: "element",
      children: {
        a: { kind: "text", value: "x" },
        b: {
          kind: "list",
          items: [
            { kind: "text", value: "1" },
            { kind: "text", value: "2" },
          ],
        },
      },
    });
  });

  it("turns null into empty text", () => {
    expect(toXmlNode(null)).toEqual({ kind: "text", value: "" });
  });
});

describe("parseXmlDocument", () => {
  it("parses a document with a declaration and an external DTD", () => {
    const document = parseXmlDocument(
      '<?xml version="1.0" encoding="UTF-8" ?>\n' +
        '<!DOCTYPE Root PUBLIC "-//TEST//Root//EN" "https://dtd.example.org/root.dtd">\n' +
        "<Root><Name>alpha</Name></Root>",
    );
    expect(textOf(atPath(document, "Root", "Name"))).toBe("alpha");
  });

  it("rejects entity declarations", () => {
    const error = parseError(
      '<!DOCTYPE Root [<!ENTITY boom "boom">]><Root>&boom;</Root>',
    );
    expect(error.code).toBe(BaseErrorCode.NCBI_PARSING_ERROR);
    expect(error.message).toBe("XML entity declarations are not allowed");
  });

  it("rejects XML that is not well-formed", () => {
    const error = parseError("<Root><Name>alpha</Root>");
    expect(error.code).toBe(BaseErrorCode.NCBI_PARSING_ERROR);
    expect(error.message).toMatch(/^Malformed XML: /);
  });

  it("ignores entity-like text inside CDATA sections and comments", () => {
    const document = parseXmlDocument(
      '<Root><!-- <!ENTITY skipped "x"> --><Note><![CDATA[<!ENTITY x "y">]]></Note></Root>',
    );
    expect(textOf(atPath(document, "Root", "Note"))).toBe('<!ENTITY x "y">');
  });

  it("decodes numeric character references", () => {
    const document = parseXmlDocument(
      "<Root><Name>caf&#233; &#x3b1; &amp;#233;</Name></Root>",
    );
    expect(textOf(atPath(document, "Root", "Name"))).toBe("caf\u00e9 \u03b1 &#233;");
  });

  it("keeps numeric-looking text as text", () => {
    const document = parseXmlDocument("<Root><Count>007</Count></Root>");
    expect(textOf(atPath(document, "Root", "Count"))).toBe("007");
  });

  it("keeps an element's own text next to its attributes", () => {
    const document = parseXmlDocument('<Root><Name lang="en">alpha</Name></Root>');
    const name = atPath(document, "Root", "Name");
    expect(textOf(name)).toBe("alpha");
    expect(textOf(childOf(name, "@lang"))).toBe("en");
  });
});

describe("accessors", () => {
  const document = parseXmlDocument(
    "<Root><Empty></Empty><Item>one</Item><Item>two</Item></Root>",
  );
  const root = childOf(document, "Root");

  it("distinguishes an absent field from an empty one", () => {
    expect(textOf(childOf(root, "Empty"))).toBe("");
    expect(textOf(childOf(root, "Missing"))).toBeUndefined();
  });

  it("does not treat inherited properties as children", () => {
    expect(childOf(root, "toString")).toBeUndefined();
    expect(childOf(root, "constructor")).toBeUndefined();
  });

  it("returns undefined when walking through a text node", () => {
    expect(atPath(root, "Empty", "Deeper")).toBeUndefined();
  });

  it("reads repeated elements", () => {
    const items = childOf(root, "Item");
    expect(allOf(items).map(textOf)).toEqual(["one", "two"]);
    expect(textOf(firstOf(items))).toBe("one");
    expect(textOf(items)).toBeUndefined();
  });

  it("treats a single element as a one-item list", () => {
    expect(allOf(childOf(root, "Empty"))).toEqual([{ kind: "text", value: "" }]);
    expect(allOf(undefined)).toEqual([]);
  });

  it("converts back to plain JSON", () => {
    expect(toJsonValue(document)).toEqual({
      Root: { Empty: "", Item: ["one", "two"] },
    });
  });
});
