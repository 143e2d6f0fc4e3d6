import { XMLParser, XMLValidator } from "fast-xml-parser";

/** Escape XML special characters */
export function esc(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/** `<tag>value</tag>` at the given indent depth (two spaces per level). */
export function element(depth: number, tag: string, value: string | number): string {
  const text = typeof value === "number" ? String(value) : esc(value);
  return `${"  ".repeat(depth)}<${tag}>${text}</${tag}>`;
}

export type XmlNode = Record<string, unknown>;

export function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const parser = new XMLParser({
  ignoreAttributes: true,
  parseTagValue: false,
  isArray: (_name, jpath) => jpath === "annotation.object",
});

/**
 * Parse an XML document into plain objects with string leaves.
 * Returns the validator's message instead when the document is not well-formed.
 */
export function parseXml(xml: string): { ok: true; doc: XmlNode } | { ok: false; message: string } {
  const valid = XMLValidator.validate(xml);
  if (valid !== true) {
    const { msg, line } = valid.err;
    return { ok: false, message: `${msg} (line ${line})` };
  }
  const doc: unknown = parser.parse(xml);
  if (!isNode(doc)) return { ok: false, message: "Empty document" };
  return { ok: true, doc };
}
