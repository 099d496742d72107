import { XMLParser } from "fast-xml-parser";
import { makeNode, type StructuredNode } from "./structuredNode.js";
import { isRecord } from "../utils/isRecord.js";

const ATTRIBUTES_KEY = ":@";
const TEXT_KEY = "#text";
const WRAPPER_TAG = "FTL";

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: "",
  textNodeName: TEXT_KEY,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
});

function scalarText(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return null;
}

function readAttributes(raw: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(raw)) return attributes;
  for (const [name, value] of Object.entries(raw)) {
    attributes[name] = scalarText(value) ?? "";
  }
  return attributes;
}

/**
 * One entry of the parser's ordered output: either `{ "#text": ... }` or
 * `{ [tag]: [...children], ":@": { ...attributes } }`.
 */
function readEntries(entries: unknown, where: string): { nodes: StructuredNode[]; text: string[] } {
  const nodes: StructuredNode[] = [];
  const text: string[] = [];
  if (!Array.isArray(entries)) return { nodes, text };

  for (const entry of entries) {
    if (!isRecord(entry)) {
      throw new Error(`${where}: unexpected parser output`);
    }
    for (const [key, value] of Object.entries(entry)) {
      if (key === ATTRIBUTES_KEY) continue;
      if (key === TEXT_KEY) {
        const chunk = scalarText(value);
        if (chunk !== null && chunk !== "") text.push(chunk);
        continue;
      }
      const inner = readEntries(value, where);
      const joined = inner.text.join("").trim();
      nodes.push(makeNode(key, readAttributes(entry[ATTRIBUTES_KEY]), inner.nodes, joined === "" ? null : joined));
    }
  }
  return { nodes, text };
}

/**
 * Parses one data file into its top-level elements, in document order. The files are
 * mostly fragments with several roots; a lone <FTL> wrapper is looked through.
 */
export function parseXmlDocument(xml: string, source = "<xml>"): StructuredNode[] {
  const parsed: unknown = parser.parse(xml);
  const { nodes } = readEntries(parsed, source);

  const [only] = nodes;
  if (nodes.length === 1 && only !== undefined && only.tag === WRAPPER_TAG) {
    return only.children;
  }
  return nodes;
}
