/**
 * Submissions cache file: `<submissions>` root holding one `<track>` per queued scrobble.
 */

import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";
import type { TrackNode } from "./trackNode.js";

export const ROOT_ELEMENT = "submissions";
export const TRACK_ELEMENT = "track";
export const SCHEMA_VERSION = "2";
export const XML_HEADER = "<?xml version='1.0' encoding='utf-8'?>\n";

const ATTR_PREFIX = "@_";
const TEXT_NODE = "#text";

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  parseAttributeValue: false,
  // Values round-trip exactly; indentation between children is dropped below.
  trimValues: false,
  // Direct children of the root only; a lone <track> still comes back as a list.
  isArray: (name, jpath) => name === TRACK_ELEMENT && jpath.split(".").length === 2,
});

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  format: true,
  indentBy: "  ",
  suppressEmptyNode: false,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Drops the whitespace-only text the pretty-printer leaves between child elements. */
function withoutIndentation(node: unknown): unknown {
  if (!isRecord(node)) return node;
  const text = node[TEXT_NODE];
  if (typeof text !== "string" || text.trim() !== "") return node;
  return Object.fromEntries(Object.entries(node).filter(([key]) => key !== TEXT_NODE));
}

/**
 * Direct `<track>` children of the root element, in document order.
 * Returns null when the text is not well-formed XML.
 */
export function parseCacheDocument(text: string): unknown[] | null {
  if (text.trim() === "" || XMLValidator.validate(text) !== true) return null;

  const doc: unknown = parser.parse(text);
  if (!isRecord(doc)) return null;

  const rootName = Object.keys(doc).find((key) => !key.startsWith("?") && !key.startsWith("#"));
  if (rootName === undefined) return null;

  const root = doc[rootName];
  // <submissions/> or a root with only text content.
  if (!isRecord(root)) return [];

  const tracks = root[TRACK_ELEMENT];
  return Array.isArray(tracks) ? tracks.map(withoutIndentation) : [];
}

export function serializeCacheDocument(product: string, tracks: readonly TrackNode[]): string {
  const xml: string = builder.build({
    [ROOT_ELEMENT]: {
      [`${ATTR_PREFIX}product`]: product,
      [`${ATTR_PREFIX}version`]: SCHEMA_VERSION,
      [TRACK_ELEMENT]: tracks,
    },
  });
  return XML_HEADER + xml;
}
