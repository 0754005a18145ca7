// ---------------------------------------------------------------------------
// Catalog response decoding.
//
// The catalog answers a JSON request with plain JSON, JSONP, or an error
// object saying the JSON output format is not allowed for the key.  XML
// responses carry the same fields as repeated <item> elements.  Both shapes
// are reduced to flat string-keyed records here.
// ---------------------------------------------------------------------------

import { XMLParser, XMLValidator } from "fast-xml-parser";

import type { DecodeOutcome, RawCatalogRecord } from "../core/types.js";
import { CatalogServiceError, MalformedResponseError } from "../core/errors.js";

const JSONP_PREFIX = "callback(";

/** Substrings of a catalog error message that mean "output format not allowed". */
const FORMAT_FORBIDDEN_MARKERS = ["금지", "forbidden"];

const xmlParser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  removeNSPrefix: true,
  // Keep every value a string: ISBN-10s may start with 0.
  parseTagValue: false,
  trimValues: true,
  // Titles routinely contain &amp; and friends.
  processEntities: true,
  htmlEntities: false,
});

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ── JSONP ───────────────────────────────────────────────────────────────────

/**
 * Remove a `callback( ... )` or `callback( ... );` wrapper.  Bodies without
 * the prefix are returned trimmed but otherwise untouched.
 */
export function stripJsonp(body: string): string {
  const text = body.trim();
  if (!text.startsWith(JSONP_PREFIX)) return text;

  const inner = text.slice(JSONP_PREFIX.length);
  if (inner.endsWith(");")) return inner.slice(0, -2);
  if (inner.endsWith(")")) return inner.slice(0, -1);
  return inner;
}

/** True when a catalog error message says the requested format is refused. */
export function isFormatForbidden(message: string): boolean {
  const lower = message.toLowerCase();
  return FORMAT_FORBIDDEN_MARKERS.some((marker) => lower.includes(marker));
}

// ── JSON ────────────────────────────────────────────────────────────────────

/**
 * Decode a body that was requested as JSON.
 *
 * - Unparseable JSON, or JSON that is not an object, asks for an XML retry.
 * - An error object whose message refuses the format asks for an XML retry;
 *   any other error object throws {@link CatalogServiceError}.
 * - A missing `item` field is a valid empty result.
 */
export function decodeResponse(rawBody: string): DecodeOutcome {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripJsonp(rawBody));
  } catch (err) {
    return {
      kind: "retry-as-xml",
      reason: `JSON parse failed: ${err instanceof Error ? err.message : String(err)}`,
    };
  }

  if (!isObject(parsed)) {
    return { kind: "retry-as-xml", reason: "JSON body is not an object" };
  }

  if ("errorCode" in parsed || "errorMessage" in parsed) {
    const message = scalarToString(parsed["errorMessage"]) || "Unknown catalog error";
    if (isFormatForbidden(message)) {
      return { kind: "retry-as-xml", reason: message };
    }
    throw new CatalogServiceError(
      `Catalog returned an error: ${message}`,
      scalarToString(parsed["errorCode"]) || null,
    );
  }

  const items = parsed["item"];
  if (items === undefined || items === null) {
    return { kind: "records", records: [] };
  }

  const entries = Array.isArray(items) ? items : [items];
  const records: RawCatalogRecord[] = [];
  for (const entry of entries) {
    if (isObject(entry)) records.push(flattenJsonItem(entry));
  }
  return { kind: "records", records };
}

function scalarToString(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return "";
}

/** Keep scalar fields; nested objects and arrays are dropped. */
function flattenJsonItem(item: JsonObject): RawCatalogRecord {
  const record: RawCatalogRecord = {};
  for (const [key, value] of Object.entries(item)) {
    if (value === null || typeof value !== "object") {
      record[key] = scalarToString(value);
    }
  }
  return record;
}

// ── XML ─────────────────────────────────────────────────────────────────────

/**
 * Decode an XML catalog body into one record per `<item>` element found at
 * any depth.  Child elements are keyed by local name; empty elements map to
 * `""`.
 *
 * @throws MalformedResponseError when the document is empty or not well formed.
 * @throws CatalogServiceError when the document is a catalog `<error>`.
 */
export function decodeXml(rawBody: string): RawCatalogRecord[] {
  const xml = rawBody.trim();
  if (xml === "") {
    throw new MalformedResponseError("Catalog returned an empty XML body");
  }

  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new MalformedResponseError(
      `Failed to parse catalog XML (line ${line}): ${msg}`,
    );
  }

  let parsed: unknown;
  try {
    parsed = xmlParser.parse(xml);
  } catch (err) {
    throw new MalformedResponseError(
      `Failed to parse catalog XML: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err instanceof Error ? err : undefined },
    );
  }

  if (!isObject(parsed)) return [];

  const errorElement = parsed["error"];
  if (isObject(errorElement)) {
    const message = elementText(errorElement["errorMessage"]) || "Unknown catalog error";
    throw new CatalogServiceError(
      `Catalog returned an error: ${message}`,
      elementText(errorElement["errorCode"]) || null,
    );
  }

  const records: RawCatalogRecord[] = [];
  collectItems(parsed, records);
  return records;
}

/** Depth-first walk collecting every `item` element; items are not descended into. */
function collectItems(node: JsonObject, out: RawCatalogRecord[]): void {
  for (const [key, value] of Object.entries(node)) {
    const children = Array.isArray(value) ? value : [value];

    if (key === "item") {
      for (const child of children) {
        if (!isObject(child)) continue;
        const record = flattenXmlItem(child);
        if (Object.keys(record).length > 0) out.push(record);
      }
      continue;
    }

    for (const child of children) {
      if (isObject(child)) collectItems(child, out);
    }
  }
}

function flattenXmlItem(item: JsonObject): RawCatalogRecord {
  const record: RawCatalogRecord = {};
  for (const [key, value] of Object.entries(item)) {
    if (key === "#text") continue;
    // Repeated elements: the last occurrence wins.
    const last = Array.isArray(value) ? value[value.length - 1] : value;
    record[key] = elementText(last);
  }
  return record;
}

/** Direct text content of a parsed element; `""` for empty or container elements. */
function elementText(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (isObject(value)) {
    const text = value["#text"];
    return typeof text === "string" ? text : "";
  }
  return "";
}
