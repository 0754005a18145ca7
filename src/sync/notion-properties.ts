// ---------------------------------------------------------------------------
// DestinationPayload → Notion API JSON.
//
// Notion caps a single rich-text object at 2000 characters, so long values
// are split into consecutive text objects.
// ---------------------------------------------------------------------------

import type {
  DestinationPayload,
  PayloadKey,
  PropertyNames,
  PropertyValue,
} from "../core/types.js";

export const RICH_TEXT_LIMIT = 2000;

/** Payload keys in the order they are written. */
export const PAYLOAD_KEYS: readonly PayloadKey[] = [
  "Title",
  "Author",
  "Publisher",
  "PublishedDate",
  "ISBN",
  "CoverImage",
];

export const DEFAULT_PROPERTY_NAMES: PropertyNames = {
  Title: "Title",
  Author: "Author",
  Publisher: "Publisher",
  PublishedDate: "PublishedDate",
  ISBN: "ISBN",
  CoverImage: "CoverImage",
};

/** Column names used by Korean-language reading-log databases. */
export const KOREAN_PROPERTY_NAMES: PropertyNames = {
  Title: "제목",
  Author: "저자",
  Publisher: "출판사",
  PublishedDate: "출판일",
  ISBN: "ISBN",
  CoverImage: "표지",
};

// ── Notion wire shapes ──────────────────────────────────────────────────────

export interface NotionTextObject {
  type: "text";
  text: { content: string };
}

export interface NotionExternalFile {
  type: "external";
  name: string;
  external: { url: string };
}

export type NotionPropertyValue =
  | { title: NotionTextObject[] }
  | { rich_text: NotionTextObject[] }
  | { date: { start: string } }
  | { files: NotionExternalFile[] };

export interface NotionParagraphBlock {
  object: "block";
  type: "paragraph";
  paragraph: { rich_text: NotionTextObject[] };
}

// ── Encoding ────────────────────────────────────────────────────────────────

/** Split text into pieces of at most `limit` characters (code points). */
export function chunkText(text: string, limit: number = RICH_TEXT_LIMIT): string[] {
  const chars = Array.from(text);
  const chunks: string[] = [];
  for (let i = 0; i < chars.length; i += limit) {
    chunks.push(chars.slice(i, i + limit).join(""));
  }
  return chunks;
}

export function toRichText(text: string): NotionTextObject[] {
  return chunkText(text).map((content) => ({ type: "text", text: { content } }));
}

export function encodeProperty(value: PropertyValue): NotionPropertyValue {
  switch (value.type) {
    case "title":
      return { title: toRichText(value.text) };
    case "rich_text":
      return { rich_text: toRichText(value.text) };
    case "date":
      return { date: { start: value.start } };
    case "files":
      return {
        files: value.files.map((file) => ({
          type: "external",
          name: file.name,
          external: { url: file.url },
        })),
      };
  }
}

/**
 * Encode every property present on the payload under its store column
 * name.  Absent payload keys produce no entry at all.
 */
export function encodeProperties(
  payload: DestinationPayload,
  names: PropertyNames,
): Record<string, NotionPropertyValue> {
  const properties: Record<string, NotionPropertyValue> = {};
  for (const key of PAYLOAD_KEYS) {
    const value = payload[key];
    if (value !== undefined) {
      properties[names[key]] = encodeProperty(value);
    }
  }
  return properties;
}

export function paragraphBlock(text: string): NotionParagraphBlock {
  return {
    object: "block",
    type: "paragraph",
    paragraph: { rich_text: toRichText(text) },
  };
}
