// ---------------------------------------------------------------------------
// BookRecord → DestinationPayload mapping.
// ---------------------------------------------------------------------------

import type { BookRecord, DestinationPayload } from "../core/types.js";
import { UNTITLED_TITLE } from "../core/types.js";
import { preferredISBN } from "../domain/isbn/isbn.js";

/** Attachment name given to the external cover image. */
export const COVER_IMAGE_NAME = "Cover image";

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

export type NormalizedDate = { ok: true; date: string } | { ok: false };

const DASHED_DATE_RE = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;
const COMPACT_DATE_RE = /^(\d{4})(\d{2})(\d{2})$/;

/**
 * Normalise a catalog publication date to `YYYY-MM-DD`.
 *
 * Accepts `YYYY-MM-DD` (optionally followed by whitespace and a time, which
 * is dropped) and `YYYYMMDD`.  Other shapes and impossible calendar dates
 * give `{ ok: false }`.
 */
export function normalizeDate(raw: string): NormalizedDate {
  const text = raw.trim();
  if (!text) return { ok: false };

  const datePart = text.split(/\s+/)[0] ?? "";
  const match = DASHED_DATE_RE.exec(datePart) ?? COMPACT_DATE_RE.exec(text);
  if (!match) return { ok: false };

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  // setUTCFullYear keeps years 0-99 literal; Date.UTC would map them to 19xx.
  const probe = new Date(0);
  probe.setUTCFullYear(year, month - 1, day);
  if (
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month - 1 ||
    probe.getUTCDate() !== day
  ) {
    return { ok: false };
  }

  const pad = (n: number, width: number): string => String(n).padStart(width, "0");
  return { ok: true, date: `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}` };
}

/**
 * Build the destination properties for one book.  `Title` is always set;
 * every other property is left out when its source field is empty so that
 * the store never receives an empty overwrite.
 */
export function toPayload(record: BookRecord): DestinationPayload {
  const title = record.title.trim() || UNTITLED_TITLE;
  const author = record.author.trim();
  const publisher = record.publisher.trim();
  const isbn = preferredISBN(record).trim();
  const cover = record.coverImageURL.trim();
  const published = normalizeDate(record.pubDate);

  const payload: Mutable<DestinationPayload> = {
    Title: { type: "title", text: title },
  };
  if (author) payload.Author = { type: "rich_text", text: author };
  if (publisher) payload.Publisher = { type: "rich_text", text: publisher };
  if (published.ok) payload.PublishedDate = { type: "date", start: published.date };
  if (isbn) payload.ISBN = { type: "rich_text", text: isbn };
  if (cover) {
    payload.CoverImage = { type: "files", files: [{ name: COVER_IMAGE_NAME, url: cover }] };
  }

  return Object.freeze(payload);
}
