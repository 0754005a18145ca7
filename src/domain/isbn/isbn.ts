// ---------------------------------------------------------------------------
// ISBN cleaning helpers
// ---------------------------------------------------------------------------

import type { BookRecord } from "../../core/types.js";

/** Strip hyphens, spaces, and surrounding whitespace from a raw ISBN string. */
export function stripFormatting(raw: string): string {
  return raw.trim().replace(/[\s-]/g, "");
}

/** Quick heuristic: does this string look like it *could* be an ISBN? */
export function looksLikeISBN(raw: string): boolean {
  const stripped = stripFormatting(raw);
  if (stripped.length === 13 && /^\d{13}$/.test(stripped)) return true;
  if (stripped.length === 10 && /^\d{9}[\dXx]$/.test(stripped)) return true;
  return false;
}

/**
 * The identifier used for lookups and for the destination `ISBN` column:
 * ISBN-13 when present, otherwise ISBN-10, otherwise `""`.
 */
export function preferredISBN(record: Pick<BookRecord, "isbn10" | "isbn13">): string {
  return record.isbn13 || record.isbn10;
}
