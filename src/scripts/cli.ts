// ---------------------------------------------------------------------------
// Argument parsing and output formatting for the sync-book CLI.
// ---------------------------------------------------------------------------

import { parseArgs } from "node:util";

import type { BookRecord } from "../core/types.js";
import { looksLikeISBN, preferredISBN } from "../domain/isbn/isbn.js";

export const USAGE = `Usage:
  sync-book search <keyword> [--max <n>]
  sync-book lookup <isbn>
  sync-book save --isbn <isbn>
  sync-book save <isbn>
  sync-book save <keyword> [--pick <n>] [--no-upgrade]`;

export interface CliOptions {
  command: string;
  query: string;
  isbn: string | undefined;
  max: number | undefined;
  pick: number;
  upgrade: boolean;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      isbn: { type: "string" },
      max: { type: "string" },
      pick: { type: "string", default: "1" },
      "no-upgrade": { type: "boolean", default: false },
    },
    allowPositionals: true,
    strict: true,
  });

  const [command = "", ...rest] = positionals;
  const max = values.max !== undefined ? Number.parseInt(values.max, 10) : undefined;

  return {
    command,
    query: rest.join(" ").trim(),
    isbn: values.isbn,
    max: max !== undefined && !Number.isNaN(max) ? max : undefined,
    pick: Math.max(1, Number.parseInt(values.pick ?? "1", 10) || 1),
    upgrade: !values["no-upgrade"],
  };
}

export type SaveTarget = { kind: "isbn"; isbn: string } | { kind: "keyword"; query: string };

/**
 * What `save` should store: `--isbn`, a bare argument shaped like an ISBN,
 * or otherwise the pick from a keyword search.  `null` when nothing was given.
 */
export function resolveSaveTarget(opts: CliOptions): SaveTarget | null {
  if (opts.isbn) return { kind: "isbn", isbn: opts.isbn };
  if (!opts.query) return null;
  return looksLikeISBN(opts.query)
    ? { kind: "isbn", isbn: opts.query }
    : { kind: "keyword", query: opts.query };
}

export function formatBook(book: BookRecord, index?: number): string {
  const lines = [`${index !== undefined ? `${index}. ` : ""}${book.title}`];
  if (book.author) lines.push(`   Author:    ${book.author}`);
  if (book.publisher) lines.push(`   Publisher: ${book.publisher}`);
  if (book.pubDate) lines.push(`   Published: ${book.pubDate}`);
  const isbn = preferredISBN(book);
  if (isbn) lines.push(`   ISBN:      ${isbn}`);
  return lines.join("\n");
}
