#!/usr/bin/env node
// ---------------------------------------------------------------------------
// Terminal front end: search the catalog and save books to Notion.
//
//   sync-book search <keyword> [--max 10]
//   sync-book lookup <isbn>
//   sync-book save --isbn <isbn>
//   sync-book save <isbn>
//   sync-book save <keyword> [--pick 1] [--no-upgrade]
// ---------------------------------------------------------------------------

import { BookSyncError, TransportError } from "../core/errors.js";
import { buildServices } from "../app.js";
import { describeStoreFailure } from "../sync/sync-writer.js";
import type { SaveOutcome } from "../orchestrator/book-sync.js";
import { USAGE, formatBook, parseCliArgs, resolveSaveTarget } from "./cli.js";

function printSaved(outcome: SaveOutcome): void {
  console.log(`Saved "${outcome.book.title}" as ${outcome.recordId}`);
  if (outcome.url) console.log(`  Notion:  ${outcome.url}`);
  if (outcome.detailLink) console.log(`  Catalog: ${outcome.detailLink}`);
  for (const warning of outcome.warnings) {
    console.warn(`  Warning: ${warning}`);
  }
}

async function main(): Promise<void> {
  const opts = parseCliArgs(process.argv.slice(2));
  const { syncService, credentials, config } = buildServices();

  switch (opts.command) {
    case "search": {
      if (!opts.query) throw new Error(USAGE);
      const books = await syncService.searchBooks(
        opts.query,
        credentials,
        opts.max ?? config.catalog.maxResults,
      );
      console.log(`${books.length} result(s) for "${opts.query}"`);
      books.forEach((book, i) => console.log(formatBook(book, i + 1)));
      return;
    }

    case "lookup": {
      if (!opts.query) throw new Error(USAGE);
      const book = await syncService.lookupBook(opts.query, credentials);
      console.log(formatBook(book));
      if (book.detailLink) console.log(`   Link:      ${book.detailLink}`);
      return;
    }

    case "save": {
      const target = resolveSaveTarget(opts);
      if (!target) throw new Error(USAGE);

      if (target.kind === "isbn") {
        printSaved(await syncService.saveByIsbn(target.isbn, credentials));
        return;
      }

      const books = await syncService.searchBooks(target.query, credentials, Math.max(opts.pick, 10));
      const selected = books[opts.pick - 1];
      if (!selected) {
        throw new Error(`Only ${books.length} result(s) for "${target.query}"; cannot pick #${opts.pick}`);
      }
      console.log(`Selected:\n${formatBook(selected)}`);
      printSaved(await syncService.saveBook(selected, credentials, { upgrade: opts.upgrade }));
      return;
    }

    default:
      throw new Error(USAGE);
  }
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(err instanceof BookSyncError ? `${err.name}: ${message}` : message);

  if (err instanceof TransportError) {
    const hint = describeStoreFailure(err.code);
    if (hint) console.error(`Hint: ${hint}`);
  }
  process.exitCode = 1;
});
