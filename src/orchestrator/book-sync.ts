// ---------------------------------------------------------------------------
// BookSyncService – search → select → detail upgrade → map → write.
//
// Every step runs strictly after the previous one.  Credentials travel with
// each call; the service itself holds no per-user state.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type { BookRecord, SyncCredentials } from "../core/types.js";
import { BookSyncError, ConfigurationError } from "../core/errors.js";
import type { CatalogClient } from "../catalog/catalog-client.js";
import type { SyncWriter } from "../sync/sync-writer.js";
import { toPayload } from "../sync/record-mapper.js";
import { preferredISBN } from "../domain/isbn/isbn.js";

export interface BookSyncDeps {
  catalog: CatalogClient;
  writer: SyncWriter;
  logger: Logger;
}

export interface UpgradeResult {
  record: BookRecord;
  /** True when the record came from an ISBN lookup. */
  upgraded: boolean;
  /** Why the lookup could not be used, when it failed. */
  warning: Error | null;
}

export interface SaveOptions {
  /** Re-fetch the full record by ISBN before saving.  Defaults to true. */
  upgrade?: boolean;
  signal?: AbortSignal;
}

export interface SaveOutcome {
  recordId: string;
  url: string | null;
  /** The record that was actually written. */
  book: BookRecord;
  upgraded: boolean;
  /** Catalog permalink for the saved book, if known. */
  detailLink: string | null;
  /** Non-fatal problems: failed detail lookup, note not appended. */
  warnings: string[];
}

export class BookSyncService {
  private readonly catalog: CatalogClient;
  private readonly writer: SyncWriter;
  private readonly logger: Logger;

  constructor(deps: BookSyncDeps) {
    this.catalog = deps.catalog;
    this.writer = deps.writer;
    this.logger = deps.logger.child({ component: "BookSyncService" });
  }

  searchBooks(
    keyword: string,
    credentials: SyncCredentials,
    maxResults?: number,
    signal?: AbortSignal,
  ): Promise<BookRecord[]> {
    return this.catalog.search(keyword, credentials.catalogApiKey, maxResults, signal);
  }

  lookupBook(
    isbn: string,
    credentials: SyncCredentials,
    signal?: AbortSignal,
  ): Promise<BookRecord> {
    return this.catalog.lookup(isbn, credentials.catalogApiKey, signal);
  }

  /**
   * Replace a search-derived record with the authoritative lookup record
   * for the same ISBN.  When the record has no ISBN, or the lookup fails
   * for any reason other than missing credentials, the search record is
   * kept.
   */
  async upgradeRecord(
    record: BookRecord,
    credentials: SyncCredentials,
    signal?: AbortSignal,
  ): Promise<UpgradeResult> {
    const isbn = preferredISBN(record);
    if (!isbn) {
      this.logger.debug({ title: record.title }, "No ISBN; keeping search record");
      return { record, upgraded: false, warning: null };
    }

    try {
      const detailed = await this.catalog.lookup(isbn, credentials.catalogApiKey, signal);
      return { record: detailed, upgraded: true, warning: null };
    } catch (error: unknown) {
      if (error instanceof ConfigurationError || !(error instanceof BookSyncError)) {
        throw error;
      }
      this.logger.warn({ isbn, err: error }, "Detail lookup failed; keeping search record");
      return { record, upgraded: false, warning: error };
    }
  }

  /** Save a (usually search-derived) record, upgrading it first by default. */
  async saveBook(
    record: BookRecord,
    credentials: SyncCredentials,
    options: SaveOptions = {},
  ): Promise<SaveOutcome> {
    const { upgrade = true, signal } = options;
    const warnings: string[] = [];

    let book = record;
    let upgraded = false;
    if (upgrade) {
      const result = await this.upgradeRecord(record, credentials, signal);
      book = result.record;
      upgraded = result.upgraded;
      if (result.warning) {
        warnings.push(`Detail lookup failed, saved search result instead: ${result.warning.message}`);
      }
    }

    const outcome = await this.write(book, credentials, signal);
    if (outcome.warning) warnings.push(outcome.warning);

    return {
      recordId: outcome.recordId,
      url: outcome.url,
      book,
      upgraded,
      detailLink: book.detailLink || record.detailLink || null,
      warnings,
    };
  }

  /** Look a book up by ISBN and save the result. */
  async saveByIsbn(
    isbn: string,
    credentials: SyncCredentials,
    signal?: AbortSignal,
  ): Promise<SaveOutcome> {
    const book = await this.catalog.lookup(isbn, credentials.catalogApiKey, signal);
    const outcome = await this.write(book, credentials, signal);

    return {
      recordId: outcome.recordId,
      url: outcome.url,
      book,
      upgraded: true,
      detailLink: book.detailLink || null,
      warnings: outcome.warning ? [outcome.warning] : [],
    };
  }

  // ── Private ─────────────────────────────────────────────────────────────

  private async write(
    book: BookRecord,
    credentials: SyncCredentials,
    signal?: AbortSignal,
  ): Promise<{ recordId: string; url: string | null; warning: string | null }> {
    const payload = toPayload(book);
    const result = await this.writer.create(
      payload,
      credentials.notionToken,
      credentials.notionDatabaseId,
      book.description,
      signal,
    );

    this.logger.info(
      { recordId: result.recordId, isbn: preferredISBN(book) || null, partial: result.warning !== null },
      "Book saved",
    );

    return {
      recordId: result.recordId,
      url: result.url,
      warning: result.warning ? result.warning.message : null,
    };
  }
}
