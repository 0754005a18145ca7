// ---------------------------------------------------------------------------
// Core types for the bookshelf sync service.
// All other modules import from this file.
// ---------------------------------------------------------------------------

// ── Catalog records ─────────────────────────────────────────────────────────

/**
 * A flat, string-keyed record decoded from a catalog response.  Keys are
 * the catalog's own field names (`title`, `pubDate`, `isbn13`, ...).
 */
export type RawCatalogRecord = Record<string, string>;

/** Output format requested from the catalog service. */
export const CatalogOutputFormat = {
  JSON: "js",
  XML: "xml",
} as const;
export type CatalogOutputFormat =
  (typeof CatalogOutputFormat)[keyof typeof CatalogOutputFormat];

/**
 * Result of decoding a catalog body that was requested as JSON.
 * `retry-as-xml` is a signal, not a failure: the caller re-issues the same
 * request with the XML output format.
 */
export type DecodeOutcome =
  | { kind: "records"; records: RawCatalogRecord[] }
  | { kind: "retry-as-xml"; reason: string };

/** Title used when the catalog supplies none. */
export const UNTITLED_TITLE = "Untitled";

/**
 * Canonical, format-agnostic representation of one book.
 * Empty strings stand for "not supplied by the catalog".
 */
export interface BookRecord {
  readonly title: string;
  readonly author: string;
  readonly publisher: string;
  /** Raw catalog date string (`YYYY-MM-DD`, `YYYYMMDD`, optionally with time). */
  readonly pubDate: string;
  readonly isbn10: string;
  readonly isbn13: string;
  readonly coverImageURL: string;
  /** Catalog-site permalink. */
  readonly detailLink: string;
  readonly description: string;
}

// ── Destination payload ─────────────────────────────────────────────────────

export interface TitleValue {
  readonly type: "title";
  readonly text: string;
}

export interface RichTextValue {
  readonly type: "rich_text";
  readonly text: string;
}

export interface DateValue {
  readonly type: "date";
  /** ISO calendar date, `YYYY-MM-DD`. */
  readonly start: string;
}

export interface ExternalFile {
  readonly name: string;
  readonly url: string;
}

export interface FilesValue {
  readonly type: "files";
  readonly files: readonly ExternalFile[];
}

export type PropertyValue = TitleValue | RichTextValue | DateValue | FilesValue;

/**
 * Typed properties for one destination record.  Only `Title` is always
 * present; every other key is omitted when the source field was empty.
 */
export interface DestinationPayload {
  readonly Title: TitleValue;
  readonly Author?: RichTextValue;
  readonly Publisher?: RichTextValue;
  readonly PublishedDate?: DateValue;
  readonly ISBN?: RichTextValue;
  readonly CoverImage?: FilesValue;
}

export type PayloadKey = keyof DestinationPayload;

/** Store column name for each logical payload key. */
export type PropertyNames = Readonly<Record<PayloadKey, string>>;

// ── Sync results ────────────────────────────────────────────────────────────

/** Credentials threaded through every pipeline call by the caller. */
export interface SyncCredentials {
  catalogApiKey: string;
  notionToken: string;
  notionDatabaseId: string;
}

// ── Config types ────────────────────────────────────────────────────────────

export interface AppConfig {
  env: "development" | "test" | "production";
  port: number;
  logLevel: string;
  catalog: CatalogConfig;
  notion: NotionConfig;
}

export interface CatalogConfig {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  maxResults: number;
}

export interface NotionConfig {
  token: string;
  databaseId: string;
  baseUrl: string;
  version: string;
  timeoutMs: number;
  propertyNames: PropertyNames;
}

export interface LoggingConfig {
  level: string;
  prettyPrint: boolean;
  redactSecrets: boolean;
}
