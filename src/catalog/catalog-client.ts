// ---------------------------------------------------------------------------
// CatalogClient – keyword search and ISBN lookup against the Aladin Open API.
//
// Every request is first made with the JSON output format.  When the body
// cannot be used as JSON (parse failure, or the catalog refuses JSON for the
// key) the same request is re-issued once with `output=xml` and decoded as
// XML directly.  There is no other retry at this layer.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type { BookRecord, RawCatalogRecord } from "../core/types.js";
import { CatalogOutputFormat, UNTITLED_TITLE } from "../core/types.js";
import {
  ConfigurationError,
  ISBNValidationError,
  NotFoundError,
  TransportError,
} from "../core/errors.js";
import { stripFormatting } from "../domain/isbn/isbn.js";
import { requestSignal, toTransportError } from "../utils/http.js";
import { decodeResponse, decodeXml } from "./response-decoder.js";

export const DEFAULT_CATALOG_BASE_URL = "https://www.aladin.co.kr/ttb/api";
export const DEFAULT_CATALOG_TIMEOUT_MS = 10_000;

const SEARCH_ENDPOINT = "ItemSearch.aspx";
const LOOKUP_ENDPOINT = "ItemLookUp.aspx";
const PROTOCOL_VERSION = "20131101";
const MAX_RESULTS_LIMIT = 50;

export interface CatalogClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  logger: Logger;
}

type QueryParams = Record<string, string>;

/**
 * Map a decoded catalog record onto the canonical {@link BookRecord}.
 * Unknown keys are ignored and missing keys become `""`.
 */
export function toBookRecord(raw: RawCatalogRecord): BookRecord {
  const field = (key: string): string => (raw[key] ?? "").trim();

  return Object.freeze({
    title: field("title") || UNTITLED_TITLE,
    author: field("author"),
    publisher: field("publisher"),
    pubDate: field("pubDate"),
    isbn10: field("isbn"),
    isbn13: field("isbn13"),
    coverImageURL: field("cover"),
    detailLink: field("link"),
    description: field("description"),
  });
}

export class CatalogClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: CatalogClientOptions) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_CATALOG_BASE_URL).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CATALOG_TIMEOUT_MS;
    this.logger = options.logger.child({ component: "CatalogClient" });
  }

  // ── Public API ──────────────────────────────────────────────────────────

  /**
   * Search books by free-text keyword (title, author, ...).
   * `maxResults` is clamped to the catalog's 1–50 range.
   */
  async search(
    keyword: string,
    apiKey: string,
    maxResults = 10,
    signal?: AbortSignal,
  ): Promise<BookRecord[]> {
    this.requireApiKey(apiKey);

    const query = keyword.trim();
    if (!query) {
      this.logger.debug("Empty keyword; skipping catalog search");
      return [];
    }

    const limit = Math.max(1, Math.min(MAX_RESULTS_LIMIT, Math.trunc(maxResults) || 1));
    const records = await this.fetchRecords(
      SEARCH_ENDPOINT,
      {
        ttbkey: apiKey,
        Query: query,
        QueryType: "Keyword",
        MaxResults: String(limit),
        start: "1",
        SearchTarget: "Book",
        Version: PROTOCOL_VERSION,
        Cover: "Big",
      },
      signal,
    );

    this.logger.info({ keyword: query, results: records.length }, "Catalog search completed");
    return records.map(toBookRecord);
  }

  /**
   * Fetch the full record for one ISBN.  Hyphens and spaces are removed
   * before the request.  When the catalog returns several items only the
   * first is used.
   *
   * @throws NotFoundError when the catalog returns no item.
   */
  async lookup(isbn: string, apiKey: string, signal?: AbortSignal): Promise<BookRecord> {
    this.requireApiKey(apiKey);

    const itemId = stripFormatting(isbn);
    if (!itemId) {
      throw new ISBNValidationError(isbn, "nothing left after removing hyphens and spaces");
    }

    const records = await this.fetchRecords(
      LOOKUP_ENDPOINT,
      {
        ttbkey: apiKey,
        itemIdType: "ISBN",
        ItemId: itemId,
        Version: PROTOCOL_VERSION,
        Cover: "Big",
      },
      signal,
    );

    const [first] = records;
    if (first === undefined) {
      throw new NotFoundError(itemId);
    }
    if (records.length > 1) {
      this.logger.debug(
        { isbn: itemId, discarded: records.length - 1 },
        "Lookup returned several items; using the first",
      );
    }

    this.logger.info({ isbn: itemId }, "Catalog lookup completed");
    return toBookRecord(first);
  }

  // ── Request pipeline ────────────────────────────────────────────────────

  /**
   * Issued → Decoding → Success, or
   * Issued → Decoding → RetryingXML → Decoding(XML) → Success | Failed.
   */
  private async fetchRecords(
    endpoint: string,
    params: QueryParams,
    signal?: AbortSignal,
  ): Promise<RawCatalogRecord[]> {
    const jsonBody = await this.fetchBody(
      endpoint,
      { ...params, output: CatalogOutputFormat.JSON },
      signal,
    );

    const outcome = decodeResponse(jsonBody);
    if (outcome.kind === "records") {
      return outcome.records;
    }

    this.logger.info(
      { endpoint, reason: outcome.reason },
      "JSON output unusable; retrying with XML output",
    );

    const xmlBody = await this.fetchBody(
      endpoint,
      { ...params, output: CatalogOutputFormat.XML },
      signal,
    );
    return decodeXml(xmlBody);
  }

  private async fetchBody(
    endpoint: string,
    params: QueryParams,
    signal?: AbortSignal,
  ): Promise<string> {
    const url = new URL(`${this.baseUrl}/${endpoint}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }

    this.logger.debug({ url: redactKey(url) }, "Fetching catalog response");

    try {
      const response = await fetch(url, {
        signal: requestSignal(this.timeoutMs, signal),
        headers: {
          Accept: "application/json, application/javascript, application/xml, text/xml",
        },
      });

      if (!response.ok) {
        throw new TransportError(
          `Catalog ${endpoint} returned HTTP ${response.status}`,
          { status: response.status },
        );
      }

      return await response.text();
    } catch (error: unknown) {
      throw toTransportError(error, `Catalog ${endpoint} request`);
    }
  }

  private requireApiKey(apiKey: string): void {
    if (!apiKey.trim()) {
      throw new ConfigurationError("Catalog API key (TTB key) is not configured");
    }
  }
}

// ── Helpers ───────────────────────────────────────────────────────────────

function redactKey(url: URL): string {
  const copy = new URL(url);
  copy.searchParams.delete("ttbkey");
  return copy.toString();
}
