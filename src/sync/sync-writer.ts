// ---------------------------------------------------------------------------
// SyncWriter – creates one Notion database page per book.
//
//   POST  ${baseUrl}/pages                       create the page + properties
//   PATCH ${baseUrl}/blocks/{pageId}/children     append the note paragraph
//
// The second call is best effort: when it fails the page stays and the
// failure is returned as a PartialWriteError warning.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";
import { z } from "zod";

import type { DestinationPayload, PropertyNames } from "../core/types.js";
import {
  ConfigurationError,
  MalformedResponseError,
  PartialWriteError,
  TransportError,
} from "../core/errors.js";
import { requestSignal, toTransportError } from "../utils/http.js";
import {
  DEFAULT_PROPERTY_NAMES,
  encodeProperties,
  paragraphBlock,
} from "./notion-properties.js";

export const DEFAULT_NOTION_BASE_URL = "https://api.notion.com/v1";
export const DEFAULT_NOTION_VERSION = "2022-06-28";
export const DEFAULT_NOTION_TIMEOUT_MS = 10_000;

const CONTAINER_ID_RE =
  /([a-f0-9]{32}|[a-f0-9]{8}-[a-f0-9]{4}-[a-f0-9]{4}-[a-f0-9]{4}-[a-f0-9]{12})/i;

const pageResponseSchema = z.object({
  id: z.string().min(1),
  url: z.string().optional(),
});

const notionErrorSchema = z.object({
  code: z.string(),
  message: z.string(),
});

export interface SyncWriterOptions {
  baseUrl?: string;
  notionVersion?: string;
  timeoutMs?: number;
  propertyNames?: PropertyNames;
  logger: Logger;
}

export interface SyncResult {
  recordId: string;
  /** Page URL as reported by Notion. */
  url: string | null;
  /** Set when the page was created but the note could not be appended. */
  warning: PartialWriteError | null;
}

/**
 * Normalise a database id given either raw or as a sharing link.
 *
 * From a URL the first 32-hex or UUID-shaped run is taken; hyphens are
 * removed in every case.  Input matching neither shape is passed through
 * and left for the store to reject.
 */
export function extractContainerId(raw: string): string {
  let id = raw.trim();
  if (!id) return "";

  if (/notion\.(so|site)/i.test(id) || /^https?:\/\//i.test(id)) {
    const match = CONTAINER_ID_RE.exec(id);
    if (match?.[1]) id = match[1];
  }

  return id.replace(/-/g, "");
}

/** Operator hint for a Notion error code, if one applies. */
export function describeStoreFailure(code: string | null): string | null {
  switch (code) {
    case "object_not_found":
    case "restricted_resource":
      return "Check the database id and that the integration is connected to the database.";
    case "validation_error":
      return "Check that the database has the expected properties (title, text, date and files columns).";
    case "unauthorized":
      return "Check the Notion integration token.";
    default:
      return null;
  }
}

export class SyncWriter {
  private readonly baseUrl: string;
  private readonly notionVersion: string;
  private readonly timeoutMs: number;
  private readonly propertyNames: PropertyNames;
  private readonly logger: Logger;

  constructor(options: SyncWriterOptions) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_NOTION_BASE_URL).replace(/\/+$/, "");
    this.notionVersion = options.notionVersion ?? DEFAULT_NOTION_VERSION;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_NOTION_TIMEOUT_MS;
    this.propertyNames = options.propertyNames ?? DEFAULT_PROPERTY_NAMES;
    this.logger = options.logger.child({ component: "SyncWriter" });
  }

  /**
   * Create a page in the database and, when `note` is non-empty, append it
   * as a paragraph block.
   *
   * @throws ConfigurationError when the token or database id is missing.
   * @throws TransportError when the page itself cannot be created.
   */
  async create(
    payload: DestinationPayload,
    authToken: string,
    containerId: string,
    note: string,
    signal?: AbortSignal,
  ): Promise<SyncResult> {
    if (!authToken.trim()) {
      throw new ConfigurationError("Notion integration token is not configured");
    }
    const databaseId = extractContainerId(containerId);
    if (!databaseId) {
      throw new ConfigurationError("Notion database id is not configured");
    }

    const page = await this.request(
      "POST",
      "/pages",
      {
        parent: { database_id: databaseId },
        properties: encodeProperties(payload, this.propertyNames),
      },
      authToken,
      pageResponseSchema,
      signal,
    );

    this.logger.info({ recordId: page.id, databaseId }, "Notion page created");

    const result: SyncResult = { recordId: page.id, url: page.url ?? null, warning: null };
    if (!note.trim()) return result;

    try {
      await this.request(
        "PATCH",
        `/blocks/${page.id}/children`,
        { children: [paragraphBlock(note)] },
        authToken,
        z.unknown(),
        signal,
      );
    } catch (error: unknown) {
      this.logger.warn({ recordId: page.id, err: error }, "Note append failed; page kept");
      return { ...result, warning: new PartialWriteError(page.id, { cause: error }) };
    }

    return result;
  }

  // ── Private ─────────────────────────────────────────────────────────────

  private async request<T>(
    method: "POST" | "PATCH",
    path: string,
    body: unknown,
    authToken: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    signal?: AbortSignal,
  ): Promise<T> {
    const what = `Notion ${method} ${path}`;
    let response: Response;

    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        method,
        signal: requestSignal(this.timeoutMs, signal),
        headers: {
          Authorization: `Bearer ${authToken}`,
          "Notion-Version": this.notionVersion,
          "Content-Type": "application/json",
          Accept: "application/json",
        },
        body: JSON.stringify(body),
      });
    } catch (error: unknown) {
      throw toTransportError(error, what);
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error: unknown) {
      throw toTransportError(error, what);
    }

    if (!response.ok) {
      const parsedError = notionErrorSchema.safeParse(parseJsonOrNull(text));
      const code = parsedError.success ? parsedError.data.code : undefined;
      const message = parsedError.success ? parsedError.data.message : text.slice(0, 200);
      throw new TransportError(
        `${what} returned HTTP ${response.status}${message ? `: ${message}` : ""}`,
        { status: response.status, code },
      );
    }

    const parsed = schema.safeParse(parseJsonOrNull(text));
    if (!parsed.success) {
      throw new MalformedResponseError(`${what} returned an unexpected body`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}

function parseJsonOrNull(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}
