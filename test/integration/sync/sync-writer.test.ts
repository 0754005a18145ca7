// ---------------------------------------------------------------------------
// Integration tests for SyncWriter.
//
// Mocks globalThis.fetch with Notion API responses. Verifies the page and
// block requests, the partial-write warning, and error classification.
// ---------------------------------------------------------------------------

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { Mock } from "vitest";

import type { DestinationPayload } from "../../../src/core/types.js";
import {
  ConfigurationError,
  MalformedResponseError,
  PartialWriteError,
  TransportError,
} from "../../../src/core/errors.js";
import {
  SyncWriter,
  describeStoreFailure,
  extractContainerId,
} from "../../../src/sync/sync-writer.js";
import { KOREAN_PROPERTY_NAMES } from "../../../src/sync/notion-properties.js";
import { createSilentLogger, jsonBodyOf, jsonResponse, urlOf } from "../../helpers/http.js";

const TOKEN = "test-secret";
const DATABASE_ID = "0123456789abcdef0123456789abcdef";
const PAGE_ID = "11111111-2222-3333-4444-555555555555";

const PAYLOAD: DestinationPayload = {
  Title: { type: "title", text: "클린 코드" },
  PublishedDate: { type: "date", start: "2013-12-24" },
  ISBN: { type: "rich_text", text: "9788966260959" },
};

function createPageResponse() {
  return {
    object: "page",
    id: PAGE_ID,
    url: "https://www.notion.so/11111111222233334444555555555555",
  };
}

// ── extractContainerId ──────────────────────────────────────────────────

describe("extractContainerId", () => {
  it("keeps a raw 32-hex id", () => {
    expect(extractContainerId(DATABASE_ID)).toBe(DATABASE_ID);
  });

  it("removes hyphens from a UUID", () => {
    expect(extractContainerId("01234567-89ab-cdef-0123-456789abcdef")).toBe(DATABASE_ID);
  });

  it("extracts the id from a sharing link", () => {
    expect(
      extractContainerId(
        `https://www.notion.so/myspace/Books-${DATABASE_ID}?v=fedcba9876543210fedcba9876543210`,
      ),
    ).toBe(DATABASE_ID);
  });

  it("extracts a hyphenated id from a notion.site link", () => {
    expect(extractContainerId("https://team.notion.site/01234567-89ab-cdef-0123-456789abcdef")).toBe(
      DATABASE_ID,
    );
  });

  it("passes through input of neither shape", () => {
    expect(extractContainerId(" not_a_database ")).toBe("not_a_database");
  });

  it("returns an empty string for blank input", () => {
    expect(extractContainerId("   ")).toBe("");
  });
});

describe("describeStoreFailure", () => {
  it("explains a missing database", () => {
    expect(describeStoreFailure("object_not_found")).toBe(
      "Check the database id and that the integration is connected to the database.",
    );
  });

  it("has no hint for unknown codes", () => {
    expect(describeStoreFailure("rate_limited")).toBeNull();
    expect(describeStoreFailure(null)).toBeNull();
  });
});

// ── SyncWriter ─────────────────────────────────────────────────────────

describe("SyncWriter", () => {
  const originalFetch = globalThis.fetch;
  let mockFetch: Mock<typeof fetch>;
  let writer: SyncWriter;

  beforeEach(() => {
    mockFetch = vi.fn<typeof fetch>();
    globalThis.fetch = mockFetch;
    writer = new SyncWriter({
      baseUrl: "https://notion.example.com/v1",
      logger: createSilentLogger(),
    });
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
    vi.restoreAllMocks();
  });

  function call(index: number): { url: URL; init: RequestInit | undefined } {
    const args = mockFetch.mock.calls[index];
    if (!args) throw new Error(`fetch was not called ${index + 1} time(s)`);
    return { url: urlOf(args[0]), init: args[1] };
  }

  it("creates a page under the database with encoded properties", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(createPageResponse()));

    const result = await writer.create(PAYLOAD, TOKEN, DATABASE_ID, "");

    expect(result).toEqual({
      recordId: PAGE_ID,
      url: "https://www.notion.so/11111111222233334444555555555555",
      warning: null,
    });
    expect(mockFetch).toHaveBeenCalledTimes(1);

    const { url, init } = call(0);
    expect(url.toString()).toBe("https://notion.example.com/v1/pages");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toMatchObject({
      Authorization: "Bearer test-secret",
      "Notion-Version": "2022-06-28",
      "Content-Type": "application/json",
    });
    expect(jsonBodyOf(init)).toEqual({
      parent: { database_id: DATABASE_ID },
      properties: {
        Title: { title: [{ type: "text", text: { content: "클린 코드" } }] },
        PublishedDate: { date: { start: "2013-12-24" } },
        ISBN: { rich_text: [{ type: "text", text: { content: "9788966260959" } }] },
      },
    });
  });

  it("accepts the database as a sharing link", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(createPageResponse()));

    await writer.create(PAYLOAD, TOKEN, `https://www.notion.so/Books-${DATABASE_ID}`, "");

    expect(jsonBodyOf(call(0).init)).toMatchObject({ parent: { database_id: DATABASE_ID } });
  });

  it("writes properties under configured column names", async () => {
    writer = new SyncWriter({
      baseUrl: "https://notion.example.com/v1",
      propertyNames: KOREAN_PROPERTY_NAMES,
      logger: createSilentLogger(),
    });
    mockFetch.mockResolvedValueOnce(jsonResponse(createPageResponse()));

    await writer.create(PAYLOAD, TOKEN, DATABASE_ID, "");

    const body = jsonBodyOf(call(0).init);
    expect(body).toMatchObject({
      properties: {
        제목: { title: [{ type: "text", text: { content: "클린 코드" } }] },
        출판일: { date: { start: "2013-12-24" } },
      },
    });
  });

  it("appends a non-empty note as a paragraph block", async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse(createPageResponse()))
      .mockResolvedValueOnce(jsonResponse({ object: "list", results: [] }));

    const result = await writer.create(PAYLOAD, TOKEN, DATABASE_ID, "A handbook of craftsmanship.");

    expect(result.warning).toBeNull();
    expect(mockFetch).toHaveBeenCalledTimes(2);

    const { url, init } = call(1);
    expect(url.toString()).toBe(`https://notion.example.com/v1/blocks/${PAGE_ID}/children`);
    expect(init?.method).toBe("PATCH");
    expect(jsonBodyOf(init)).toEqual({
      children: [
        {
          object: "block",
          type: "paragraph",
          paragraph: {
            rich_text: [{ type: "text", text: { content: "A handbook of craftsmanship." } }],
          },
        },
      ],
    });
  });

  it("skips the note call for a whitespace-only note", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(createPageResponse()));

    await writer.create(PAYLOAD, TOKEN, DATABASE_ID, "  \n ");

    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it("returns a PartialWriteError warning when the note cannot be appended", async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse(createPageResponse()))
      .mockResolvedValueOnce(
        jsonResponse({ object: "error", code: "internal_server_error", message: "Oops" }, 500),
      );

    const result = await writer.create(PAYLOAD, TOKEN, DATABASE_ID, "note");

    expect(result.recordId).toBe(PAGE_ID);
    expect(result.warning).toBeInstanceOf(PartialWriteError);
    expect(result.warning?.recordId).toBe(PAGE_ID);
    expect(result.warning?.message).toBe(
      `Record ${PAGE_ID} was created but its note was not saved: ` +
        `Notion PATCH /blocks/${PAGE_ID}/children returned HTTP 500: Oops`,
    );
  });

  it("returns a warning when the note call fails on the network", async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse(createPageResponse()))
      .mockRejectedValueOnce(new TypeError("fetch failed"));

    const result = await writer.create(PAYLOAD, TOKEN, DATABASE_ID, "note");

    expect(result.warning?.cause).toBeInstanceOf(TransportError);
  });

  it("throws TransportError with the Notion error code when the page is rejected", async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse(
        {
          object: "error",
          status: 400,
          code: "validation_error",
          message: "ISBN is not a property that exists.",
        },
        400,
      ),
    );

    const err = await writer.create(PAYLOAD, TOKEN, DATABASE_ID, "note").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransportError);
    if (err instanceof TransportError) {
      expect(err.status).toBe(400);
      expect(err.code).toBe("validation_error");
      expect(err.message).toBe(
        "Notion POST /pages returned HTTP 400: ISBN is not a property that exists.",
      );
    }
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it("classifies a body read that times out as a TransportError", async () => {
    class StalledBodyResponse extends Response {
      override text(): Promise<string> {
        return Promise.reject(new DOMException("The operation timed out.", "TimeoutError"));
      }
    }
    mockFetch.mockResolvedValueOnce(new StalledBodyResponse("", { status: 200 }));

    const err = await writer.create(PAYLOAD, TOKEN, DATABASE_ID, "").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransportError);
    if (err instanceof TransportError) {
      expect(err.timedOut).toBe(true);
      expect(err.message).toBe("Notion POST /pages timed out");
    }
  });

  it("throws MalformedResponseError when the page response has no id", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ object: "page" }));

    await expect(writer.create(PAYLOAD, TOKEN, DATABASE_ID, "")).rejects.toThrow(
      MalformedResponseError,
    );
  });

  it("throws ConfigurationError without a token and makes no request", async () => {
    await expect(writer.create(PAYLOAD, "", DATABASE_ID, "")).rejects.toThrow(
      "Notion integration token is not configured",
    );
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("throws ConfigurationError without a database id", async () => {
    await expect(writer.create(PAYLOAD, TOKEN, " ", "")).rejects.toThrow(ConfigurationError);
    expect(mockFetch).not.toHaveBeenCalled();
  });
});
