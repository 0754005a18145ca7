// ---------------------------------------------------------------------------
// Integration tests for the /health route and the app shell.
// ---------------------------------------------------------------------------

import { describe, it, expect, beforeEach } from "vitest";
import type { Hono } from "hono";

import { healthRoutes } from "../../../src/api/routes/health.js";
import { createApp } from "../../../src/api/server.js";
import type { AppEnv } from "../../../src/api/env.js";
import { CatalogClient } from "../../../src/catalog/catalog-client.js";
import { SyncWriter } from "../../../src/sync/sync-writer.js";
import { BookSyncService } from "../../../src/orchestrator/book-sync.js";
import { createSilentLogger } from "../../helpers/http.js";

describe("GET /health", () => {
  let app: ReturnType<typeof healthRoutes>;

  beforeEach(() => {
    app = healthRoutes();
  });

  it("returns 200 with status ok, uptime, and timestamp", async () => {
    const res = await app.request("/");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: "ok",
      uptime: expect.any(Number),
      timestamp: expect.stringMatching(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/),
    });
  });

  it("returns application/json content type", async () => {
    const res = await app.request("/");

    expect(res.headers.get("content-type")).toContain("application/json");
  });
});

describe("app shell", () => {
  let app: Hono<AppEnv>;

  beforeEach(() => {
    const logger = createSilentLogger();
    app = createApp({
      syncService: new BookSyncService({
        catalog: new CatalogClient({ logger }),
        writer: new SyncWriter({ logger }),
        logger,
      }),
      credentials: { catalogApiKey: "", notionToken: "", notionDatabaseId: "" },
      defaultMaxResults: 10,
      logger,
    });
  });

  it("serves health under /health", async () => {
    const res = await app.request("/health");
    expect(res.status).toBe(200);
  });

  it("echoes a well-formed X-Request-ID", async () => {
    const res = await app.request("/health", { headers: { "X-Request-ID": "req-123" } });
    expect(res.headers.get("x-request-id")).toBe("req-123");
  });

  it("replaces a malformed X-Request-ID with a UUID", async () => {
    const res = await app.request("/health", { headers: { "X-Request-ID": "bad id\nwith newline" } });
    expect(res.headers.get("x-request-id")).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/,
    );
  });

  it("returns JSON 404 for unknown routes", async () => {
    const res = await app.request("/nope");

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Not found", type: "not_found" });
  });
});
