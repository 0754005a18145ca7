// ---------------------------------------------------------------------------
// Book routes: keyword search, ISBN lookup, and save to Notion.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import { z } from "zod";

import type { BookRecord, SyncCredentials } from "../../core/types.js";
import type { BookSyncService } from "../../orchestrator/book-sync.js";
import type { AppEnv } from "../env.js";

/** Dependencies required by book routes. */
export interface BookRouteDeps {
  syncService: BookSyncService;
  credentials: SyncCredentials;
  defaultMaxResults: number;
}

const bookRecordSchema = z.object({
  title: z.string().default(""),
  author: z.string().default(""),
  publisher: z.string().default(""),
  pubDate: z.string().default(""),
  isbn10: z.string().default(""),
  isbn13: z.string().default(""),
  coverImageURL: z.string().default(""),
  detailLink: z.string().default(""),
  description: z.string().default(""),
});

const saveRequestSchema = z.union([
  z.object({ isbn: z.string().trim().min(1) }),
  z.object({ book: bookRecordSchema, upgrade: z.boolean().optional() }),
]);

/**
 * Mounts book endpoints.  The incoming request's signal is handed down so a
 * client disconnect aborts the in-flight catalog and Notion calls.
 *
 * - `GET  /books/search?q=<keyword>&max=<n>` -- Keyword search.
 * - `GET  /books/isbn/:isbn`                  -- Full record for one ISBN.
 * - `POST /books`                             -- Save `{ isbn }` or `{ book, upgrade? }`.
 */
export function bookRoutes(deps: BookRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // ── GET /books/search ────────────────────────────────────────────────

  app.get("/search", async (c) => {
    const query = (c.req.query("q") ?? "").trim();
    if (!query) {
      return c.json(
        { error: "Missing required query parameter: q", type: "validation_error" },
        400,
      );
    }

    const maxRaw = Number.parseInt(c.req.query("max") ?? "", 10);
    const maxResults = Number.isNaN(maxRaw) ? deps.defaultMaxResults : maxRaw;

    const books = await deps.syncService.searchBooks(
      query,
      deps.credentials,
      maxResults,
      c.req.raw.signal,
    );
    return c.json({ query, count: books.length, books });
  });

  // ── GET /books/isbn/:isbn ────────────────────────────────────────────

  app.get("/isbn/:isbn", async (c) => {
    const book = await deps.syncService.lookupBook(
      c.req.param("isbn"),
      deps.credentials,
      c.req.raw.signal,
    );
    return c.json({ book });
  });

  // ── POST /books ──────────────────────────────────────────────────────

  app.post("/", async (c) => {
    const body: unknown = await c.req.json().catch(() => null);
    const parsed = saveRequestSchema.safeParse(body);
    if (!parsed.success) {
      return c.json(
        {
          error: "Body must be { isbn } or { book, upgrade? }",
          type: "validation_error",
          issues: parsed.error.issues.map((issue) => issue.message),
        },
        400,
      );
    }

    const logger = c.get("logger");
    const request = parsed.data;

    if ("isbn" in request) {
      logger.info({ isbn: request.isbn }, "saving book by ISBN");
      const outcome = await deps.syncService.saveByIsbn(
        request.isbn,
        deps.credentials,
        c.req.raw.signal,
      );
      return c.json(outcome, 201);
    }

    const book: BookRecord = Object.freeze(request.book);
    logger.info({ title: book.title, upgrade: request.upgrade ?? true }, "saving selected book");
    const outcome = await deps.syncService.saveBook(book, deps.credentials, {
      upgrade: request.upgrade,
      signal: c.req.raw.signal,
    });
    return c.json(outcome, 201);
  });

  return app;
}
