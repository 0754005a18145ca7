// ---------------------------------------------------------------------------
// Hono application factory.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { Logger } from "pino";

import type { SyncCredentials } from "../core/types.js";
import type { BookSyncService } from "../orchestrator/book-sync.js";
import type { AppEnv } from "./env.js";

import { requestIdMiddleware } from "./middleware/request-id.js";
import { createRequestLogger } from "../logging/context.js";
import { errorHandler } from "./middleware/error-handler.js";

import { bookRoutes } from "./routes/books.js";
import { healthRoutes } from "./routes/health.js";

// ── Dependency bundle ──────────────────────────────────────────────────────

export interface AppDependencies {
  syncService: BookSyncService;
  credentials: SyncCredentials;
  defaultMaxResults: number;
  logger: Logger;
}

// ── App factory ────────────────────────────────────────────────────────────

/**
 * Create and configure the Hono application.
 *
 * Middleware stack (applied in order):
 * 1. Request ID generation (`X-Request-ID`).
 * 2. Request-scoped child logger attached to context.
 * 3. Route handlers.
 * 4. Global error handler (maps domain errors to HTTP status codes).
 */
export function createApp(deps: AppDependencies): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // ── Global middleware ──────────────────────────────────────────────────

  app.use("*", requestIdMiddleware());
  app.use("*", createRequestLogger(deps.logger));

  // ── Routes ────────────────────────────────────────────────────────────

  app.get("/", (c) =>
    c.json({
      service: "bookshelf-sync",
      routes: ["/health", "/books/search", "/books/isbn/:isbn", "/books"],
    }),
  );

  app.route("/health", healthRoutes());
  app.route(
    "/books",
    bookRoutes({
      syncService: deps.syncService,
      credentials: deps.credentials,
      defaultMaxResults: deps.defaultMaxResults,
    }),
  );

  app.notFound((c) => c.json({ error: "Not found", type: "not_found" }, 404));
  app.onError(errorHandler);

  return app;
}
