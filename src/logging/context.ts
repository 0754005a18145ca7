// ---------------------------------------------------------------------------
// Request-scoped logging middleware for Hono.
// ---------------------------------------------------------------------------

import type { Context, Next } from "hono";
import type { Logger } from "pino";

import type { AppEnv } from "../api/env.js";

/**
 * Creates a Hono middleware that attaches a request-scoped child logger
 * to every incoming request context.
 *
 * The child logger carries `requestId`, `method`, and `path` as bindings.
 * It must run after the request-id middleware.  Downstream handlers access
 * the logger via `c.get("logger")`.
 */
export function createRequestLogger(
  baseLogger: Logger,
): (c: Context<AppEnv>, next: Next) => Promise<void> {
  return async (c: Context<AppEnv>, next: Next): Promise<void> => {
    const childLogger = baseLogger.child({
      requestId: c.get("requestId"),
      method: c.req.method,
      path: c.req.path,
    });

    c.set("logger", childLogger);

    const start = Date.now();
    childLogger.info("request started");

    await next();

    const durationMs = Date.now() - start;
    childLogger.info({ durationMs, status: c.res.status }, "request completed");
  };
}
