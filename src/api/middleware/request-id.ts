// ---------------------------------------------------------------------------
// Request ID middleware for Hono.
// ---------------------------------------------------------------------------

import { randomUUID } from "node:crypto";
import type { Context, Next } from "hono";

import type { AppEnv } from "../env.js";

/** Client-supplied ids are only trusted in this shape (no log injection). */
const SAFE_REQUEST_ID_RE = /^[a-zA-Z0-9_-]{1,128}$/;

/**
 * Returns a Hono middleware that stores a request ID on the context as
 * `"requestId"` and echoes it in the `X-Request-ID` response header.
 * A well-formed incoming `X-Request-ID` is reused.
 */
export function requestIdMiddleware(): (
  c: Context<AppEnv>,
  next: Next,
) => Promise<void> {
  return async (c: Context<AppEnv>, next: Next): Promise<void> => {
    const existing = c.req.header("x-request-id");
    const requestId =
      existing && SAFE_REQUEST_ID_RE.test(existing) ? existing : randomUUID();

    c.set("requestId", requestId);
    c.header("X-Request-ID", requestId);

    await next();
  };
}
