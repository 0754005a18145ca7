// ---------------------------------------------------------------------------
// Health check route.
// ---------------------------------------------------------------------------

import { Hono } from "hono";

const startedAt = Date.now();

/**
 * Mounts `GET /health`, a basic liveness probe.  It does not call the
 * catalog or the store.
 */
export function healthRoutes(): Hono {
  const app = new Hono();

  app.get("/", (c) => {
    const uptimeMs = Date.now() - startedAt;
    return c.json({
      status: "ok",
      uptime: uptimeMs,
      timestamp: new Date().toISOString(),
    });
  });

  return app;
}
