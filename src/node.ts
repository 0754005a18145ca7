// ---------------------------------------------------------------------------
// Node.js HTTP server entrypoint (for deployment).
// ---------------------------------------------------------------------------

import { serve } from "@hono/node-server";
import { buildApp } from "./app.js";

const { app, services } = buildApp();

serve({
  fetch: app.fetch,
  port: services.config.port,
});
