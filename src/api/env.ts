// ---------------------------------------------------------------------------
// Hono context typing shared by middleware and routes.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

/** Per-request variables set by the middleware stack. */
export interface AppEnv {
  Variables: {
    requestId: string;
    logger: Logger;
  };
}
