// ---------------------------------------------------------------------------
// Bookshelf sync -- application bootstrap (shared by the server and CLI).
// ---------------------------------------------------------------------------

import type { Hono } from "hono";
import type { Logger } from "pino";

import type { AppConfig, SyncCredentials } from "./core/types.js";
import { loadConfig } from "./config/config.js";
import { createLogger } from "./logging/logger.js";
import { CatalogClient } from "./catalog/catalog-client.js";
import { SyncWriter } from "./sync/sync-writer.js";
import { BookSyncService } from "./orchestrator/book-sync.js";
import { createApp } from "./api/server.js";
import type { AppEnv } from "./api/env.js";

export interface Services {
  config: AppConfig;
  logger: Logger;
  credentials: SyncCredentials;
  syncService: BookSyncService;
}

/** Wire config, logger, clients and the sync service together. */
export function buildServices(config: AppConfig = loadConfig()): Services {
  const logger = createLogger({
    level: config.logLevel,
    prettyPrint: config.env === "development",
    redactSecrets: true,
  });

  const catalog = new CatalogClient({
    baseUrl: config.catalog.baseUrl,
    timeoutMs: config.catalog.timeoutMs,
    logger,
  });

  const writer = new SyncWriter({
    baseUrl: config.notion.baseUrl,
    notionVersion: config.notion.version,
    timeoutMs: config.notion.timeoutMs,
    propertyNames: config.notion.propertyNames,
    logger,
  });

  const syncService = new BookSyncService({ catalog, writer, logger });

  const credentials: SyncCredentials = {
    catalogApiKey: config.catalog.apiKey,
    notionToken: config.notion.token,
    notionDatabaseId: config.notion.databaseId,
  };

  return { config, logger, credentials, syncService };
}

export function buildApp(config?: AppConfig): { app: Hono<AppEnv>; services: Services } {
  const services = buildServices(config);

  const app = createApp({
    syncService: services.syncService,
    credentials: services.credentials,
    defaultMaxResults: services.config.catalog.maxResults,
    logger: services.logger,
  });

  const missing = [
    services.credentials.catalogApiKey ? null : "CATALOG_API_KEY",
    services.credentials.notionToken ? null : "NOTION_TOKEN",
    services.credentials.notionDatabaseId ? null : "NOTION_DATABASE_ID",
  ].filter((name): name is string => name !== null);

  if (missing.length > 0) {
    services.logger.warn({ missing }, "credentials not configured; affected routes will fail");
  }

  services.logger.info(
    {
      env: services.config.env,
      port: services.config.port,
      propertyNames: services.config.notion.propertyNames,
    },
    "bookshelf-sync ready",
  );

  return { app, services };
}

export { CatalogClient } from "./catalog/catalog-client.js";
export { SyncWriter, extractContainerId } from "./sync/sync-writer.js";
export { BookSyncService } from "./orchestrator/book-sync.js";
export { decodeResponse, decodeXml } from "./catalog/response-decoder.js";
export { normalizeDate, toPayload } from "./sync/record-mapper.js";
export * from "./core/errors.js";
export type * from "./core/types.js";
