// ---------------------------------------------------------------------------
// Typed configuration loader.
// Reads from environment variables, validates with Zod, and fills in
// defaults so the service can start for local development with only the
// credentials set.
// ---------------------------------------------------------------------------

import { z } from "zod";

import type { AppConfig, PropertyNames } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";
import { DEFAULT_CATALOG_BASE_URL, DEFAULT_CATALOG_TIMEOUT_MS } from "../catalog/catalog-client.js";
import {
  DEFAULT_NOTION_BASE_URL,
  DEFAULT_NOTION_TIMEOUT_MS,
  DEFAULT_NOTION_VERSION,
} from "../sync/sync-writer.js";
import { DEFAULT_PROPERTY_NAMES, KOREAN_PROPERTY_NAMES } from "../sync/notion-properties.js";

// ── Zod schema ──────────────────────────────────────────────────────────────

const optionalName = z.string().trim().min(1).optional();

export const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),

  CATALOG_API_KEY: z.string().default(""),
  CATALOG_BASE_URL: z.string().url().default(DEFAULT_CATALOG_BASE_URL),
  CATALOG_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_CATALOG_TIMEOUT_MS),
  CATALOG_MAX_RESULTS: z.coerce.number().int().min(1).max(50).default(10),

  NOTION_TOKEN: z.string().default(""),
  NOTION_DATABASE_ID: z.string().default(""),
  NOTION_BASE_URL: z.string().url().default(DEFAULT_NOTION_BASE_URL),
  NOTION_VERSION: z.string().min(1).default(DEFAULT_NOTION_VERSION),
  NOTION_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_NOTION_TIMEOUT_MS),

  NOTION_PROPERTY_PRESET: z.enum(["default", "korean"]).default("default"),
  NOTION_PROPERTY_TITLE: optionalName,
  NOTION_PROPERTY_AUTHOR: optionalName,
  NOTION_PROPERTY_PUBLISHER: optionalName,
  NOTION_PROPERTY_PUBLISHED_DATE: optionalName,
  NOTION_PROPERTY_ISBN: optionalName,
  NOTION_PROPERTY_COVER_IMAGE: optionalName,
});

export type Env = z.infer<typeof EnvSchema>;

function resolvePropertyNames(env: Env): PropertyNames {
  const preset =
    env.NOTION_PROPERTY_PRESET === "korean" ? KOREAN_PROPERTY_NAMES : DEFAULT_PROPERTY_NAMES;

  return {
    Title: env.NOTION_PROPERTY_TITLE ?? preset.Title,
    Author: env.NOTION_PROPERTY_AUTHOR ?? preset.Author,
    Publisher: env.NOTION_PROPERTY_PUBLISHER ?? preset.Publisher,
    PublishedDate: env.NOTION_PROPERTY_PUBLISHED_DATE ?? preset.PublishedDate,
    ISBN: env.NOTION_PROPERTY_ISBN ?? preset.ISBN,
    CoverImage: env.NOTION_PROPERTY_COVER_IMAGE ?? preset.CoverImage,
  };
}

/**
 * Load the application configuration from environment variables.
 *
 * Missing credentials are not an error here; the operation that needs them
 * raises a ConfigurationError instead.  Empty strings count as unset.
 */
export function loadConfig(
  source: Record<string, string | undefined> = process.env,
): AppConfig {
  const cleaned = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== ""),
  );

  const result = EnvSchema.safeParse(cleaned);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${issues}`, { cause: result.error });
  }

  const env = result.data;
  return {
    env: env.NODE_ENV,
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    catalog: {
      apiKey: env.CATALOG_API_KEY.trim(),
      baseUrl: env.CATALOG_BASE_URL,
      timeoutMs: env.CATALOG_TIMEOUT_MS,
      maxResults: env.CATALOG_MAX_RESULTS,
    },
    notion: {
      token: env.NOTION_TOKEN.trim(),
      databaseId: env.NOTION_DATABASE_ID.trim(),
      baseUrl: env.NOTION_BASE_URL,
      version: env.NOTION_VERSION,
      timeoutMs: env.NOTION_TIMEOUT_MS,
      propertyNames: resolvePropertyNames(env),
    },
  };
}
