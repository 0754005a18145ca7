// ---------------------------------------------------------------------------
// Hono error handler: maps domain errors to HTTP responses.
// ---------------------------------------------------------------------------

import type { Context } from "hono";

import {
  CatalogServiceError,
  ConfigurationError,
  ISBNValidationError,
  MalformedResponseError,
  NotFoundError,
  TransportError,
} from "../../core/errors.js";
import { describeStoreFailure } from "../../sync/sync-writer.js";

type ErrorStatus = 400 | 404 | 500 | 502 | 504;

interface ErrorMapping {
  status: ErrorStatus;
  type: string;
  /** Whether the message is safe to show in production. */
  expose: boolean;
}

function classify(err: Error): ErrorMapping {
  if (err instanceof ISBNValidationError) {
    return { status: 400, type: "isbn_validation_error", expose: true };
  }
  if (err instanceof NotFoundError) {
    return { status: 404, type: "not_found", expose: true };
  }
  if (err instanceof ConfigurationError) {
    return { status: 500, type: "configuration_error", expose: false };
  }
  if (err instanceof CatalogServiceError) {
    return { status: 502, type: "catalog_error", expose: false };
  }
  if (err instanceof MalformedResponseError) {
    return { status: 502, type: "malformed_response", expose: false };
  }
  if (err instanceof TransportError) {
    return err.timedOut
      ? { status: 504, type: "upstream_timeout", expose: false }
      : { status: 502, type: "upstream_error", expose: false };
  }
  return { status: 500, type: "internal_error", expose: false };
}

/**
 * Hono `onError` handler that inspects the thrown error and returns an
 * appropriate HTTP status code with a JSON body.
 *
 * In production only user-facing messages (bad ISBN, not found) are passed
 * through; everything else gets a generic message.
 *
 * Mapping:
 * - `ISBNValidationError`    -> 400
 * - `NotFoundError`          -> 404
 * - `ConfigurationError`     -> 500
 * - `CatalogServiceError`    -> 502
 * - `MalformedResponseError` -> 502
 * - `TransportError`         -> 504 on timeout, otherwise 502
 * - Everything else          -> 500
 */
export function errorHandler(err: Error, c: Context): Response {
  const isProduction = process.env["NODE_ENV"] === "production";
  const { status, type, expose } = classify(err);

  const message = isProduction && !expose ? genericMessage(status) : err.message;
  const hint = err instanceof TransportError ? describeStoreFailure(err.code) : null;

  return c.json(
    {
      error: message,
      type,
      ...(hint && !isProduction ? { hint } : {}),
    },
    status,
  );
}

function genericMessage(status: ErrorStatus): string {
  switch (status) {
    case 502:
      return "Upstream service error";
    case 504:
      return "Upstream service timed out";
    default:
      return "Internal server error";
  }
}
