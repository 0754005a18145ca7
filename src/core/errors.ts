// ---------------------------------------------------------------------------
// Error hierarchy for the bookshelf sync service.
// ---------------------------------------------------------------------------

// ── Base error ──────────────────────────────────────────────────────────────

/**
 * Root of all bookshelf sync domain errors.
 */
export class BookSyncError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "BookSyncError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── Infrastructure errors ───────────────────────────────────────────────────

/** A required credential or configuration value is missing or invalid. */
export class ConfigurationError extends BookSyncError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

/**
 * A network call failed: DNS/connection failure, timeout, cancellation, or
 * a non-2xx HTTP status.
 */
export class TransportError extends BookSyncError {
  /** HTTP status, when the server answered. */
  public readonly status: number | null;
  /** Machine-readable error code reported by the remote service, if any. */
  public readonly code: string | null;
  public readonly timedOut: boolean;

  constructor(
    message: string,
    details: { status?: number; code?: string; timedOut?: boolean } = {},
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "TransportError";
    this.status = details.status ?? null;
    this.code = details.code ?? null;
    this.timedOut = details.timedOut ?? false;
  }
}

// ── Catalog errors ──────────────────────────────────────────────────────────

/** A catalog body could not be decoded, even after the XML fallback. */
export class MalformedResponseError extends BookSyncError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "MalformedResponseError";
  }
}

/** The catalog answered with an explicit error object. */
export class CatalogServiceError extends BookSyncError {
  public readonly errorCode: string | null;

  constructor(message: string, errorCode: string | null, options?: ErrorOptions) {
    super(message, options);
    this.name = "CatalogServiceError";
    this.errorCode = errorCode;
  }
}

/** An ISBN lookup returned no records. */
export class NotFoundError extends BookSyncError {
  public readonly isbn: string;

  constructor(isbn: string, options?: ErrorOptions) {
    super(`No book found for ISBN ${isbn}`, options);
    this.name = "NotFoundError";
    this.isbn = isbn;
  }
}

// ── Domain errors ───────────────────────────────────────────────────────────

/** The supplied ISBN is unusable. */
export class ISBNValidationError extends BookSyncError {
  public readonly rawISBN: string;

  constructor(rawISBN: string, reason: string, options?: ErrorOptions) {
    super(`Invalid ISBN "${rawISBN}": ${reason}`, options);
    this.name = "ISBNValidationError";
    this.rawISBN = rawISBN;
  }
}

// ── Store errors ────────────────────────────────────────────────────────────

/**
 * The destination record was created but its body note could not be
 * appended.  Returned as a warning next to the record id, never thrown.
 */
export class PartialWriteError extends BookSyncError {
  public readonly recordId: string;

  constructor(recordId: string, options?: ErrorOptions) {
    const reason =
      options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Record ${recordId} was created but its note was not saved${reason}`, options);
    this.name = "PartialWriteError";
    this.recordId = recordId;
  }
}
