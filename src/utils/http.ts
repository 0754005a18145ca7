// ---------------------------------------------------------------------------
// Shared fetch plumbing for the catalog and store clients.
// ---------------------------------------------------------------------------

import { TransportError } from "../core/errors.js";

/**
 * Signal for one outbound request: the per-call timeout, combined with the
 * caller's signal when one is given.
 */
export function requestSignal(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

/**
 * Classify a fetch rejection so that timeouts, cancellations and network
 * failures surface the same way from every client.
 */
export function toTransportError(error: unknown, what: string): TransportError {
  if (error instanceof TransportError) return error;

  if (error instanceof DOMException && error.name === "TimeoutError") {
    return new TransportError(`${what} timed out`, { timedOut: true }, { cause: error });
  }
  if (error instanceof DOMException && error.name === "AbortError") {
    return new TransportError(`${what} was aborted`, {}, { cause: error });
  }

  const msg = error instanceof Error ? error.message : String(error);
  return new TransportError(`${what} failed: ${msg}`, {}, {
    cause: error instanceof Error ? error : undefined,
  });
}
