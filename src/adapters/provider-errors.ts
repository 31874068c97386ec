// =============================================================================
// Provider error mapping — AI SDK failures → transient / permanent
// =============================================================================

import { APICallError, NoObjectGeneratedError } from "ai";

import type { ExternalCapability } from "../sdk/errors.js";
import {
  ExternalCallPermanentError,
  ExternalCallTransientError,
  IngestionError,
  toError,
} from "../sdk/errors.js";

/**
 * `APICallError.isRetryable` covers 408, 409, 429 and 5xx. Aborts,
 * network-level failures and model output that does not match the requested
 * schema are retryable too; anything else is permanent.
 */
export function toExternalCallError(capability: ExternalCapability, error: unknown): IngestionError {
  if (error instanceof IngestionError) return error;

  const err = toError(error);
  if (APICallError.isInstance(err)) {
    const status = err.statusCode !== undefined ? ` (HTTP ${err.statusCode})` : "";
    return err.isRetryable
      ? new ExternalCallTransientError(capability, `${err.message}${status}`, err)
      : new ExternalCallPermanentError(capability, `${err.message}${status}`, err);
  }
  if (NoObjectGeneratedError.isInstance(err)) {
    return new ExternalCallTransientError(capability, `no valid structured output: ${err.message}`, err);
  }
  if (err.name === "AbortError" || err.name === "TimeoutError") {
    return new ExternalCallTransientError(capability, `request aborted: ${err.message}`, err);
  }
  if (err instanceof TypeError && /fetch|network|socket/i.test(err.message)) {
    return new ExternalCallTransientError(capability, err.message, err);
  }
  return new ExternalCallPermanentError(capability, err.message, err);
}
