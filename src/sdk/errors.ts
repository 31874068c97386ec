/**
 * Structured error hierarchy for the ingestion pipeline.
 *
 * All pipeline errors extend {@link IngestionError} so callers can branch on
 * the class or on the `code` string:
 *
 * ```ts
 * try {
 *   await normalizer.normalize(bytes, mimeType);
 * } catch (e) {
 *   if (e instanceof FormatError) { ... }           // document-level, fatal
 *   if (e instanceof ExternalCallTransientError) { ... } // retry
 * }
 * ```
 *
 * @module errors
 */

/** Base error for all pipeline errors. Includes an error code for programmatic matching. */
export class IngestionError extends Error {
  readonly code: string;
  constructor(code: string, message: string) {
    super(message);
    this.name = "IngestionError";
    this.code = code;
  }
}

// ─── Document-level ────────────────────────────────────────────────

export type FormatErrorReason = "format-unsupported" | "corrupt-document" | "zero-pages";

/** The document cannot be turned into pages. Always fatal for that document. */
export class FormatError extends IngestionError {
  readonly reason: FormatErrorReason;
  constructor(reason: FormatErrorReason, message: string) {
    super("FORMAT_ERROR", message);
    this.name = "FormatError";
    this.reason = reason;
  }
}

export class FormatUnsupportedError extends FormatError {
  readonly mimeType: string;
  constructor(mimeType: string) {
    super("format-unsupported", `No normalizer registered for MIME type: ${mimeType}`);
    this.name = "FormatUnsupportedError";
    this.mimeType = mimeType;
  }
}

export class CorruptDocumentError extends FormatError {
  readonly cause?: Error;
  constructor(message: string, cause?: Error) {
    super("corrupt-document", message);
    this.name = "CorruptDocumentError";
    this.cause = cause;
  }
}

export class EmptyDocumentError extends FormatError {
  constructor(fileName: string) {
    super("zero-pages", `Document "${fileName}" produced zero pages`);
    this.name = "EmptyDocumentError";
  }
}

// ─── External calls ────────────────────────────────────────────────

export type ExternalCapability = "caption" | "embed";

/** Timeout, rate limit, 5xx. Retried with backoff. */
export class ExternalCallTransientError extends IngestionError {
  readonly capability: ExternalCapability;
  readonly cause?: Error;
  constructor(capability: ExternalCapability, message: string, cause?: Error) {
    super("EXTERNAL_CALL_TRANSIENT", `[${capability}] ${message}`);
    this.name = "ExternalCallTransientError";
    this.capability = capability;
    this.cause = cause;
  }
}

/** Invalid payload, auth failure, exhausted retries. Fails the unit, never the document. */
export class ExternalCallPermanentError extends IngestionError {
  readonly capability: ExternalCapability;
  readonly cause?: Error;
  constructor(capability: ExternalCapability, message: string, cause?: Error) {
    super("EXTERNAL_CALL_PERMANENT", `[${capability}] ${message}`);
    this.name = "ExternalCallPermanentError";
    this.capability = capability;
    this.cause = cause;
  }
}

/** The embedding capability returned a vector whose length differs from earlier ones in the run. */
export class DimensionMismatchError extends ExternalCallPermanentError {
  readonly expected: number;
  readonly actual: number;
  constructor(expected: number, actual: number) {
    super("embed", `Expected ${expected}-dimensional vector, got ${actual}`);
    this.name = "DimensionMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

export class BudgetExhaustedError extends IngestionError {
  readonly capability: ExternalCapability;
  constructor(capability: ExternalCapability) {
    super("BUDGET_EXHAUSTED", `Call budget exhausted for "${capability}"`);
    this.name = "BudgetExhaustedError";
    this.capability = capability;
  }
}

// ─── Contract errors ───────────────────────────────────────────────

/** Embedder invoked on an image unit whose summary is still null. Never recovered. */
export class OrderingViolationError extends IngestionError {
  readonly unitId: string;
  constructor(unitId: string, message: string) {
    super("ORDERING_VIOLATION", `Unit "${unitId}": ${message}`);
    this.name = "OrderingViolationError";
    this.unitId = unitId;
  }
}

export class InvalidStateTransitionError extends IngestionError {
  readonly from: string;
  readonly to: string;
  constructor(from: string, to: string) {
    super("INVALID_STATE_TRANSITION", `Cannot move document from "${from}" to "${to}"`);
    this.name = "InvalidStateTransitionError";
    this.from = from;
    this.to = to;
  }
}

export class CancelledError extends IngestionError {
  constructor(message = "Ingestion cancelled") {
    super("CANCELLED", message);
    this.name = "CancelledError";
  }
}

/** Thrown when configuration validation fails. */
export class ConfigError extends IngestionError {
  readonly field?: string;
  constructor(message: string, field?: string) {
    super("CONFIG_ERROR", field ? `Invalid "${field}": ${message}` : message);
    this.name = "ConfigError";
    this.field = field;
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
