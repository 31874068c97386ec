/**
 * Retry utilities — exponential backoff around external calls.
 *
 * One wrapper serves both the caption and the embedding stage. A caller that
 * supplies `fallback` gets a degraded value once retries are exhausted; a
 * caller without one gets the last error.
 *
 * @example
 *   const caption = await withRetry(() => port.caption(image), {
 *     maxRetries: 3,
 *     backoff: "exponential",
 *     retryIf: isTransient,
 *     fallback: (err) => placeholder(err),
 *   });
 */

import { CancelledError, ExternalCallTransientError, toError } from "./errors.js";

// ─── Config ────────────────────────────────────────────────────────

export type BackoffKind = "fixed" | "linear" | "exponential";

export interface RetryPolicy {
  /** Maximum number of retry attempts after the first call (default: 3). */
  maxRetries?: number;
  /** Backoff strategy (default: "exponential"). */
  backoff?: BackoffKind;
  /** Base delay in ms (default: 500). */
  baseDelayMs?: number;
  /** Maximum delay in ms (default: 10000). */
  maxDelayMs?: number;
  /** Jitter factor 0–1 (default: 0.1). */
  jitter?: number;
}

export interface RetryOptions<T> extends RetryPolicy {
  /** Retry only if this returns true for the error (default: transient external-call errors). */
  retryIf?: (error: Error, attempt: number) => boolean;
  /** Called before each retry sleep. */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  /**
   * Produces the degraded value when the error is retryable but attempts ran
   * out. Non-retryable errors are always rethrown.
   */
  fallback?: (error: Error) => T;
  /** Stops retrying (and sleeping) once aborted. */
  signal?: AbortSignal;
  /** Injectable for tests. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

// ─── Delay calculation ─────────────────────────────────────────────

export function computeDelay(
  policy: Required<RetryPolicy>,
  attempt: number,
  random: () => number = Math.random,
): number {
  let delay: number;
  switch (policy.backoff) {
    case "fixed":
      delay = policy.baseDelayMs;
      break;
    case "linear":
      delay = policy.baseDelayMs * attempt;
      break;
    case "exponential":
      delay = policy.baseDelayMs * Math.pow(2, attempt - 1);
      break;
  }
  const jitterRange = delay * policy.jitter;
  delay += random() * jitterRange * 2 - jitterRange;
  return Math.min(Math.max(0, delay), policy.maxDelayMs);
}

export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function isTransient(error: Error): boolean {
  return error instanceof ExternalCallTransientError;
}

export function resolvePolicy(policy?: RetryPolicy): Required<RetryPolicy> {
  return {
    maxRetries: policy?.maxRetries ?? 3,
    backoff: policy?.backoff ?? "exponential",
    baseDelayMs: policy?.baseDelayMs ?? 500,
    maxDelayMs: policy?.maxDelayMs ?? 10_000,
    jitter: policy?.jitter ?? 0.1,
  };
}

// ─── withRetry ─────────────────────────────────────────────────────

/**
 * Execute an async function with retry logic. Cancellation is checked before
 * every attempt, so an aborted signal never issues another call.
 */
export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions<T>): Promise<T> {
  const policy = resolvePolicy(options);
  const retryIf = options?.retryIf ?? isTransient;
  const sleep = options?.sleep ?? abortableSleep;
  const signal = options?.signal;

  let lastError: Error = new Error("withRetry: no attempt made");

  for (let attempt = 0; attempt <= policy.maxRetries; attempt++) {
    if (signal?.aborted) throw new CancelledError();
    try {
      return await fn();
    } catch (err) {
      lastError = toError(err);

      if (!retryIf(lastError, attempt + 1)) throw lastError;
      if (attempt === policy.maxRetries) break;

      const delayMs = computeDelay(policy, attempt + 1);
      options?.onRetry?.(lastError, attempt + 1, delayMs);
      await sleep(delayMs, signal);
    }
  }

  if (options?.fallback) return options.fallback(lastError);
  throw lastError;
}
