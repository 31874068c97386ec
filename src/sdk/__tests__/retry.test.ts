import { describe, it, expect, vi } from 'vitest';
import { abortableSleep, computeDelay, resolvePolicy, withRetry } from '../retry.js';
import { CancelledError, ExternalCallPermanentError, ExternalCallTransientError } from '../errors.js';

const noSleep = () => Promise.resolve();

function failingTimes<T>(
  times: number,
  value: T,
  make: () => Error = () => new ExternalCallTransientError('caption', 'rate limited'),
) {
  let calls = 0;
  const fn = vi.fn(async () => {
    calls++;
    if (calls <= times) throw make();
    return value;
  });
  return fn;
}

describe('computeDelay', () => {
  const base = resolvePolicy({ baseDelayMs: 100, maxDelayMs: 1_000, jitter: 0 });

  it('grows exponentially and caps at maxDelayMs', () => {
    expect([1, 2, 3, 4, 5].map((a) => computeDelay(base, a))).toEqual([100, 200, 400, 800, 1_000]);
  });

  it('supports linear and fixed backoff', () => {
    expect(computeDelay({ ...base, backoff: 'linear' }, 3)).toBe(300);
    expect(computeDelay({ ...base, backoff: 'fixed' }, 3)).toBe(100);
  });

  it('applies symmetric jitter', () => {
    const policy = { ...base, jitter: 0.1 };
    expect(computeDelay(policy, 1, () => 1)).toBe(110);
    expect(computeDelay(policy, 1, () => 0)).toBe(90);
  });
});

describe('withRetry', () => {
  it('returns the first success without sleeping', async () => {
    const sleep = vi.fn(noSleep);
    const result = await withRetry(async () => 'ok', { sleep });
    expect(result).toBe('ok');
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries transient errors until success', async () => {
    const fn = failingTimes(2, 'ok');
    const onRetry = vi.fn();
    const sleep = vi.fn(noSleep);

    const result = await withRetry(fn, { maxRetries: 3, jitter: 0, baseDelayMs: 10, sleep, onRetry });

    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(onRetry.mock.calls.map((c) => [c[1], c[2]])).toEqual([
      [1, 10],
      [2, 20],
    ]);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('throws non-transient errors immediately', async () => {
    const fn = failingTimes(1, 'ok', () => new ExternalCallPermanentError('embed', 'bad payload'));

    await expect(withRetry(fn, { maxRetries: 3, sleep: noSleep })).rejects.toBeInstanceOf(ExternalCallPermanentError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('throws the last error once retries are exhausted', async () => {
    const fn = failingTimes(10, 'ok');

    await expect(withRetry(fn, { maxRetries: 2, sleep: noSleep })).rejects.toThrow('[caption] rate limited');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('returns the fallback once retries are exhausted', async () => {
    const fn = failingTimes(10, 'ok');

    const result = await withRetry(fn, {
      maxRetries: 1,
      sleep: noSleep,
      fallback: (error) => `fallback: ${error.message}`,
    });

    expect(result).toBe('fallback: [caption] rate limited');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('does not call fn once the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn(async () => 'ok');

    await expect(withRetry(fn, { signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
    expect(fn).not.toHaveBeenCalled();
  });

  it('stops retrying when aborted between attempts', async () => {
    const controller = new AbortController();
    const fn = failingTimes(10, 'ok');
    const sleep = vi.fn(async () => {
      controller.abort();
    });

    await expect(withRetry(fn, { maxRetries: 5, sleep, signal: controller.signal })).rejects.toBeInstanceOf(
      CancelledError,
    );
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('abortableSleep', () => {
  it('rejects with CancelledError when aborted', async () => {
    const controller = new AbortController();
    const pending = abortableSleep(10_000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });

  it('resolves after the delay', async () => {
    await expect(abortableSleep(1)).resolves.toBeUndefined();
  });
});
