import { describe, it, expect } from 'vitest';
import { TaskTimeoutError, WorkerPool } from '../worker-pool.js';
import type { WorkerPoolEvent } from '../worker-pool.js';
import { CancelledError } from '../../sdk/errors.js';

function delay(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

function gate(): { promise: Promise<void>; open: () => void } {
  let open = () => {};
  const promise = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { promise, open };
}

describe('WorkerPool', () => {
  it('submits and completes a task', async () => {
    const pool = new WorkerPool<number, number>(async (input) => input * 2, { size: 2, taskTimeoutMs: 5_000 });

    const result = await pool.submit('t1', 5);
    expect(result).toBe(10);
    await pool.drain();
  });

  it('fast tasks do not wait for slow tasks', async () => {
    const order: string[] = [];

    const pool = new WorkerPool<{ id: string; ms: number }, string>(
      async (input) => {
        await delay(input.ms);
        order.push(input.id);
        return input.id;
      },
      { size: 2, taskTimeoutMs: 5_000 },
    );

    const slow = pool.submit('slow', { id: 'slow', ms: 200 });
    const fast1 = pool.submit('fast1', { id: 'fast1', ms: 10 });
    const fast2 = pool.submit('fast2', { id: 'fast2', ms: 10 });

    await Promise.all([slow, fast1, fast2]);

    expect(order.indexOf('fast1')).toBeLessThan(order.indexOf('slow'));
    expect(order.indexOf('fast2')).toBeLessThan(order.indexOf('slow'));
    await pool.drain();
  });

  it('respects priority ordering, FIFO within a priority', async () => {
    const order: string[] = [];

    // 1 worker so tasks execute sequentially from queue
    const pool = new WorkerPool<string, string>(
      async (input) => {
        await delay(2);
        order.push(input);
        return input;
      },
      { size: 1, taskTimeoutMs: 5_000 },
    );

    const blocker = pool.submit('blocker', 'blocker', 0);
    await delay(1);

    const tasks = [
      pool.submit('lo', 'lo', 10),
      pool.submit('hi-a', 'hi-a', 1),
      pool.submit('mid', 'mid', 5),
      pool.submit('hi-b', 'hi-b', 1),
    ];

    await Promise.all([blocker, ...tasks]);

    expect(order).toEqual(['blocker', 'hi-a', 'hi-b', 'mid', 'lo']);
    await pool.drain();
  });

  it('drain completes after running tasks settle', async () => {
    const pool = new WorkerPool<number, number>(
      async (input) => {
        await delay(30);
        return input;
      },
      { size: 2, taskTimeoutMs: 5_000 },
    );

    const p1 = pool.submit('a', 1);
    const p2 = pool.submit('b', 2);

    const drainPromise = pool.drain();
    const [r1, r2] = await Promise.all([p1, p2]);
    expect(r1).toBe(1);
    expect(r2).toBe(2);
    await drainPromise;
    await expect(pool.submit('late', 3)).rejects.toThrow(/draining/);
  });

  it('times out a hung task and aborts its signal', async () => {
    const events: WorkerPoolEvent<number>[] = [];
    let abortReason: unknown;

    const pool = new WorkerPool<number, number>(
      async (input, signal) => {
        await new Promise<void>((resolve) => {
          const timer = setTimeout(resolve, 10_000);
          signal.addEventListener('abort', () => {
            clearTimeout(timer);
            resolve();
          });
        });
        abortReason = signal.reason;
        return input;
      },
      { size: 1, taskTimeoutMs: 50 },
      (e) => events.push(e),
    );

    await expect(pool.submit('hung', 42)).rejects.toBeInstanceOf(TaskTimeoutError);
    expect(abortReason).toBeInstanceOf(TaskTimeoutError);
    expect(events.filter((e) => e.type === 'task:timeout')).toHaveLength(1);
    await pool.drain();
  });

  it('cancel rejects queued tasks and leaves running ones alone', async () => {
    const events: WorkerPoolEvent<string>[] = [];
    const release = gate();

    const pool = new WorkerPool<string, string>(
      async (input) => {
        if (input === 'running') await release.promise;
        return input;
      },
      { size: 1, taskTimeoutMs: 5_000 },
      (e) => events.push(e),
    );

    const running = pool.submit('running', 'running');
    await delay(1);
    const queuedA = pool.submit('a', 'a');
    const queuedB = pool.submit('b', 'b');

    pool.cancel();

    await expect(queuedA).rejects.toBeInstanceOf(CancelledError);
    await expect(queuedB).rejects.toBeInstanceOf(CancelledError);
    await expect(pool.submit('after', 'after')).rejects.toBeInstanceOf(CancelledError);

    release.open();
    await expect(running).resolves.toBe('running');
    expect(events.filter((e) => e.type === 'task:cancelled').map((e) => ('taskId' in e ? e.taskId : ''))).toEqual(['a', 'b']);
    await pool.drain();
  });

  it('keeps a timed-out task on its worker until the executor settles', async () => {
    const releases: Array<() => void> = [];
    let running = 0;
    let peak = 0;

    const pool = new WorkerPool<string, string>(
      async (input) => {
        running++;
        peak = Math.max(peak, running);
        // ignores the abort signal
        await new Promise<void>((resolve) => releases.push(resolve));
        running--;
        return input;
      },
      { size: 1, taskTimeoutMs: 20 },
    );

    const first = pool.submit('a', 'a');
    const second = pool.submit('b', 'b');

    await expect(first).rejects.toBeInstanceOf(TaskTimeoutError);
    await delay(30);
    expect(releases).toHaveLength(1);
    expect(running).toBe(1);

    releases[0]();
    await expect(second).rejects.toBeInstanceOf(TaskTimeoutError);
    releases[1]();
    await pool.drain();

    expect(peak).toBe(1);
  });

  it('reports an executor that fails after its timeout', async () => {
    const events: WorkerPoolEvent<number>[] = [];
    const release = gate();

    const pool = new WorkerPool<number, number>(
      async () => {
        await release.promise;
        throw new Error('socket closed');
      },
      { size: 1, taskTimeoutMs: 10 },
      (e) => events.push(e),
    );

    await expect(pool.submit('late', 1)).rejects.toBeInstanceOf(TaskTimeoutError);
    release.open();
    await pool.drain();

    expect(events.map((e) => e.type)).toEqual(['task:started', 'task:timeout', 'task:late-failure', 'pool:drained']);
  });
});
