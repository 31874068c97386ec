// =============================================================================
// WorkerPool<T, R> — Fixed-size async pool with priorities and per-task timeout
// =============================================================================

import { PriorityQueue } from "./priority-queue.js";
import { CancelledError, toError } from "../sdk/errors.js";

// ── Types ────────────────────────────────────────────────────────────────────

export interface WorkerPoolConfig {
  size: number;
  taskTimeoutMs: number;
}

export type WorkerPoolEvent<R> =
  | { type: "task:started"; taskId: string; workerId: number }
  | { type: "task:completed"; taskId: string; result: R; durationMs: number }
  | { type: "task:failed"; taskId: string; error: Error; durationMs: number }
  | { type: "task:timeout"; taskId: string; workerId: number }
  /** The executor of a timed-out task rejected after the timeout */
  | { type: "task:late-failure"; taskId: string; error: Error }
  | { type: "task:cancelled"; taskId: string }
  | { type: "pool:drained" };

export class TaskTimeoutError extends Error {
  readonly taskId: string;
  constructor(taskId: string, timeoutMs: number) {
    super(`Task "${taskId}" timed out after ${timeoutMs}ms`);
    this.name = "TaskTimeoutError";
    this.taskId = taskId;
  }
}

interface PoolTask<T, R> {
  readonly id: string;
  readonly input: T;
  readonly priority: number;
  readonly abortController: AbortController;
  readonly resolve: (result: R | PromiseLike<R>) => void;
  readonly reject: (error: Error) => void;
}

type WorkerState = "idle" | "busy" | "dead";

interface WorkerSlot<T, R> {
  state: WorkerState;
  wakeResolve: (() => void) | null;
}

// ── Defaults ─────────────────────────────────────────────────────────────────

const DEFAULT_POOL_CONFIG: WorkerPoolConfig = {
  size: 4,
  taskTimeoutMs: 60_000,
};

// ── Implementation ───────────────────────────────────────────────────────────

/**
 * Runs submitted tasks on `size` cooperative workers. The executor receives a
 * signal that aborts when its task times out; at most `size` executors are
 * ever running, timed-out ones included. {@link cancel} rejects every
 * task that has not started yet; running tasks are left to finish.
 */
export class WorkerPool<T, R> {
  private readonly queue: PriorityQueue<PoolTask<T, R>>;
  private readonly workers = new Map<number, WorkerSlot<T, R>>();
  private readonly executor: (input: T, signal: AbortSignal) => Promise<R>;
  private readonly config: WorkerPoolConfig;
  private readonly onEvent?: (event: WorkerPoolEvent<R>) => void;

  private draining = false;
  private cancelled = false;
  private drainWaiters: Array<() => void> = [];

  constructor(
    executor: (input: T, signal: AbortSignal) => Promise<R>,
    config?: Partial<WorkerPoolConfig>,
    onEvent?: (event: WorkerPoolEvent<R>) => void,
  ) {
    this.executor = executor;
    this.config = { ...DEFAULT_POOL_CONFIG, ...config };
    this.onEvent = onEvent;
    this.queue = new PriorityQueue<PoolTask<T, R>>((a, b) => a.priority - b.priority);

    for (let id = 0; id < Math.max(1, this.config.size); id++) {
      this.spawnWorker(id);
    }
  }

  // ── Public API ─────────────────────────────────────────────────────────────

  /** Lower priority values run first; equal priorities run in submission order. */
  submit(id: string, input: T, priority = 0): Promise<R> {
    if (this.cancelled) return Promise.reject(new CancelledError(`Task "${id}" submitted after cancel`));
    if (this.draining) return Promise.reject(new Error("Pool is draining, cannot submit"));

    return new Promise<R>((resolve, reject) => {
      this.queue.enqueue({
        id,
        input,
        priority,
        abortController: new AbortController(),
        resolve,
        reject,
      });
      this.wakeOneIdleWorker();
    });
  }

  /** Reject all queued tasks with {@link CancelledError}. */
  cancel(reason = "Ingestion cancelled"): void {
    this.cancelled = true;
    for (const task of this.queue.drainAll()) {
      this.emit({ type: "task:cancelled", taskId: task.id });
      task.reject(new CancelledError(reason));
    }
    this.settleDrainIfIdle();
  }

  /** Stop accepting tasks and resolve once every queued and running task has settled. */
  async drain(): Promise<void> {
    this.draining = true;
    if (this.allIdle() && this.queue.size === 0) {
      this.shutdown();
      return;
    }
    await new Promise<void>((resolve) => {
      this.drainWaiters.push(resolve);
      this.wakeAll();
    });
  }

  // ── Worker lifecycle ───────────────────────────────────────────────────────

  private spawnWorker(id: number): void {
    const slot: WorkerSlot<T, R> = { state: "idle", wakeResolve: null };
    this.workers.set(id, slot);
    void this.workerLoop(id, slot);
  }

  private async workerLoop(workerId: number, slot: WorkerSlot<T, R>): Promise<void> {
    while (slot.state !== "dead") {
      const task = this.queue.dequeue();

      if (!task) {
        slot.state = "idle";
        if (this.settleDrainIfIdle()) return;

        // Park until woken
        await new Promise<void>((resolve) => {
          slot.wakeResolve = resolve;
        });
        continue;
      }

      slot.state = "busy";
      this.emit({ type: "task:started", taskId: task.id, workerId });
      await this.runTask(task, workerId);
    }
  }

  /**
   * Settles the task's promise on completion, failure or timeout, but only
   * returns once the executor itself has settled: a timed-out call that
   * ignores its abort signal keeps holding the worker slot.
   */
  private async runTask(task: PoolTask<T, R>, workerId: number): Promise<void> {
    const startMs = Date.now();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      const error = new TaskTimeoutError(task.id, this.config.taskTimeoutMs);
      task.abortController.abort(error);
      this.emit({ type: "task:timeout", taskId: task.id, workerId });
      task.reject(error);
    }, this.config.taskTimeoutMs);

    try {
      const result = await this.executor(task.input, task.abortController.signal);
      if (timedOut) return;
      this.emit({ type: "task:completed", taskId: task.id, result, durationMs: Date.now() - startMs });
      task.resolve(result);
    } catch (error) {
      const err = toError(error);
      if (timedOut) {
        this.emit({ type: "task:late-failure", taskId: task.id, error: err });
        return;
      }
      this.emit({ type: "task:failed", taskId: task.id, error: err, durationMs: Date.now() - startMs });
      task.reject(err);
    } finally {
      clearTimeout(timer);
    }
  }

  // ── Helpers ────────────────────────────────────────────────────────────────

  private settleDrainIfIdle(): boolean {
    if (!this.draining || !this.allIdle() || this.queue.size > 0) return false;
    this.shutdown();
    return true;
  }

  private wakeOneIdleWorker(): void {
    for (const slot of this.workers.values()) {
      if (slot.state === "idle" && slot.wakeResolve) {
        const wake = slot.wakeResolve;
        slot.wakeResolve = null;
        wake();
        return;
      }
    }
  }

  private wakeAll(): void {
    for (const slot of this.workers.values()) {
      if (slot.wakeResolve) {
        const wake = slot.wakeResolve;
        slot.wakeResolve = null;
        wake();
      }
    }
  }

  private allIdle(): boolean {
    for (const slot of this.workers.values()) {
      if (slot.state === "busy") return false;
    }
    return true;
  }

  private shutdown(): void {
    for (const slot of this.workers.values()) slot.state = "dead";
    this.wakeAll();
    const waiters = this.drainWaiters;
    this.drainWaiters = [];
    if (waiters.length > 0 || this.workers.size > 0) {
      this.workers.clear();
      this.emit({ type: "pool:drained" });
    }
    for (const resolve of waiters) resolve();
  }

  private emit(event: WorkerPoolEvent<R>): void {
    this.onEvent?.(event);
  }
}
