// =============================================================================
// JsonlIndexSink — Appends entries to text-index.jsonl and image-index.jsonl
// =============================================================================

import * as fs from "node:fs/promises";
import * as path from "node:path";

import type { IndexBatch } from "../../domain/units.js";
import type { IndexSinkPort } from "../../ports/index-sink.port.js";
import { toError } from "../../sdk/errors.js";
import type { EntryRecord } from "./entry-records.js";
import { imageRecord, textRecord } from "./entry-records.js";

export const TEXT_INDEX_FILE = "text-index.jsonl";
export const IMAGE_INDEX_FILE = "image-index.jsonl";

export interface JsonlIndexSinkOptions {
  directory: string;
}

/** What was at an index path before a write: a file of `size` bytes, nothing, or something else */
type PriorState = { kind: "file"; size: number } | { kind: "absent" } | { kind: "other" };

interface PendingAppend {
  path: string;
  data: string;
  prior: PriorState;
}

/**
 * A batch is appended to both files or to neither: if either append fails,
 * every file touched by the write is truncated back to its previous length.
 */
export class JsonlIndexSink implements IndexSinkPort {
  private readonly directory: string;
  private dirReady = false;
  // Writes are chained so lines of concurrent documents never interleave
  private tail: Promise<void> = Promise.resolve();

  constructor(options: JsonlIndexSinkOptions) {
    this.directory = options.directory;
  }

  get textIndexPath(): string {
    return path.join(this.directory, TEXT_INDEX_FILE);
  }

  get imageIndexPath(): string {
    return path.join(this.directory, IMAGE_INDEX_FILE);
  }

  write(batch: IndexBatch): Promise<void> {
    const run = this.tail.then(() => this.append(batch));
    // Keep the chain alive; the caller sees the failure through `run`
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async append(batch: IndexBatch): Promise<void> {
    await this.ensureDirectory();
    const pending: PendingAppend[] = [
      { path: this.textIndexPath, data: toLines(batch.textEntries.map(textRecord)), prior: await priorState(this.textIndexPath) },
      { path: this.imageIndexPath, data: toLines(batch.imageEntries.map(imageRecord)), prior: await priorState(this.imageIndexPath) },
    ];

    const attempted: PendingAppend[] = [];
    try {
      for (const file of pending) {
        attempted.push(file);
        await fs.appendFile(file.path, file.data, "utf-8");
      }
    } catch (error) {
      const cause = toError(error);
      try {
        for (const file of attempted) await restore(file);
      } catch (rollbackError) {
        throw new AggregateError([cause, toError(rollbackError)], `Index append failed and rollback failed: ${cause.message}`);
      }
      throw cause;
    }
  }

  private async ensureDirectory(): Promise<void> {
    if (this.dirReady) return;
    await fs.mkdir(this.directory, { recursive: true });
    this.dirReady = true;
  }
}

function toLines(records: EntryRecord[]): string {
  return records.map((r) => `${JSON.stringify(r)}\n`).join("");
}

async function priorState(file: string): Promise<PriorState> {
  try {
    const stats = await fs.stat(file);
    return stats.isFile() ? { kind: "file", size: stats.size } : { kind: "other" };
  } catch (error) {
    if (isNotFound(error)) return { kind: "absent" };
    throw error;
  }
}

async function restore(file: PendingAppend): Promise<void> {
  switch (file.prior.kind) {
    case "file":
      await fs.truncate(file.path, file.prior.size);
      break;
    case "absent":
      await fs.rm(file.path, { force: true });
      break;
    case "other":
      // appendFile cannot have changed a directory or device
      break;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
