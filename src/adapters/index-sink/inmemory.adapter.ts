// =============================================================================
// InMemoryIndexSink — Keeps the latest batch per document
// =============================================================================

import type { ImageIndexEntry, IndexBatch, TextIndexEntry } from "../../domain/units.js";
import type { IndexSinkPort } from "../../ports/index-sink.port.js";

export class InMemoryIndexSink implements IndexSinkPort {
  private readonly batches = new Map<string, IndexBatch>();
  /** Number of write calls received, re-ingestions included */
  writes = 0;

  async write(batch: IndexBatch): Promise<void> {
    this.writes++;
    this.batches.set(batch.documentId, batch);
  }

  get(documentId: string): IndexBatch | undefined {
    return this.batches.get(documentId);
  }

  textEntries(): TextIndexEntry[] {
    return [...this.batches.values()].flatMap((b) => b.textEntries);
  }

  imageEntries(): ImageIndexEntry[] {
    return [...this.batches.values()].flatMap((b) => b.imageEntries);
  }

  clear(): void {
    this.batches.clear();
    this.writes = 0;
  }
}
