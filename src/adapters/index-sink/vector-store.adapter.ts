// =============================================================================
// VectorStoreIndexSink — Upserts the two collections into two vector stores
// =============================================================================

import type { IndexBatch } from "../../domain/units.js";
import type { IndexSinkPort } from "../../ports/index-sink.port.js";
import type { VectorDocument, VectorStorePort } from "../../ports/vector-store.port.js";
import { toError } from "../../sdk/errors.js";
import { imageRecord, textRecord } from "./entry-records.js";

export interface VectorStoreIndexSinkOptions {
  text: VectorStorePort;
  image: VectorStorePort;
}

/**
 * Entry ids are deterministic, so writing the same document again overwrites
 * its earlier entries instead of duplicating them. A batch lands in both
 * stores or in neither: when the image upsert fails, the text store is put
 * back to what it held before the write.
 */
export class VectorStoreIndexSink implements IndexSinkPort {
  private readonly text: VectorStorePort;
  private readonly image: VectorStorePort;

  constructor(options: VectorStoreIndexSinkOptions) {
    this.text = options.text;
    this.image = options.image;
  }

  async write(batch: IndexBatch): Promise<void> {
    const texts = batch.textEntries.map(textRecord);
    const images = batch.imageEntries.map(imageRecord);

    const previous = texts.length > 0 ? await this.text.get(texts.map((r) => r.id)) : [];
    if (texts.length > 0) await this.text.upsert(texts);

    try {
      if (images.length > 0) await this.image.upsert(images);
    } catch (error) {
      await this.restoreText(texts, previous, toError(error));
      throw error;
    }
  }

  private async restoreText(written: VectorDocument[], previous: VectorDocument[], cause: Error): Promise<void> {
    const kept = new Set(previous.map((doc) => doc.id));
    try {
      await this.text.delete(written.map((doc) => doc.id).filter((id) => !kept.has(id)));
      if (previous.length > 0) await this.text.upsert(previous);
    } catch (rollbackError) {
      throw new AggregateError([cause, toError(rollbackError)], `Image upsert failed and text rollback failed: ${cause.message}`);
    }
  }
}
