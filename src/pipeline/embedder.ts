// =============================================================================
// Embedder — One vector per unit: text for text units, summary for images
// =============================================================================

import type { EmbeddedUnit, Embedding, SummarizedImageUnit, Unit } from "../domain/units.js";
import type { EmbeddingPort, EmbeddingResult } from "../ports/embedding.port.js";
import { DimensionMismatchError, ExternalCallPermanentError, OrderingViolationError } from "../sdk/errors.js";
import type { RetryPolicy } from "../sdk/retry.js";
import { withRetry } from "../sdk/retry.js";
import type { ExternalCallContext, Sleep } from "./external-call.js";
import { acquireCall, defaultSleep } from "./external-call.js";

export interface EmbedderOptions {
  port: EmbeddingPort;
  retry?: RetryPolicy;
  /** Pin the expected dimensionality; otherwise the first vector sets it */
  dimensions?: number;
  sleep?: Sleep;
}

export class Embedder {
  private readonly port: EmbeddingPort;
  private readonly retry?: RetryPolicy;
  private readonly sleep: Sleep;
  private dimensions: number | null;

  constructor(options: EmbedderOptions) {
    this.port = options.port;
    this.retry = options.retry;
    this.sleep = options.sleep ?? defaultSleep;
    this.dimensions = options.dimensions ?? null;
  }

  /** Dimensionality observed (or pinned) for this run, if known yet. */
  get vectorDimensions(): number | null {
    return this.dimensions;
  }

  /**
   * @throws {OrderingViolationError} for an image unit that was never summarized
   */
  async embedUnit(unit: Unit, ctx: ExternalCallContext = {}): Promise<EmbeddedUnit> {
    if (unit.kind === "text") {
      const result = await this.embed(unit.unitId, unit.text, ctx);
      return { unit, embedding: toEmbedding(unit.unitId, "text", result) };
    }

    const { summary } = unit;
    if (summary === null) {
      throw new OrderingViolationError(unit.unitId, "image unit reached the embedder before it was summarized");
    }
    const summarized: SummarizedImageUnit = { ...unit, summary };
    const result = await this.embed(unit.unitId, summary.text, ctx);
    return { unit: summarized, embedding: toEmbedding(unit.unitId, "image-summary", result) };
  }

  private async embed(unitId: string, text: string, ctx: ExternalCallContext): Promise<EmbeddingResult> {
    const result = await withRetry(
      async () => {
        await acquireCall("embed", ctx, this.sleep);
        return this.port.embed(text, { signal: ctx.callSignal });
      },
      {
        ...this.retry,
        signal: ctx.stopSignal,
        sleep: this.sleep,
        onRetry: (error, attempt, delayMs) =>
          ctx.logger?.warn("unit:retry", { unitId, stage: "embedding", attempt, delayMs, error: error.message }),
      },
    );

    ctx.budget?.record("embed", result.tokenCount);
    this.checkDimensions(result.embedding);
    return result;
  }

  private checkDimensions(vector: number[]): void {
    if (vector.length === 0) throw new ExternalCallPermanentError("embed", "provider returned an empty vector");
    if (this.dimensions === null) {
      this.dimensions = vector.length;
      return;
    }
    if (vector.length !== this.dimensions) throw new DimensionMismatchError(this.dimensions, vector.length);
  }
}

function toEmbedding(unitId: string, modality: Embedding["modality"], result: EmbeddingResult): Embedding {
  return { unitId, modality, vector: result.embedding, tokenCount: result.tokenCount };
}
