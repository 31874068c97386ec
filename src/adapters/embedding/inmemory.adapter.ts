// =============================================================================
// InMemoryEmbeddingAdapter — Deterministic embeddings for tests and dry runs
// =============================================================================

import type { EmbeddingCallOptions, EmbeddingPort, EmbeddingResult } from "../../ports/embedding.port.js";
import { abortableSleep } from "../../sdk/retry.js";

export interface InMemoryEmbeddingOptions {
  dimensions?: number;
  modelId?: string;
  /** Replaces the hash-based vector; may throw to simulate provider errors */
  embedFn?: (text: string, call: number) => number[] | Promise<number[]>;
  /** Simulated latency per call; honours the call's abort signal */
  latencyMs?: number;
}

export class InMemoryEmbeddingAdapter implements EmbeddingPort {
  readonly dimensions: number;
  readonly modelId: string;
  /** Every text passed to {@link embed}, in call order */
  readonly calls: string[] = [];
  private readonly embedFn: (text: string, call: number) => number[] | Promise<number[]>;
  private readonly latencyMs: number;

  constructor(options?: InMemoryEmbeddingOptions) {
    this.dimensions = options?.dimensions ?? 384;
    this.modelId = options?.modelId ?? "inmemory-mock";
    this.embedFn = options?.embedFn ?? ((text) => hashVector(text, this.dimensions));
    this.latencyMs = options?.latencyMs ?? 0;
  }

  async embed(text: string, options?: EmbeddingCallOptions): Promise<EmbeddingResult> {
    this.calls.push(text);
    const call = this.calls.length;
    if (this.latencyMs > 0) await abortableSleep(this.latencyMs, options?.signal);
    const embedding = await this.embedFn(text, call);
    return { embedding, tokenCount: Math.ceil(text.length / 4) };
  }
}

/**
 * Unit-length vector derived from the text alone, so equal texts always map
 * to equal vectors.
 */
export function hashVector(text: string, dimensions: number): number[] {
  let seed = 2166136261;
  for (let i = 0; i < text.length; i++) {
    seed ^= text.charCodeAt(i);
    seed = Math.imul(seed, 16777619) >>> 0;
  }

  const vec: number[] = [];
  let norm = 0;
  for (let i = 0; i < dimensions; i++) {
    // xorshift32
    seed ^= seed << 13;
    seed ^= seed >>> 17;
    seed ^= seed << 5;
    seed >>>= 0;
    const value = (seed / 0xffffffff) * 2 - 1;
    vec.push(value);
    norm += value * value;
  }
  norm = Math.sqrt(norm) || 1;
  return vec.map((v) => v / norm);
}
