// =============================================================================
// AiSdkEmbeddingAdapter — EmbeddingPort over an AI SDK embedding model
// =============================================================================

import type { EmbeddingModel } from "ai";
import { embed } from "ai";

import type { EmbeddingCallOptions, EmbeddingPort, EmbeddingResult } from "../../ports/embedding.port.js";
import { toExternalCallError } from "../provider-errors.js";

export interface AiSdkEmbeddingOptions {
  model: EmbeddingModel<string>;
  /** Requested output dimensions, for models that can shorten their vectors */
  dimensions?: number;
}

export class AiSdkEmbeddingAdapter implements EmbeddingPort {
  readonly modelId: string;
  private readonly model: EmbeddingModel<string>;
  private readonly dimensions?: number;

  constructor(options: AiSdkEmbeddingOptions) {
    this.model = options.model;
    this.modelId = typeof options.model === "string" ? options.model : options.model.modelId;
    this.dimensions = options.dimensions;
  }

  async embed(text: string, options?: EmbeddingCallOptions): Promise<EmbeddingResult> {
    try {
      const result = await embed({
        model: this.model,
        value: text,
        maxRetries: 0,
        abortSignal: options?.signal,
        providerOptions: this.dimensions ? { openai: { dimensions: this.dimensions } } : undefined,
      });
      return { embedding: result.embedding, tokenCount: result.usage.tokens };
    } catch (error) {
      throw toExternalCallError("embed", error);
    }
  }
}
