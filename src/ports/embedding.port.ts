// =============================================================================
// EmbeddingPort — Provider-agnostic text embedding
// =============================================================================

export interface EmbeddingResult {
  /** Float vector */
  embedding: number[];
  /** Token count consumed */
  tokenCount: number;
}

export interface EmbeddingCallOptions {
  /** Aborts the in-flight request */
  signal?: AbortSignal;
}

/**
 * Implementations throw `ExternalCallTransientError` for failures worth
 * retrying and `ExternalCallPermanentError` for everything else.
 */
export interface EmbeddingPort {
  /** Embed a single text string */
  embed(text: string, options?: EmbeddingCallOptions): Promise<EmbeddingResult>;

  /** Model identifier */
  readonly modelId: string;
}
