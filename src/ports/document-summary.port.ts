// =============================================================================
// DocumentSummaryPort — One short description of a whole document
// =============================================================================

export interface DocumentSummaryRequest {
  title: string;
  /** Leading text of the document, already truncated */
  text: string;
  prompt: string;
  signal?: AbortSignal;
}

export interface DocumentSummaryResult {
  text: string;
  usage?: { inputTokens?: number; outputTokens?: number };
}

/**
 * Errors follow the captioning port: `ExternalCallTransientError` for
 * timeouts and rate limits, `ExternalCallPermanentError` otherwise.
 */
export interface DocumentSummaryPort {
  summarize(request: DocumentSummaryRequest): Promise<DocumentSummaryResult>;

  readonly modelId: string;
}
