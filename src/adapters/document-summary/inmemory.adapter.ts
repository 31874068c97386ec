// =============================================================================
// InMemoryDocumentSummaryAdapter — Scriptable document summaries for tests
// =============================================================================

import type {
  DocumentSummaryPort,
  DocumentSummaryRequest,
  DocumentSummaryResult,
} from "../../ports/document-summary.port.js";

export interface InMemoryDocumentSummaryOptions {
  modelId?: string;
  /** Produces the summary; may throw to simulate provider errors */
  summarizeFn?: (request: DocumentSummaryRequest, call: number) => string | Promise<string>;
}

export class InMemoryDocumentSummaryAdapter implements DocumentSummaryPort {
  readonly modelId: string;
  readonly requests: DocumentSummaryRequest[] = [];
  private readonly summarizeFn: (request: DocumentSummaryRequest, call: number) => string | Promise<string>;

  constructor(options?: InMemoryDocumentSummaryOptions) {
    this.modelId = options?.modelId ?? "inmemory-summary";
    this.summarizeFn =
      options?.summarizeFn ?? ((request) => `${request.title}: ${request.text.split(/\s+/).slice(0, 8).join(" ")}`);
  }

  async summarize(request: DocumentSummaryRequest): Promise<DocumentSummaryResult> {
    this.requests.push(request);
    const text = await this.summarizeFn(request, this.requests.length);
    return { text, usage: { inputTokens: Math.ceil(request.text.length / 4), outputTokens: Math.ceil(text.length / 4) } };
  }
}
