// =============================================================================
// AiSdkDocumentSummaryAdapter — Document summaries through any AI SDK model
// =============================================================================

import type { LanguageModel } from "ai";
import { generateText } from "ai";

import type {
  DocumentSummaryPort,
  DocumentSummaryRequest,
  DocumentSummaryResult,
} from "../../ports/document-summary.port.js";
import { toExternalCallError } from "../provider-errors.js";

export interface AiSdkDocumentSummaryOptions {
  model: LanguageModel;
  maxOutputTokens?: number;
  temperature?: number;
}

export class AiSdkDocumentSummaryAdapter implements DocumentSummaryPort {
  readonly modelId: string;
  private readonly model: LanguageModel;
  private readonly maxOutputTokens: number;
  private readonly temperature: number;

  constructor(options: AiSdkDocumentSummaryOptions) {
    this.model = options.model;
    this.modelId = typeof options.model === "string" ? options.model : options.model.modelId;
    this.maxOutputTokens = options.maxOutputTokens ?? 200;
    this.temperature = options.temperature ?? 0;
  }

  async summarize(request: DocumentSummaryRequest): Promise<DocumentSummaryResult> {
    try {
      const result = await generateText({
        model: this.model,
        // The pipeline owns retries
        maxRetries: 0,
        temperature: this.temperature,
        maxOutputTokens: this.maxOutputTokens,
        abortSignal: request.signal,
        system: request.prompt,
        prompt: `Title: ${request.title}\n\n${request.text}`,
      });

      return {
        text: result.text,
        usage: { inputTokens: result.usage.inputTokens, outputTokens: result.usage.outputTokens },
      };
    } catch (error) {
      throw toExternalCallError("caption", error);
    }
  }
}
