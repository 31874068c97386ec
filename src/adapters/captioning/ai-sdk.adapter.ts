// =============================================================================
// AiSdkCaptioningAdapter — Typed image descriptions through any AI SDK model
// =============================================================================

import type { LanguageModel } from "ai";
import { generateObject } from "ai";

import { ImageDescriptionSchema } from "../../domain/image-description.schema.js";
import type { CaptioningPort, CaptionRequest, CaptionResult } from "../../ports/captioning.port.js";
import { toExternalCallError } from "../provider-errors.js";

export interface AiSdkCaptioningOptions {
  model: LanguageModel;
  /** Upper bound on caption length */
  maxOutputTokens?: number;
  temperature?: number;
}

export class AiSdkCaptioningAdapter implements CaptioningPort {
  readonly modelId: string;
  private readonly model: LanguageModel;
  private readonly maxOutputTokens?: number;
  private readonly temperature: number;

  constructor(options: AiSdkCaptioningOptions) {
    this.model = options.model;
    this.modelId = typeof options.model === "string" ? options.model : options.model.modelId;
    this.maxOutputTokens = options.maxOutputTokens;
    this.temperature = options.temperature ?? 0;
  }

  async caption(request: CaptionRequest): Promise<CaptionResult> {
    try {
      const result = await generateObject({
        model: this.model,
        schema: ImageDescriptionSchema,
        schemaName: "ImageDescription",
        // The pipeline owns retries
        maxRetries: 0,
        temperature: this.temperature,
        maxOutputTokens: this.maxOutputTokens,
        abortSignal: request.signal,
        messages: [
          {
            role: "user",
            content: [
              { type: "text", text: buildPrompt(request) },
              { type: "image", image: request.image, mediaType: request.mimeType },
            ],
          },
        ],
      });

      return {
        imageType: result.object.imageType,
        text: result.object.description,
        usage: {
          inputTokens: result.usage.inputTokens,
          outputTokens: result.usage.outputTokens,
        },
      };
    } catch (error) {
      throw toExternalCallError("caption", error);
    }
  }
}

export function buildPrompt(request: Pick<CaptionRequest, "prompt" | "context">): string {
  const context = request.context?.trim();
  return context ? `${request.prompt}\n\nDocument context: ${context}` : request.prompt;
}
