// =============================================================================
// providers/openai — Caption and embedding models from @ai-sdk/openai
// =============================================================================

import { createOpenAI } from "@ai-sdk/openai";
import type { OpenAIProviderSettings } from "@ai-sdk/openai";
import type { EmbeddingModel, LanguageModel } from "ai";

import type { ModelConfig } from "../config/pipeline-config.js";

export interface OpenAIModels {
  captionModel: LanguageModel;
  embeddingModel: EmbeddingModel<string>;
}

/**
 * Build both models from the `models` config section.
 *
 * @example
 * ```ts
 * const { captionModel, embeddingModel } = createOpenAIModels(config.models);
 * const captioning = new AiSdkCaptioningAdapter({ model: captionModel });
 * ```
 */
export function createOpenAIModels(config: ModelConfig, settings: OpenAIProviderSettings = {}): OpenAIModels {
  const provider = createOpenAI({
    ...settings,
    apiKey: config.apiKey ?? settings.apiKey,
    baseURL: config.baseURL ?? settings.baseURL,
  });

  return {
    captionModel: provider(config.captionModel),
    embeddingModel: provider.textEmbeddingModel(config.embeddingModel),
  };
}
