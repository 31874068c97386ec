// =============================================================================
// pagefold — Assemble a ready-to-run ingestion pipeline
// =============================================================================
//
// Quickstart:
//   const pipeline = createIngestionPipeline({ sink: new JsonlIndexSink({ directory: "./index" }) })
//   const outcome = await pipeline.ingest({ bytes, fileName: "report.pages.json", mimeType: PAGE_STREAM_MIME_TYPE })
//
// =============================================================================

import { AiSdkCaptioningAdapter } from "./adapters/captioning/ai-sdk.adapter.js";
import { AiSdkDocumentSummaryAdapter } from "./adapters/document-summary/ai-sdk.adapter.js";
import { AiSdkEmbeddingAdapter } from "./adapters/embedding/ai-sdk.adapter.js";
import { JsonPageStreamNormalizer } from "./adapters/normalizer/json-page-stream.adapter.js";
import { NormalizerRegistry } from "./adapters/normalizer/registry.js";
import type { PipelineConfig, PipelineConfigInput } from "./config/pipeline-config.js";
import { loadPipelineConfig } from "./config/pipeline-config.js";
import type { CallBudgetHook } from "./graph/call-budget.js";
import type { Logger } from "./middleware/logging.js";
import { createLogger } from "./middleware/logging.js";
import { IngestionOrchestrator } from "./pipeline/orchestrator.js";
import type { CaptioningPort } from "./ports/captioning.port.js";
import type { DocumentSummaryPort } from "./ports/document-summary.port.js";
import type { EmbeddingPort } from "./ports/embedding.port.js";
import type { IndexSinkPort } from "./ports/index-sink.port.js";
import type { PageNormalizerPort } from "./ports/page-normalizer.port.js";
import { createOpenAIModels } from "./providers/openai.js";

export interface IngestionPipelineOptions {
  sink: IndexSinkPort;
  /** Layered over `PAGEFOLD_*` environment variables */
  config?: PipelineConfigInput;
  env?: Record<string, string | undefined>;
  /** Consulted in order; the JSON page-stream normalizer is always last */
  normalizers?: PageNormalizerPort[];
  /** Defaults to the configured OpenAI caption model */
  captioning?: CaptioningPort;
  /** Defaults to the caption model when `captioning` is defaulted too; otherwise captions get the title */
  documentSummary?: DocumentSummaryPort;
  /** Defaults to the configured OpenAI embedding model */
  embedding?: EmbeddingPort;
  logger?: Logger;
  globalBudget?: CallBudgetHook;
}

export type IngestionPipeline = IngestionOrchestrator & { readonly config: PipelineConfig };

export function createIngestionPipeline(options: IngestionPipelineOptions): IngestionPipeline {
  const config = loadPipelineConfig(options.env ?? process.env, options.config);
  const normalizer = new NormalizerRegistry([...(options.normalizers ?? []), new JsonPageStreamNormalizer()]);

  let { captioning, embedding, documentSummary } = options;
  if (!captioning || !embedding) {
    const models = createOpenAIModels(config.models);
    if (!captioning) {
      captioning = new AiSdkCaptioningAdapter({ model: models.captionModel });
      documentSummary ??= new AiSdkDocumentSummaryAdapter({ model: models.captionModel });
    }
    embedding ??= new AiSdkEmbeddingAdapter({ model: models.embeddingModel, dimensions: config.models.dimensions });
  }

  const orchestrator = new IngestionOrchestrator({
    normalizer,
    captioning,
    documentSummary,
    embedding,
    sink: options.sink,
    config,
    logger: options.logger ?? createLogger({ level: config.logLevel }),
    globalBudget: options.globalBudget,
  });
  return Object.assign(orchestrator, { config });
}
