// =============================================================================
// pagefold — Public API
// =============================================================================

// ─────────────────────────────────────────────────────────────────────────────
// Pipeline
// ─────────────────────────────────────────────────────────────────────────────

export { createIngestionPipeline } from "./pagefold.js";
export type { IngestionPipeline, IngestionPipelineOptions } from "./pagefold.js";
export { IngestionOrchestrator } from "./pipeline/orchestrator.js";
export type { IngestionRequest, IngestOptions, OrchestratorDeps } from "./pipeline/orchestrator.js";
export { ComplexityClassifier, imageAreaRatio, overlapRatio } from "./pipeline/complexity-classifier.js";
export { Extractor, isInsignificantImage, unitIds } from "./pipeline/extractor.js";
export type { ExtractorOptions } from "./pipeline/extractor.js";
export { splitText, renderTableMarkdown } from "./pipeline/text-splitter.js";
export type { TextChunk } from "./pipeline/text-splitter.js";
export { Summarizer } from "./pipeline/summarizer.js";
export type { SummarizeContext, SummarizerOptions } from "./pipeline/summarizer.js";
export { DocumentSummarizer, documentText } from "./pipeline/document-summarizer.js";
export type { DocumentSummarizerOptions } from "./pipeline/document-summarizer.js";
export { Embedder } from "./pipeline/embedder.js";
export type { EmbedderOptions } from "./pipeline/embedder.js";
export type { ExternalCallContext, Sleep } from "./pipeline/external-call.js";
export { DualIndexBuilder, InconsistentBatchError, entryId } from "./pipeline/dual-index-builder.js";
export type { DualIndex } from "./pipeline/dual-index-builder.js";
export { DocumentStateMachine } from "./pipeline/document-state.js";
export { defaultClassification, fallbackSummary } from "./pipeline/fallbacks.js";
export { buildDocumentMetadata, documentIdFor, titleFromFileName } from "./pipeline/document-metadata.js";
export { formatPageStats } from "./pipeline/page-stats.js";

// ─────────────────────────────────────────────────────────────────────────────
// Ports (contracts for hexagonal architecture)
// ─────────────────────────────────────────────────────────────────────────────

export type { PageNormalizerPort, NormalizedDocument } from "./ports/page-normalizer.port.js";
export type { CaptioningPort, CaptionRequest, CaptionResult } from "./ports/captioning.port.js";
export type {
  DocumentSummaryPort,
  DocumentSummaryRequest,
  DocumentSummaryResult,
} from "./ports/document-summary.port.js";
export type { EmbeddingPort, EmbeddingResult, EmbeddingCallOptions } from "./ports/embedding.port.js";
export type { IndexSinkPort } from "./ports/index-sink.port.js";
export type { VectorStorePort, VectorDocument } from "./ports/vector-store.port.js";

// ─────────────────────────────────────────────────────────────────────────────
// Adapters
// ─────────────────────────────────────────────────────────────────────────────

export { JsonPageStreamNormalizer } from "./adapters/normalizer/json-page-stream.adapter.js";
export { InMemoryNormalizer } from "./adapters/normalizer/inmemory.adapter.js";
export { NormalizerRegistry } from "./adapters/normalizer/registry.js";
export { AiSdkCaptioningAdapter } from "./adapters/captioning/ai-sdk.adapter.js";
export { InMemoryCaptioningAdapter } from "./adapters/captioning/inmemory.adapter.js";
export { AiSdkDocumentSummaryAdapter } from "./adapters/document-summary/ai-sdk.adapter.js";
export { InMemoryDocumentSummaryAdapter } from "./adapters/document-summary/inmemory.adapter.js";
export { AiSdkEmbeddingAdapter } from "./adapters/embedding/ai-sdk.adapter.js";
export { InMemoryEmbeddingAdapter, hashVector } from "./adapters/embedding/inmemory.adapter.js";
export { InMemoryVectorStore } from "./adapters/vector-store/inmemory.adapter.js";
export { InMemoryIndexSink } from "./adapters/index-sink/inmemory.adapter.js";
export { VectorStoreIndexSink } from "./adapters/index-sink/vector-store.adapter.js";
export { JsonlIndexSink, TEXT_INDEX_FILE, IMAGE_INDEX_FILE } from "./adapters/index-sink/jsonl.adapter.js";
export { toExternalCallError } from "./adapters/provider-errors.js";
export { createOpenAIModels } from "./providers/openai.js";

// ─────────────────────────────────────────────────────────────────────────────
// Domain
// ─────────────────────────────────────────────────────────────────────────────

export {
  PAGE_STREAM_MIME_TYPE,
  PageStreamSchema,
  NormalizedPageSchema,
  RasterImageSchema,
  TextSpanSchema,
  PageLayoutSchema,
  TableSchema,
  pageText,
} from "./domain/page-stream.schema.js";
export type {
  PageStream,
  NormalizedPage,
  RasterImage,
  TextSpan,
  PageLayout,
  DrawingStats,
  BoundingBox,
  Table,
} from "./domain/page-stream.schema.js";
export type * from "./domain/units.js";
export { ImageTypeSchema, ImageDescriptionSchema, isDecorative } from "./domain/image-description.schema.js";
export type { ImageType, ImageDescription } from "./domain/image-description.schema.js";
export { DOCUMENT_STAGES } from "./domain/outcome.js";
export type {
  DocumentOutcome,
  DocumentStage,
  DocumentState,
  DocumentStatus,
  FailureReason,
  PageStats,
} from "./domain/outcome.js";

// ─────────────────────────────────────────────────────────────────────────────
// Config, errors, retry, infrastructure
// ─────────────────────────────────────────────────────────────────────────────

export { PipelineConfigSchema, parsePipelineConfig, loadPipelineConfig } from "./config/pipeline-config.js";
export type {
  PipelineConfig,
  PipelineConfigInput,
  ClassifierConfig,
  ChunkingConfig,
  ExtractionConfig,
  RetryConfig,
  ConcurrencyConfig,
  BudgetConfig,
  SummarizerConfig,
  DocumentSummaryConfig,
  ModelConfig,
} from "./config/pipeline-config.js";
export * from "./sdk/errors.js";
export { withRetry, computeDelay, isTransient } from "./sdk/retry.js";
export type { RetryPolicy, RetryOptions, BackoffKind } from "./sdk/retry.js";
export { createLogger, createMemorySink, consoleSink } from "./middleware/logging.js";
export type { Logger, LogEntry, LogLevel, LogSink, LoggerOptions } from "./middleware/logging.js";
export { CallBudget } from "./graph/call-budget.js";
export type { CallBudgetHook, BudgetGrant, CallBudgetSnapshot } from "./graph/call-budget.js";
export { WorkerPool, TaskTimeoutError } from "./graph/worker-pool.js";
export type { WorkerPoolConfig, WorkerPoolEvent } from "./graph/worker-pool.js";
