// =============================================================================
// IngestionOrchestrator — Drives one document through every stage
// =============================================================================

import type { PipelineConfig } from "../config/pipeline-config.js";
import type { NormalizedPage } from "../domain/page-stream.schema.js";
import type { DocumentOutcome, DocumentStatus, FailureReason, PageStats } from "../domain/outcome.js";
import type {
  ClassifiedPage,
  DocumentMetadata,
  EmbeddedUnit,
  Unit,
  UnitFailure,
  UnitFailureKind,
  UnitResult,
  UnitStage,
} from "../domain/units.js";
import type { CallBudgetHook } from "../graph/call-budget.js";
import { CallBudget } from "../graph/call-budget.js";
import type { WorkerPoolEvent } from "../graph/worker-pool.js";
import { TaskTimeoutError, WorkerPool } from "../graph/worker-pool.js";
import type { Logger } from "../middleware/logging.js";
import { createLogger } from "../middleware/logging.js";
import type { CaptioningPort } from "../ports/captioning.port.js";
import type { DocumentSummaryPort } from "../ports/document-summary.port.js";
import type { EmbeddingPort } from "../ports/embedding.port.js";
import type { IndexSinkPort } from "../ports/index-sink.port.js";
import type { NormalizedDocument, PageNormalizerPort } from "../ports/page-normalizer.port.js";
import {
  BudgetExhaustedError,
  CancelledError,
  CorruptDocumentError,
  EmptyDocumentError,
  FormatError,
  FormatUnsupportedError,
  OrderingViolationError,
  toError,
} from "../sdk/errors.js";
import { ComplexityClassifier } from "./complexity-classifier.js";
import { buildDocumentMetadata, documentIdFor } from "./document-metadata.js";
import { DocumentStateMachine } from "./document-state.js";
import { DocumentSummarizer } from "./document-summarizer.js";
import type { DualIndex } from "./dual-index-builder.js";
import { DualIndexBuilder, InconsistentBatchError } from "./dual-index-builder.js";
import { Embedder } from "./embedder.js";
import type { ExternalCallContext, Sleep } from "./external-call.js";
import { Extractor } from "./extractor.js";
import { emptyPageStats, formatPageStats, tallyPage } from "./page-stats.js";
import { Summarizer } from "./summarizer.js";

// =============================================================================
// Types
// =============================================================================

export interface IngestionRequest {
  bytes: Uint8Array;
  fileName: string;
  mimeType: string;
  uploader?: string;
  department?: string;
}

export interface IngestOptions {
  /** Aborting stops new external calls; in-flight ones finish or time out */
  signal?: AbortSignal;
  /**
   * Document description passed to the caption prompt. Defaults to a
   * generated summary of the document's text, or the title without one.
   */
  context?: string;
}

export interface OrchestratorDeps {
  normalizer: PageNormalizerPort;
  captioning: CaptioningPort;
  /** Enables the generated caption context; omitted, captions get the title */
  documentSummary?: DocumentSummaryPort;
  embedding: EmbeddingPort;
  sink: IndexSinkPort;
  config: PipelineConfig;
  logger?: Logger;
  /** Shared across documents; every per-document budget draws from it too */
  globalBudget?: CallBudgetHook;
  sleep?: Sleep;
  now?: () => Date;
  builder?: DualIndexBuilder;
}

interface DocumentRun {
  documentId: string;
  fileName: string;
  startedAt: number;
  log: Logger;
  machine: DocumentStateMachine;
  pageStats: PageStats;
  budget: CallBudget;
  documentSummary?: string;
}

// =============================================================================
// Orchestrator
// =============================================================================

export class IngestionOrchestrator {
  private readonly deps: OrchestratorDeps;
  private readonly logger: Logger;
  private readonly summarizer: Summarizer;
  private readonly embedder: Embedder;
  private readonly extractor: Extractor;
  private readonly documentSummarizer: DocumentSummarizer | null;
  private readonly builder: DualIndexBuilder;
  private readonly now: () => Date;

  constructor(deps: OrchestratorDeps) {
    const { config } = deps;
    this.deps = deps;
    this.logger = deps.logger ?? createLogger({ level: config.logLevel });
    this.now = deps.now ?? (() => new Date());
    this.builder = deps.builder ?? new DualIndexBuilder();
    this.extractor = new Extractor({ chunking: config.chunking, extraction: config.extraction });
    this.summarizer = new Summarizer({
      port: deps.captioning,
      config: config.summarizer,
      retry: config.retry,
      sleep: deps.sleep,
    });
    this.documentSummarizer =
      deps.documentSummary && config.documentSummary.enabled
        ? new DocumentSummarizer({
            port: deps.documentSummary,
            config: config.documentSummary,
            retry: config.retry,
            sleep: deps.sleep,
          })
        : null;
    this.embedder = new Embedder({
      port: deps.embedding,
      retry: config.retry,
      dimensions: config.models.dimensions,
      sleep: deps.sleep,
    });
  }

  /**
   * Ingest one document. Document-level failures come back as a `Failed`
   * outcome; only contract errors (an image unit embedded before it was
   * summarized) are thrown.
   */
  async ingest(request: IngestionRequest, options: IngestOptions = {}): Promise<DocumentOutcome> {
    const { config } = this.deps;
    const documentId = documentIdFor(request.bytes);
    const log = this.logger.child({ documentId });
    const run: DocumentRun = {
      documentId,
      fileName: request.fileName,
      startedAt: this.now().getTime(),
      log,
      machine: new DocumentStateMachine(log),
      pageStats: emptyPageStats(),
      budget: new CallBudget(
        { caption: config.budget.maxCaptionCalls, embed: config.budget.maxEmbeddingCalls },
        { softLimitRatio: config.budget.softLimitRatio, maxThrottleMs: config.budget.maxThrottleMs },
        this.deps.globalBudget,
      ),
    };

    log.info("document:start", {
      fileName: request.fileName,
      mimeType: request.mimeType,
      bytes: request.bytes.byteLength,
    });

    // ── Normalizing ──────────────────────────────────────────────────────
    let normalized: NormalizedDocument;
    try {
      normalized = await this.normalize(request);
      if (normalized.pages.length === 0) throw new EmptyDocumentError(request.fileName);
    } catch (error) {
      const formatError = asFormatError(error);
      return this.fail(run, formatError.reason, formatError.message);
    }

    const metadata = buildDocumentMetadata({
      documentId,
      fileName: request.fileName,
      mimeType: request.mimeType,
      pageCount: normalized.pages.length,
      producer: normalized.producer,
      uploader: request.uploader,
      department: request.department,
      ingestedAt: new Date(run.startedAt),
    });

    // ── Classifying ──────────────────────────────────────────────────────
    run.machine.advanceTo("Classifying");
    const classifier = new ComplexityClassifier(config.classifier, log);
    const { pages, producer } = normalized;
    const classified: ClassifiedPage[] = [...pages]
      .sort((a, b) => a.pageNumber - b.pageNumber)
      .map((page) => classifier.classify(documentId, withProducer(page, producer)));

    // ── Extracting ───────────────────────────────────────────────────────
    run.machine.advanceTo("Extracting");
    const units: Unit[] = [];
    for (const page of classified) {
      const pageUnits = [...this.extractor.extract(page)];
      tallyPage(run.pageStats, pageUnits);
      units.push(...pageUnits);
    }
    log.info("document:page-stats", { ...run.pageStats, table: formatPageStats(run.pageStats) });

    // ── Summarizing / Embedding ──────────────────────────────────────────
    const results = await this.processUnits(run, units, metadata, options);

    // ── Indexing ─────────────────────────────────────────────────────────
    run.machine.advanceTo("Indexing");
    let built: DualIndex;
    try {
      built = this.builder.build(documentId, metadata, results);
    } catch (error) {
      if (!(error instanceof InconsistentBatchError)) throw error;
      return this.fail(run, "inconsistent-batch", error.message, failedUnits(results));
    }
    const { batch, failures, degradedUnitIds } = built;

    try {
      await this.deps.sink.write(batch);
    } catch (error) {
      const err = toError(error);
      log.error("document:sink-error", { error: err.message });
      return this.fail(run, "sink-error", err.message, failures);
    }

    const status: DocumentStatus = failures.length > 0 ? "PartiallyCompleted" : "Completed";
    run.machine.finish(status);

    const outcome: DocumentOutcome = {
      documentId,
      fileName: request.fileName,
      status,
      history: run.machine.history,
      failures,
      degradedUnitIds,
      textEntryCount: batch.textEntries.length,
      imageEntryCount: batch.imageEntries.length,
      pageStats: run.pageStats,
      usage: run.budget.snapshot(),
      ...(run.documentSummary !== undefined ? { documentSummary: run.documentSummary } : {}),
      cancelled: options.signal?.aborted ?? false,
      durationMs: this.elapsed(run),
    };
    log.info("document:complete", {
      status,
      textEntries: outcome.textEntryCount,
      imageEntries: outcome.imageEntryCount,
      failedUnits: failures.length,
      degradedUnits: degradedUnitIds.length,
      captionCalls: outcome.usage.used.caption,
      embeddingCalls: outcome.usage.used.embed,
      tokens: outcome.usage.tokens,
      durationMs: outcome.durationMs,
    });
    return outcome;
  }

  // ===========================================================================
  // Stages
  // ===========================================================================

  private async normalize(request: IngestionRequest): Promise<NormalizedDocument> {
    const { normalizer } = this.deps;
    if (!normalizer.supports(request.mimeType)) throw new FormatUnsupportedError(request.mimeType);
    const normalized = await normalizer.normalize(request.bytes, request.mimeType);
    const duplicate = firstDuplicatePage(normalized.pages);
    if (duplicate !== undefined) throw new CorruptDocumentError(`duplicate page number ${duplicate}`);
    return normalized;
  }

  /**
   * Caption context for the document's images: the caller's, else a
   * generated summary, else the title.
   */
  private async describeDocument(
    run: DocumentRun,
    units: Unit[],
    metadata: DocumentMetadata,
    options: IngestOptions,
  ): Promise<string> {
    if (options.context !== undefined) return options.context;
    if (this.documentSummarizer === null) return metadata.title;

    const callSignal = AbortSignal.timeout(this.deps.config.concurrency.unitTimeoutMs);
    const summary = await this.documentSummarizer.summarize(metadata.title, units, {
      budget: run.budget,
      stopSignal: options.signal,
      callSignal,
      logger: run.log,
    });
    if (summary === null) return metadata.title;

    run.documentSummary = summary;
    run.log.info("document:summary", { chars: summary.length });
    return summary;
  }

  /**
   * Runs every unit on the worker pool: summary first for image units, then
   * the embedding. Units finish in any order; each settles to a result.
   */
  private async processUnits(
    run: DocumentRun,
    units: Unit[],
    metadata: DocumentMetadata,
    options: IngestOptions,
  ): Promise<UnitResult[]> {
    const { config } = this.deps;
    const { log, machine } = run;
    const pendingSummaries = new Set(units.filter((u) => u.kind === "image").map((u) => u.unitId));

    if (units.length === 0) return [];
    machine.advanceTo(pendingSummaries.size > 0 ? "Summarizing" : "Embedding");

    const summaryDone = (unitId: string) => {
      if (!pendingSummaries.delete(unitId) || pendingSummaries.size > 0) return;
      if (machine.state === "Summarizing") machine.advanceTo("Embedding");
    };

    const context = pendingSummaries.size > 0 ? await this.describeDocument(run, units, metadata, options) : metadata.title;
    const baseCtx: ExternalCallContext = { budget: run.budget, stopSignal: options.signal, logger: log };
    const stages = new Map<string, UnitStage>(
      units.map((u) => [u.unitId, u.kind === "image" ? "summarizing" : "embedding"]),
    );

    const execute = async (unit: Unit, callSignal: AbortSignal): Promise<EmbeddedUnit> => {
      const ctx = { ...baseCtx, callSignal };
      let ready: Unit = unit;
      if (unit.kind === "image") {
        try {
          ready = await this.summarizer.summarize(unit, { ...ctx, context });
        } finally {
          summaryDone(unit.unitId);
        }
      }
      stages.set(unit.unitId, "embedding");
      return this.embedder.embedUnit(ready, ctx);
    };

    const pool = new WorkerPool<Unit, EmbeddedUnit>(
      execute,
      { size: config.concurrency.workers, taskTimeoutMs: config.concurrency.unitTimeoutMs },
      (event) => logPoolEvent(log, event),
    );

    const onAbort = () => {
      log.warn("document:cancel-requested");
      pool.cancel();
    };
    if (options.signal?.aborted) pool.cancel();
    else options.signal?.addEventListener("abort", onAbort, { once: true });

    const violation: { error?: OrderingViolationError } = {};

    try {
      const settled = units.map((unit) =>
        pool.submit(unit.unitId, unit, unit.pageNumber).then(
          (value): UnitResult => ({ ok: true, value }),
          (error: unknown): UnitResult => {
            const err = toError(error);
            if (err instanceof OrderingViolationError) {
              violation.error ??= err;
              pool.cancel("Contract violation");
            }
            summaryDone(unit.unitId);
            const failure = toFailure(unit, stages.get(unit.unitId) ?? "embedding", err);
            log.error("unit:failed", { ...failure });
            return { ok: false, failure };
          },
        ),
      );
      const results = await Promise.all(settled);
      await pool.drain();

      if (violation.error) {
        log.error("document:contract-violation", { error: violation.error.message });
        machine.transition("Failed");
        throw violation.error;
      }

      machine.advanceTo("Embedding");
      return results;
    } finally {
      options.signal?.removeEventListener("abort", onAbort);
    }
  }

  // ===========================================================================
  // Outcome helpers
  // ===========================================================================

  private fail(run: DocumentRun, reason: FailureReason, message: string, failures: UnitFailure[] = []): DocumentOutcome {
    run.machine.finish("Failed");
    run.log.error("document:failed", { reason, message });

    const outcome: DocumentOutcome = {
      documentId: run.documentId,
      fileName: run.fileName,
      status: "Failed",
      reason,
      message,
      history: run.machine.history,
      failures,
      degradedUnitIds: [],
      textEntryCount: 0,
      imageEntryCount: 0,
      pageStats: run.pageStats,
      usage: run.budget.snapshot(),
      cancelled: false,
      durationMs: this.elapsed(run),
    };
    run.log.info("document:complete", {
      status: outcome.status,
      reason,
      captionCalls: outcome.usage.used.caption,
      embeddingCalls: outcome.usage.used.embed,
      tokens: outcome.usage.tokens,
      durationMs: outcome.durationMs,
    });
    return outcome;
  }

  private elapsed(run: DocumentRun): number {
    return Math.max(0, this.now().getTime() - run.startedAt);
  }
}

// =============================================================================
// Free helpers
// =============================================================================

function asFormatError(error: unknown): FormatError {
  if (error instanceof FormatError) return error;
  const err = toError(error);
  return new CorruptDocumentError(err.message, err);
}

function firstDuplicatePage(pages: readonly NormalizedPage[]): number | undefined {
  const seen = new Set<number>();
  for (const { pageNumber } of pages) {
    if (seen.has(pageNumber)) return pageNumber;
    seen.add(pageNumber);
  }
  return undefined;
}

function failedUnits(results: readonly UnitResult[]): UnitFailure[] {
  return results.flatMap((result) => (result.ok ? [] : [result.failure]));
}

/** Carry a document-level producer onto pages that do not report one. */
function withProducer(page: NormalizedPage, producer: string | undefined): NormalizedPage {
  if (page.producer !== undefined || producer === undefined) return page;
  return { ...page, producer };
}

function failureKind(error: Error): UnitFailureKind {
  if (error instanceof TaskTimeoutError) return "timeout";
  if (error instanceof CancelledError) return "cancelled";
  if (error instanceof BudgetExhaustedError) return "budget-exhausted";
  return "external-permanent";
}

function toFailure(unit: Unit, stage: UnitStage, error: Error): UnitFailure {
  return {
    unitId: unit.unitId,
    pageNumber: unit.pageNumber,
    stage,
    kind: failureKind(error),
    message: error.message,
  };
}

function logPoolEvent(log: Logger, event: WorkerPoolEvent<EmbeddedUnit>): void {
  switch (event.type) {
    case "task:timeout":
      log.warn("unit:timeout", { unitId: event.taskId });
      break;
    case "task:completed":
      log.debug("unit:indexed-ready", { unitId: event.taskId, durationMs: event.durationMs });
      break;
    case "task:late-failure":
      log.debug("unit:late-failure", { unitId: event.taskId, error: event.error.message });
      break;
    default:
      break;
  }
}
