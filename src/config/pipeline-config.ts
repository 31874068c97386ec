// =============================================================================
// Pipeline Config — Every tunable threshold, validated with zod
// =============================================================================

import { z } from "zod";
import { ConfigError } from "../sdk/errors.js";

export const ClassifierConfigSchema = z.object({
  /** Summed image area / page area above which the page is complex */
  maxImageAreaRatio: z.number().min(0).max(1).default(0.5),
  /** Vertical lines + curves + images at or above which the page is complex */
  maxVisualElements: z.number().int().positive().default(9),
  /** width > height * ratio marks a landscape page */
  landscapeRatio: z.number().positive().default(1.2),
  /** Fraction of text spans overlapping another span above which layout is irregular */
  maxOverlapRatio: z.number().min(0).max(1).default(0.2),
  /** Characters per 10 000 square points below which non-empty text is too sparse */
  minTextDensity: z.number().nonnegative().default(0.2),
  /** Fraction of replacement/control characters above which text is garbled */
  maxGarbledRatio: z.number().min(0).max(1).default(0.3),
  /** Producer substrings that mark a presentation export */
  presentationProducers: z.array(z.string()).default(["PowerPoint", "Keynote", "Impress"]),
});
export type ClassifierConfig = z.infer<typeof ClassifierConfigSchema>;

export const ChunkingConfigSchema = z.object({
  chunkSize: z.number().int().positive().default(1000),
  /** A boundary cut is only taken if it leaves at least this many characters */
  minChunkSize: z.number().int().nonnegative().default(200),
  /** Boundary preference, highest priority first */
  separators: z.array(z.string().min(1)).default(["\n\n", ".\n", ". ", "。", "! ", "? ", "\n", ", ", " "]),
}).refine((c) => c.minChunkSize <= c.chunkSize, {
  message: "minChunkSize must not exceed chunkSize",
  path: ["minChunkSize"],
});
export type ChunkingConfig = z.infer<typeof ChunkingConfigSchema>;

export const ExtractionConfigSchema = z.object({
  /** Discrete images narrower or shorter than this (in points) are dropped as noise */
  minImageDimension: z.number().nonnegative().default(1),
});
export type ExtractionConfig = z.infer<typeof ExtractionConfigSchema>;

export const RetryConfigSchema = z.object({
  maxRetries: z.number().int().nonnegative().default(3),
  backoff: z.enum(["fixed", "linear", "exponential"]).default("exponential"),
  baseDelayMs: z.number().nonnegative().default(500),
  maxDelayMs: z.number().nonnegative().default(10_000),
  jitter: z.number().min(0).max(1).default(0.1),
});
export type RetryConfig = z.infer<typeof RetryConfigSchema>;

export const ConcurrencyConfigSchema = z.object({
  /** Units processed in parallel; size it to the provider's rate limit */
  workers: z.number().int().positive().default(8),
  /** Upper bound for one unit's caption + embed lifecycle */
  unitTimeoutMs: z.number().int().positive().default(120_000),
});
export type ConcurrencyConfig = z.infer<typeof ConcurrencyConfigSchema>;

export const BudgetConfigSchema = z.object({
  maxCaptionCalls: z.number().int().positive().default(500),
  maxEmbeddingCalls: z.number().int().positive().default(5_000),
  /** Fraction of a budget after which calls are throttled */
  softLimitRatio: z.number().min(0).max(1).default(0.8),
  /** Delay applied at the hard limit; scaled linearly from the soft limit */
  maxThrottleMs: z.number().int().nonnegative().default(2_000),
});
export type BudgetConfig = z.infer<typeof BudgetConfigSchema>;

export const SummarizerConfigSchema = z.object({
  prompt: z
    .string()
    .default(
      "Classify this image from a document as icon, shape, logo, picture or information, then describe it " +
        "without losing information. For information (documents, tables, charts, diagrams) write down all " +
        "visible text, numbers and dates and render tables as Markdown. Describe a picture in detail. " +
        "Leave the description empty for an icon, shape or logo.",
    ),
  fallbackText: z.string().min(1).default("[unsummarized image]"),
});
export type SummarizerConfig = z.infer<typeof SummarizerConfigSchema>;

export const DocumentSummaryConfigSchema = z.object({
  /** Summarize the document's text once and pass it to every caption call as context */
  enabled: z.boolean().default(true),
  prompt: z
    .string()
    .default(
      "Summarize what this document is about in at most three sentences. " +
        "Name its subject, its audience and the kind of figures it is likely to contain.",
    ),
  /** Leading characters of the document text sent to the model */
  maxInputChars: z.number().int().positive().default(12_000),
});
export type DocumentSummaryConfig = z.infer<typeof DocumentSummaryConfigSchema>;

export const ModelConfigSchema = z.object({
  provider: z.literal("openai").default("openai"),
  apiKey: z.string().optional(),
  baseURL: z.string().url().optional(),
  captionModel: z.string().default("gpt-4o-mini"),
  embeddingModel: z.string().default("text-embedding-3-small"),
  dimensions: z.number().int().positive().optional(),
});
export type ModelConfig = z.infer<typeof ModelConfigSchema>;

export const PipelineConfigSchema = z.object({
  classifier: ClassifierConfigSchema.default({}),
  chunking: ChunkingConfigSchema.default({}),
  extraction: ExtractionConfigSchema.default({}),
  retry: RetryConfigSchema.default({}),
  concurrency: ConcurrencyConfigSchema.default({}),
  budget: BudgetConfigSchema.default({}),
  summarizer: SummarizerConfigSchema.default({}),
  documentSummary: DocumentSummaryConfigSchema.default({}),
  models: ModelConfigSchema.default({}),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
});
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

export function parsePipelineConfig(input: PipelineConfigInput = {}): PipelineConfig {
  return validateConfig(input);
}

function validateConfig(input: unknown): PipelineConfig {
  const result = PipelineConfigSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigError(issue?.message ?? "invalid configuration", issue?.path.join("."));
  }
  return result.data;
}

// =============================================================================
// Environment
// =============================================================================

type Env = Record<string, string | undefined>;

const ENV_NUMBER_KEYS = {
  PAGEFOLD_CHUNK_SIZE: ["chunking", "chunkSize"],
  PAGEFOLD_MIN_CHUNK_SIZE: ["chunking", "minChunkSize"],
  PAGEFOLD_MIN_IMAGE_DIMENSION: ["extraction", "minImageDimension"],
  PAGEFOLD_MAX_IMAGE_AREA_RATIO: ["classifier", "maxImageAreaRatio"],
  PAGEFOLD_MAX_VISUAL_ELEMENTS: ["classifier", "maxVisualElements"],
  PAGEFOLD_LANDSCAPE_RATIO: ["classifier", "landscapeRatio"],
  PAGEFOLD_MAX_RETRIES: ["retry", "maxRetries"],
  PAGEFOLD_RETRY_BASE_DELAY_MS: ["retry", "baseDelayMs"],
  PAGEFOLD_WORKERS: ["concurrency", "workers"],
  PAGEFOLD_UNIT_TIMEOUT_MS: ["concurrency", "unitTimeoutMs"],
  PAGEFOLD_MAX_CAPTION_CALLS: ["budget", "maxCaptionCalls"],
  PAGEFOLD_MAX_EMBEDDING_CALLS: ["budget", "maxEmbeddingCalls"],
  PAGEFOLD_EMBEDDING_DIMENSIONS: ["models", "dimensions"],
} as const;

type Section = (typeof ENV_NUMBER_KEYS)[keyof typeof ENV_NUMBER_KEYS][0];

function readNumber(env: Env, key: string): number | undefined {
  const raw = env[key]?.trim();
  if (!raw) return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new ConfigError(`expected a number, got "${raw}"`, key);
  return n;
}

function readString(env: Env, key: string): string | undefined {
  const raw = env[key]?.trim();
  return raw ? raw : undefined;
}

/**
 * Builds the configuration from `PAGEFOLD_*` variables layered over
 * `overrides`. Unset variables leave the schema defaults in place.
 */
export function loadPipelineConfig(env: Env = process.env, overrides: PipelineConfigInput = {}): PipelineConfig {
  const sections: Record<Section, Record<string, unknown>> = {
    chunking: { ...overrides.chunking },
    extraction: { ...overrides.extraction },
    classifier: { ...overrides.classifier },
    retry: { ...overrides.retry },
    concurrency: { ...overrides.concurrency },
    budget: { ...overrides.budget },
    models: { ...overrides.models },
  };

  for (const [key, [section, field]] of Object.entries(ENV_NUMBER_KEYS)) {
    const value = readNumber(env, key);
    if (value !== undefined) sections[section][field] = value;
  }

  const producers = readString(env, "PAGEFOLD_PRESENTATION_PRODUCERS");
  if (producers) {
    sections.classifier.presentationProducers = producers
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean);
  }

  const summary = readString(env, "PAGEFOLD_DOCUMENT_SUMMARY")?.toLowerCase();
  const documentSummary = summary === undefined ? overrides.documentSummary : { ...overrides.documentSummary, enabled: readFlag(summary) };

  const models = sections.models;
  models.apiKey = readString(env, "OPENAI_API_KEY") ?? models.apiKey;
  models.baseURL = readString(env, "OPENAI_BASE_URL") ?? models.baseURL;
  models.captionModel = readString(env, "PAGEFOLD_CAPTION_MODEL") ?? models.captionModel;
  models.embeddingModel = readString(env, "PAGEFOLD_EMBEDDING_MODEL") ?? models.embeddingModel;

  return validateConfig({
    ...overrides,
    ...sections,
    documentSummary,
    logLevel: readLogLevel(env) ?? overrides.logLevel,
  });
}

function readFlag(raw: string): boolean {
  if (["1", "true", "on", "yes"].includes(raw)) return true;
  if (["0", "false", "off", "no"].includes(raw)) return false;
  throw new ConfigError(`expected a boolean, got "${raw}"`, "PAGEFOLD_DOCUMENT_SUMMARY");
}

function readLogLevel(env: Env): PipelineConfig["logLevel"] | undefined {
  const raw = readString(env, "PAGEFOLD_LOG_LEVEL")?.toLowerCase();
  if (raw === undefined) return undefined;
  const parsed = PipelineConfigSchema.shape.logLevel.safeParse(raw);
  if (!parsed.success) throw new ConfigError(`unknown log level "${raw}"`, "PAGEFOLD_LOG_LEVEL");
  return parsed.data;
}
