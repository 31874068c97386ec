// =============================================================================
// Summarizer — Caption image units through the vision capability
// =============================================================================

import type { SummarizerConfig } from "../config/pipeline-config.js";
import { isDecorative } from "../domain/image-description.schema.js";
import type { ImageSummary, ImageUnit, SummarizedImageUnit } from "../domain/units.js";
import type { CaptioningPort } from "../ports/captioning.port.js";
import { BudgetExhaustedError } from "../sdk/errors.js";
import type { RetryPolicy } from "../sdk/retry.js";
import { withRetry } from "../sdk/retry.js";
import type { ExternalCallContext, Sleep } from "./external-call.js";
import { acquireCall, defaultSleep } from "./external-call.js";
import { fallbackSummary } from "./fallbacks.js";

export interface SummarizeContext extends ExternalCallContext {
  /** Document description appended to the caption prompt */
  context?: string;
}

export interface SummarizerOptions {
  port: CaptioningPort;
  config: SummarizerConfig;
  retry?: RetryPolicy;
  sleep?: Sleep;
}

export class Summarizer {
  private readonly port: CaptioningPort;
  private readonly config: SummarizerConfig;
  private readonly retry?: RetryPolicy;
  private readonly sleep: Sleep;

  constructor(options: SummarizerOptions) {
    this.port = options.port;
    this.config = options.config;
    this.retry = options.retry;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Returns a copy of `unit` with `summary` set. The image payload is passed
   * through untouched. Transient failures are retried; once retries run out,
   * or the budget denies the call, the unit gets the placeholder summary.
   * Permanent failures and cancellation propagate. A blank description is
   * accepted only for decorative image types.
   */
  async summarize(unit: ImageUnit, ctx: SummarizeContext = {}): Promise<SummarizedImageUnit> {
    if (unit.summary !== null) return { ...unit, summary: unit.summary };

    let summary: ImageSummary;
    try {
      summary = await withRetry(() => this.captionOnce(unit, ctx), {
        ...this.retry,
        signal: ctx.stopSignal,
        sleep: this.sleep,
        onRetry: (error, attempt, delayMs) =>
          ctx.logger?.warn("unit:retry", { unitId: unit.unitId, stage: "summarizing", attempt, delayMs, error: error.message }),
        fallback: (error) => fallbackSummary(this.config.fallbackText, `retries-exhausted: ${error.message}`),
      });
    } catch (error) {
      if (!(error instanceof BudgetExhaustedError)) throw error;
      summary = fallbackSummary(this.config.fallbackText, "budget-exhausted");
    }

    if (summary.status === "unsummarized") {
      ctx.logger?.warn("unit:fallback-summary", { unitId: unit.unitId, reason: summary.reason });
    }
    return { ...unit, summary };
  }

  private async captionOnce(unit: ImageUnit, ctx: SummarizeContext): Promise<ImageSummary> {
    await acquireCall("caption", ctx, this.sleep);

    const result = await this.port.caption({
      image: unit.image.data,
      mimeType: unit.image.mimeType,
      prompt: this.config.prompt,
      context: ctx.context,
      signal: ctx.callSignal,
    });

    const tokens = (result.usage?.inputTokens ?? 0) + (result.usage?.outputTokens ?? 0);
    ctx.budget?.record("caption", tokens);

    const { imageType } = result;
    const text = result.text.trim();
    if (text.length > 0) return { text, status: "captioned", imageType };
    // Decorative images carry no description; their type is the caption
    if (isDecorative(imageType)) return { text: `[${imageType}]`, status: "captioned", imageType };
    return fallbackSummary(this.config.fallbackText, "empty-caption");
  }
}
