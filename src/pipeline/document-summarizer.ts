// =============================================================================
// DocumentSummarizer — One description of the document for caption context
// =============================================================================

import type { DocumentSummaryConfig } from "../config/pipeline-config.js";
import type { Unit } from "../domain/units.js";
import type { DocumentSummaryPort } from "../ports/document-summary.port.js";
import { toError } from "../sdk/errors.js";
import type { RetryPolicy } from "../sdk/retry.js";
import { withRetry } from "../sdk/retry.js";
import type { ExternalCallContext, Sleep } from "./external-call.js";
import { acquireCall, defaultSleep } from "./external-call.js";

export interface DocumentSummarizerOptions {
  port: DocumentSummaryPort;
  config: DocumentSummaryConfig;
  retry?: RetryPolicy;
  sleep?: Sleep;
}

/** Text units joined in order and cut to `maxChars`. */
export function documentText(units: readonly Unit[], maxChars: number): string {
  const text = units
    .flatMap((unit) => (unit.kind === "text" ? [unit.text] : []))
    .join("\n\n")
    .slice(0, maxChars);
  return text.trim();
}

export class DocumentSummarizer {
  private readonly port: DocumentSummaryPort;
  private readonly config: DocumentSummaryConfig;
  private readonly retry?: RetryPolicy;
  private readonly sleep: Sleep;

  constructor(options: DocumentSummarizerOptions) {
    this.port = options.port;
    this.config = options.config;
    this.retry = options.retry;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Summarizes the document's text. Calls draw on the caption budget.
   * Resolves to null when the document has no text or no usable summary
   * came back; the caller then falls back to the title.
   */
  async summarize(title: string, units: readonly Unit[], ctx: ExternalCallContext = {}): Promise<string | null> {
    const text = documentText(units, this.config.maxInputChars);
    if (text.length === 0) return null;

    let summary: string;
    try {
      summary = await withRetry(() => this.summarizeOnce(title, text, ctx), {
        ...this.retry,
        signal: ctx.stopSignal,
        sleep: this.sleep,
        onRetry: (error, attempt, delayMs) =>
          ctx.logger?.warn("document:summary-retry", { attempt, delayMs, error: error.message }),
      });
    } catch (error) {
      ctx.logger?.warn("document:summary-fallback", { reason: toError(error).message });
      return null;
    }

    if (summary.length === 0) {
      ctx.logger?.warn("document:summary-fallback", { reason: "empty-summary" });
      return null;
    }
    return summary;
  }

  private async summarizeOnce(title: string, text: string, ctx: ExternalCallContext): Promise<string> {
    await acquireCall("caption", ctx, this.sleep);

    const result = await this.port.summarize({ title, text, prompt: this.config.prompt, signal: ctx.callSignal });

    const tokens = (result.usage?.inputTokens ?? 0) + (result.usage?.outputTokens ?? 0);
    ctx.budget?.record("caption", tokens);
    return result.text.trim();
  }
}
