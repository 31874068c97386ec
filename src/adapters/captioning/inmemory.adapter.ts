// =============================================================================
// InMemoryCaptioningAdapter — Scriptable captions for tests
// =============================================================================

import type { ImageDescription } from "../../domain/image-description.schema.js";
import type { CaptioningPort, CaptionRequest, CaptionResult } from "../../ports/captioning.port.js";
import { abortableSleep } from "../../sdk/retry.js";

/** A bare string is a description of a `picture` */
export type InMemoryCaption = string | ImageDescription;

export interface InMemoryCaptioningOptions {
  modelId?: string;
  /** Produces the caption; may throw to simulate provider errors */
  captionFn?: (request: CaptionRequest, call: number) => InMemoryCaption | Promise<InMemoryCaption>;
  /** Simulated latency per call; honours the request's abort signal */
  latencyMs?: number;
}

export class InMemoryCaptioningAdapter implements CaptioningPort {
  readonly modelId: string;
  /** Every request received, in call order */
  readonly requests: CaptionRequest[] = [];
  private readonly captionFn: (request: CaptionRequest, call: number) => InMemoryCaption | Promise<InMemoryCaption>;
  private readonly latencyMs: number;

  constructor(options?: InMemoryCaptioningOptions) {
    this.modelId = options?.modelId ?? "inmemory-vision";
    this.captionFn = options?.captionFn ?? ((request) => `Image of ${request.image.byteLength} bytes (${request.mimeType})`);
    this.latencyMs = options?.latencyMs ?? 0;
  }

  async caption(request: CaptionRequest): Promise<CaptionResult> {
    this.requests.push(request);
    const call = this.requests.length;
    if (this.latencyMs > 0) await abortableSleep(this.latencyMs, request.signal);
    const reply = await this.captionFn(request, call);
    const { imageType, description } = typeof reply === "string" ? { imageType: "picture" as const, description: reply } : reply;
    return { imageType, text: description, usage: { inputTokens: 0, outputTokens: Math.ceil(description.length / 4) } };
  }
}
