// =============================================================================
// CaptioningPort — Vision-to-text over a single image
// =============================================================================

import type { ImageType } from "../domain/image-description.schema.js";

export interface CaptionRequest {
  image: Uint8Array;
  mimeType: string;
  /** Instruction for the vision model */
  prompt: string;
  /** Describes the surrounding document, appended to the prompt */
  context?: string;
  signal?: AbortSignal;
}

export interface CaptionResult {
  imageType: ImageType;
  /** May be blank for decorative image types */
  text: string;
  usage?: { inputTokens?: number; outputTokens?: number };
}

/**
 * Implementations throw `ExternalCallTransientError` for timeouts and rate
 * limits and `ExternalCallPermanentError` for rejected payloads.
 */
export interface CaptioningPort {
  caption(request: CaptionRequest): Promise<CaptionResult>;

  readonly modelId: string;
}
