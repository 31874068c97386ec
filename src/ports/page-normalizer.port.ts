// =============================================================================
// PageNormalizerPort — Document bytes → ordered page artifacts
// =============================================================================

import type { NormalizedPage } from "../domain/page-stream.schema.js";

export interface NormalizedDocument {
  pages: NormalizedPage[];
  /** Producer/creator reported by the source file */
  producer?: string;
}

/**
 * Throws `FormatUnsupportedError` for MIME types it cannot read and
 * `CorruptDocumentError` for bytes it cannot parse.
 */
export interface PageNormalizerPort {
  supports(mimeType: string): boolean;

  normalize(bytes: Uint8Array, mimeType: string): Promise<NormalizedDocument>;
}
