// =============================================================================
// IndexSinkPort — Receives one complete dual-index batch per document
// =============================================================================

import type { IndexBatch } from "../domain/units.js";

export interface IndexSinkPort {
  /**
   * Persist a document's text and image entries. Called at most once per
   * document, with both collections already validated against each other.
   */
  write(batch: IndexBatch): Promise<void>;
}
