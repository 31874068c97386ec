// =============================================================================
// Degradation policy — Keep content present when a stage cannot do better
// =============================================================================

import type { ComplexityReason, ImageSummary, PageClassification } from "../domain/units.js";

/**
 * A page whose layout metadata is missing is indexed as one whole-page image
 * rather than guessed at or dropped.
 */
export function defaultClassification(reason: ComplexityReason = "missing-layout"): PageClassification {
  const classification: PageClassification = { complexity: "complex", reasons: [reason], defaulted: true };
  return Object.freeze(classification);
}

/**
 * Summary used when captioning could not produce text. The reason is kept
 * for the outcome report; the text itself is the same for every unit so it
 * stays deterministic.
 */
export function fallbackSummary(fallbackText: string, reason: string): ImageSummary {
  return { text: fallbackText, status: "unsummarized", reason };
}
