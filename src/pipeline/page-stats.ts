// =============================================================================
// Page statistics — Pages counted by has-text × has-images
// =============================================================================

import type { PageStats } from "../domain/outcome.js";
import type { Unit } from "../domain/units.js";

export function emptyPageStats(): PageStats {
  return { textAndImages: 0, textOnly: 0, imagesOnly: 0, empty: 0 };
}

/** Count one page by the units extracted from it. A complex page counts as images only. */
export function tallyPage(stats: PageStats, units: Iterable<Unit>): void {
  let hasText = false;
  let hasImages = false;
  for (const unit of units) {
    if (unit.kind === "text") hasText = true;
    else hasImages = true;
  }

  if (hasText && hasImages) stats.textAndImages++;
  else if (hasText) stats.textOnly++;
  else if (hasImages) stats.imagesOnly++;
  else stats.empty++;
}

const CELL = 18;

function row(label: string, left: number | string, right: number | string): string {
  return `| ${label.padEnd(CELL)} | ${String(left).padStart(CELL)} | ${String(right).padStart(CELL)} |`;
}

/** Markdown grid for the log. */
export function formatPageStats(stats: PageStats): string {
  return [
    `| ${"".padEnd(CELL)} | ${"Has Images".padEnd(CELL)} | ${"No Images".padEnd(CELL)} |`,
    `|${"-".repeat(CELL + 2)}|${"-".repeat(CELL + 2)}|${"-".repeat(CELL + 2)}|`,
    row("Has Text", stats.textAndImages, stats.textOnly),
    row("No Text", stats.imagesOnly, stats.empty),
  ].join("\n");
}
