// =============================================================================
// ComplexityClassifier — Decide per page: structured extraction or one image
// =============================================================================

import type { ClassifierConfig } from "../config/pipeline-config.js";
import type { BoundingBox, NormalizedPage, PageLayout } from "../domain/page-stream.schema.js";
import { pageText } from "../domain/page-stream.schema.js";
import type { ClassifiedPage, ComplexityReason, PageClassification } from "../domain/units.js";
import type { Logger } from "../middleware/logging.js";
import { defaultClassification } from "./fallbacks.js";

// U+FFFD and C0/C1 controls other than tab, newline, carriage return
const GARBLED_CHAR = /[\uFFFD\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F]/g;

export class ComplexityClassifier {
  private readonly config: ClassifierConfig;
  private readonly logger?: Logger;

  constructor(config: ClassifierConfig, logger?: Logger) {
    this.config = config;
    this.logger = logger;
  }

  /**
   * Classify a page once. The returned object is frozen; later stages read
   * the classification and never recompute it.
   */
  classify(documentId: string, page: NormalizedPage): ClassifiedPage {
    const classification = this.decide(page);

    if (classification.defaulted) {
      this.logger?.warn("page:classification-default", {
        pageNumber: page.pageNumber,
        reasons: classification.reasons,
      });
    } else {
      this.logger?.debug("page:classified", {
        pageNumber: page.pageNumber,
        complexity: classification.complexity,
        reasons: classification.reasons,
      });
    }

    return Object.freeze({ documentId, page, classification });
  }

  /** Pure decision; depends only on the page and the configuration. */
  decide(page: NormalizedPage): PageClassification {
    if (!page.layout) return defaultClassification("missing-layout");

    const { layout } = page;
    const text = pageText(page);
    const reasons: ComplexityReason[] = [];

    if (this.isPresentationExport(page.producer)) reasons.push("presentation-export");
    if (layout.width > layout.height * this.config.landscapeRatio) reasons.push("landscape");
    if (imageAreaRatio(page.images, layout) > this.config.maxImageAreaRatio) reasons.push("visual-density");

    const visualElements = layout.drawings.verticalLines + layout.drawings.curves + page.images.length;
    if (visualElements >= this.config.maxVisualElements) reasons.push("visual-elements");

    const visibleChars = text.replace(/\s+/g, "").length;
    if (visibleChars === 0 && page.images.length > 0) reasons.push("image-only");

    if (overlapRatio(page.spans.flatMap((s) => (s.bbox ? [s.bbox] : []))) > this.config.maxOverlapRatio) {
      reasons.push("overlapping-layout");
    }

    if (visibleChars > 0) {
      const pageUnits = (layout.width * layout.height) / 10_000;
      if (visibleChars / pageUnits < this.config.minTextDensity) reasons.push("sparse-text");

      const garbled = text.match(GARBLED_CHAR)?.length ?? 0;
      if (garbled / visibleChars > this.config.maxGarbledRatio) reasons.push("garbled-text");
    }

    const classification: PageClassification = {
      complexity: reasons.length > 0 ? "complex" : "simple",
      reasons,
      defaulted: false,
    };
    return Object.freeze(classification);
  }

  private isPresentationExport(producer: string | undefined): boolean {
    if (!producer) return false;
    return this.config.presentationProducers.some((p) => producer.includes(p));
  }
}

// =============================================================================
// Geometry helpers
// =============================================================================

function area(b: BoundingBox): number {
  return Math.max(0, b.x1 - b.x0) * Math.max(0, b.y1 - b.y0);
}

function clip(b: BoundingBox, layout: PageLayout): BoundingBox {
  return {
    x0: Math.max(0, b.x0),
    y0: Math.max(0, b.y0),
    x1: Math.min(layout.width, b.x1),
    y1: Math.min(layout.height, b.y1),
  };
}

/** Images without a bounding box contribute nothing. */
export function imageAreaRatio(images: NormalizedPage["images"], layout: PageLayout): number {
  let total = 0;
  for (const image of images) {
    if (image.bbox) total += area(clip(image.bbox, layout));
  }
  return Math.min(1, total / (layout.width * layout.height));
}

function intersects(a: BoundingBox, b: BoundingBox): boolean {
  return Math.min(a.x1, b.x1) > Math.max(a.x0, b.x0) && Math.min(a.y1, b.y1) > Math.max(a.y0, b.y0);
}

/** Fraction of boxes that intersect at least one other box. */
export function overlapRatio(boxes: BoundingBox[]): number {
  if (boxes.length < 2) return 0;
  let overlapping = 0;
  for (let i = 0; i < boxes.length; i++) {
    for (let j = 0; j < boxes.length; j++) {
      if (i !== j && intersects(boxes[i], boxes[j])) {
        overlapping++;
        break;
      }
    }
  }
  return overlapping / boxes.length;
}
