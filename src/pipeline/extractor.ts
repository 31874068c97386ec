// =============================================================================
// Extractor — Classified page → text and image units
// =============================================================================

import type { ChunkingConfig, ExtractionConfig } from "../config/pipeline-config.js";
import { pageText } from "../domain/page-stream.schema.js";
import type { RasterImage } from "../domain/page-stream.schema.js";
import type { ClassifiedPage, ImageUnit, TextUnit, Unit } from "../domain/units.js";
import { renderTableMarkdown, splitText } from "./text-splitter.js";

export const unitIds = {
  wholePage: (page: number) => `p${page}-page`,
  text: (page: number, index: number) => `p${page}-t${index}`,
  table: (page: number, index: number) => `p${page}-tbl${index}`,
  image: (page: number, index: number) => `p${page}-img${index}`,
};

export interface ExtractorOptions {
  chunking: ChunkingConfig;
  extraction: ExtractionConfig;
}

export class Extractor {
  private readonly options: ExtractorOptions;

  constructor(options: ExtractorOptions) {
    this.options = options;
  }

  /**
   * Units of one page, produced lazily. Each iteration of the returned
   * iterable starts over and yields the same units with the same ids.
   */
  extract(classified: ClassifiedPage): Iterable<Unit> {
    const options = this.options;
    return {
      [Symbol.iterator]: () =>
        classified.classification.complexity === "complex"
          ? wholePageUnits(classified)
          : simplePageUnits(classified, options),
    };
  }
}

function* wholePageUnits({ documentId, page }: ClassifiedPage): Generator<Unit> {
  const unit: ImageUnit = {
    kind: "image",
    documentId,
    pageNumber: page.pageNumber,
    unitId: unitIds.wholePage(page.pageNumber),
    ordinal: 0,
    variant: "whole-page",
    image: page.raster,
    summary: null,
  };
  yield unit;
}

/** Images without a bounding box are kept; their size is unknown. */
export function isInsignificantImage(image: RasterImage, minDimension: number): boolean {
  if (image.bbox === undefined) return false;
  const { x0, y0, x1, y1 } = image.bbox;
  return Math.abs(x1 - x0) < minDimension || Math.abs(y1 - y0) < minDimension;
}

function* simplePageUnits({ documentId, page }: ClassifiedPage, { chunking, extraction }: ExtractorOptions): Generator<Unit> {
  const { pageNumber } = page;
  let ordinal = 0;

  const chunks = splitText(pageText(page), chunking);
  for (const [index, chunk] of chunks.entries()) {
    const unit: TextUnit = {
      kind: "text",
      documentId,
      pageNumber,
      unitId: unitIds.text(pageNumber, index),
      ordinal: ordinal++,
      text: chunk.text,
      provenance: { kind: "body", start: chunk.start, end: chunk.end },
    };
    yield unit;
  }

  for (const [tableIndex, table] of page.tables.entries()) {
    const markdown = renderTableMarkdown(table);
    if (markdown === null) continue;
    const unit: TextUnit = {
      kind: "text",
      documentId,
      pageNumber,
      unitId: unitIds.table(pageNumber, tableIndex),
      ordinal: ordinal++,
      text: markdown,
      provenance: { kind: "table", tableIndex },
    };
    yield unit;
  }

  // Ids keep the image's position on the page, so skipped images leave gaps
  for (const [index, image] of page.images.entries()) {
    if (isInsignificantImage(image, extraction.minImageDimension)) continue;
    const unit: ImageUnit = {
      kind: "image",
      documentId,
      pageNumber,
      unitId: unitIds.image(pageNumber, index),
      ordinal: ordinal++,
      variant: "discrete",
      image,
      summary: null,
    };
    yield unit;
  }
}
