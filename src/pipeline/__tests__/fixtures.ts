import type { PipelineConfig, PipelineConfigInput } from '../../config/pipeline-config.js';
import { parsePipelineConfig } from '../../config/pipeline-config.js';
import type { NormalizedPage, RasterImage } from '../../domain/page-stream.schema.js';
import type {
  DocumentMetadata,
  ImageUnit,
  SummarizedImageUnit,
  TextUnit,
  UnitResult,
} from '../../domain/units.js';

export const noSleep = (): Promise<void> => Promise.resolve();

export const LAYOUT = {
  width: 600,
  height: 800,
  drawings: { curves: 0, verticalLines: 0, horizontalLines: 0, rects: 0 },
};

export function raster(bytes: number[] = [0x89, 0x50, 0x4e, 0x47], mimeType = 'image/png'): RasterImage {
  return { data: new Uint8Array(bytes), mimeType };
}

export function makePage(pageNumber: number, overrides: Partial<NormalizedPage> = {}): NormalizedPage {
  return {
    pageNumber,
    spans: [],
    images: [],
    tables: [],
    raster: raster([0xff, pageNumber]),
    layout: LAYOUT,
    ...overrides,
  };
}

export function textPage(pageNumber: number, text: string, overrides: Partial<NormalizedPage> = {}): NormalizedPage {
  return makePage(pageNumber, { spans: [{ text }], ...overrides });
}

export function testConfig(overrides: PipelineConfigInput = {}): PipelineConfig {
  return parsePipelineConfig({
    chunking: { chunkSize: 40, minChunkSize: 10 },
    retry: { maxRetries: 2, baseDelayMs: 0, jitter: 0 },
    ...overrides,
  });
}

export const DOC_ID = 'doc-0001';

export const METADATA: DocumentMetadata = {
  documentId: DOC_ID,
  fileName: 'handbook.pages.json',
  title: 'handbook.pages',
  mimeType: 'application/vnd.pagefold.pages+json',
  uploader: 'default',
  department: 'default',
  pageCount: 2,
  ingestedAt: '2026-01-01T00:00:00.000Z',
};

export function textUnit(pageNumber: number, index: number, text: string, ordinal = index): TextUnit {
  return {
    kind: 'text',
    documentId: DOC_ID,
    pageNumber,
    unitId: `p${pageNumber}-t${index}`,
    ordinal,
    text,
    provenance: { kind: 'body', start: 0, end: text.length },
  };
}

export function imageUnit(pageNumber: number, index: number, ordinal = index): ImageUnit {
  return {
    kind: 'image',
    documentId: DOC_ID,
    pageNumber,
    unitId: `p${pageNumber}-img${index}`,
    ordinal,
    variant: 'discrete',
    image: raster([pageNumber, index]),
    summary: null,
  };
}

export function summarized(unit: ImageUnit, text: string, status: 'captioned' | 'unsummarized' = 'captioned'): SummarizedImageUnit {
  return { ...unit, summary: { text, status } };
}

export function embeddedText(unit: TextUnit, vector: number[] = [1, 0, 0]): UnitResult {
  return {
    ok: true,
    value: { unit, embedding: { unitId: unit.unitId, modality: 'text', vector, tokenCount: 3 } },
  };
}

export function embeddedImage(unit: SummarizedImageUnit, vector: number[] = [0, 1, 0]): UnitResult {
  return {
    ok: true,
    value: { unit, embedding: { unitId: unit.unitId, modality: 'image-summary', vector, tokenCount: 5 } },
  };
}
