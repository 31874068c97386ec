import { describe, it, expect } from 'vitest';
import { JsonPageStreamNormalizer } from '../json-page-stream.adapter.js';
import { PAGE_STREAM_MIME_TYPE } from '../../../domain/page-stream.schema.js';
import { CorruptDocumentError, FormatUnsupportedError } from '../../../sdk/errors.js';

const normalizer = new JsonPageStreamNormalizer();

function encode(value: unknown): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(value));
}

function page(pageNumber: number, extra: Record<string, unknown> = {}) {
  return { pageNumber, raster: { data: 'AQID' }, ...extra };
}

describe('JsonPageStreamNormalizer', () => {
  it('decodes pages and fills in defaults', async () => {
    const bytes = encode({
      pages: [
        page(1, {
          spans: [{ text: 'Hello', bbox: { x0: 0, y0: 0, x1: 50, y1: 10 } }],
          images: [{ data: 'BAUG', mimeType: 'image/jpeg' }],
          tables: [[['a', null]]],
          layout: { width: 600, height: 800 },
        }),
      ],
    });

    const { pages, producer } = await normalizer.normalize(bytes, PAGE_STREAM_MIME_TYPE);

    expect(producer).toBeUndefined();
    expect(pages).toHaveLength(1);
    expect(pages[0].raster).toEqual({ data: new Uint8Array([1, 2, 3]), mimeType: 'image/png' });
    expect(pages[0].images[0].data).toEqual(new Uint8Array([4, 5, 6]));
    expect(pages[0].tables).toEqual([[['a', null]]]);
    expect(pages[0].layout).toEqual({
      width: 600,
      height: 800,
      drawings: { curves: 0, verticalLines: 0, horizontalLines: 0, rects: 0 },
    });
  });

  it('leaves layout out when the converter did not report it', async () => {
    const { pages } = await normalizer.normalize(encode({ pages: [page(1)] }), PAGE_STREAM_MIME_TYPE);
    expect(pages[0].layout).toBeUndefined();
    expect([pages[0].spans, pages[0].images, pages[0].tables]).toEqual([[], [], []]);
  });

  it('copies the document producer onto pages without one', async () => {
    const bytes = encode({ producer: 'Writer', pages: [page(1), page(2, { producer: 'Impress' })] });

    const result = await normalizer.normalize(bytes, PAGE_STREAM_MIME_TYPE);

    expect(result.producer).toBe('Writer');
    expect(result.pages.map((p) => p.producer)).toEqual(['Writer', 'Impress']);
  });

  it('rejects duplicate page numbers', async () => {
    const bytes = encode({ pages: [page(1), page(1)] });
    await expect(normalizer.normalize(bytes, PAGE_STREAM_MIME_TYPE)).rejects.toThrow(
      'Invalid page stream at pages.1.pageNumber: duplicate page number 1',
    );
  });

  it('rejects bytes that are not JSON', async () => {
    const error = await normalizer.normalize(new Uint8Array([0xff, 0xfe]), PAGE_STREAM_MIME_TYPE).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(CorruptDocumentError);
    expect(error instanceof Error ? error.message : '').toBe('Page stream is not valid UTF-8 JSON');
  });

  it('rejects other MIME types', async () => {
    expect(normalizer.supports('application/pdf')).toBe(false);
    await expect(normalizer.normalize(encode({ pages: [] }), 'application/pdf')).rejects.toBeInstanceOf(
      FormatUnsupportedError,
    );
  });
});
