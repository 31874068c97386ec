import { describe, it, expect } from 'vitest';
import { DualIndexBuilder, InconsistentBatchError, entryId } from '../dual-index-builder.js';
import type { UnitResult } from '../../domain/units.js';
import { DOC_ID, METADATA, embeddedImage, embeddedText, imageUnit, summarized, textUnit } from './fixtures.js';

const builder = new DualIndexBuilder();

function failed(unitId: string, pageNumber: number): UnitResult {
  return {
    ok: false,
    failure: { unitId, pageNumber, stage: 'embedding', kind: 'external-permanent', message: '[embed] invalid input' },
  };
}

describe('DualIndexBuilder', () => {
  it('splits units into text and image entries in page and extraction order', () => {
    const results = [
      embeddedImage(summarized(imageUnit(2, 0, 1), 'A map')),
      embeddedText(textUnit(2, 0, 'Page two text')),
      embeddedText(textUnit(1, 1, 'Second chunk', 1)),
      embeddedText(textUnit(1, 0, 'First chunk', 0)),
    ];

    const { batch, failures, degradedUnitIds } = builder.build(DOC_ID, METADATA, results);

    expect(batch.textEntries.map((e) => e.id)).toEqual([
      'text_doc-0001_p1-t0',
      'text_doc-0001_p1-t1',
      'text_doc-0001_p2-t0',
    ]);
    expect(batch.imageEntries.map((e) => e.id)).toEqual(['image_doc-0001_p2-img0']);
    expect(failures).toEqual([]);
    expect(degradedUnitIds).toEqual([]);
  });

  it('builds complete text and image entries', () => {
    const text = textUnit(1, 0, 'Holiday schedule');
    const image = summarized(imageUnit(1, 0, 1), 'A calendar');

    const { batch } = builder.build(DOC_ID, METADATA, [embeddedText(text), embeddedImage(image)]);

    expect(batch.textEntries[0]).toEqual({
      id: 'text_doc-0001_p1-t0',
      documentId: DOC_ID,
      pageNumber: 1,
      unitId: 'p1-t0',
      embedding: [1, 0, 0],
      source: METADATA,
      modality: 'text',
      text: 'Holiday schedule',
      provenance: { kind: 'body', start: 0, end: 16 },
    });
    expect(batch.imageEntries[0]).toEqual({
      id: 'image_doc-0001_p1-img0',
      documentId: DOC_ID,
      pageNumber: 1,
      unitId: 'p1-img0',
      embedding: [0, 1, 0],
      source: METADATA,
      modality: 'image-summary',
      summary: 'A calendar',
      summaryStatus: 'captioned',
      variant: 'discrete',
      imageType: null,
      imageMimeType: 'image/png',
    });
    expect(batch.metadata).toEqual(METADATA);
  });

  it('freezes the batch, its entries and their vectors', () => {
    const { batch } = builder.build(DOC_ID, METADATA, [embeddedText(textUnit(1, 0, 'x'))]);
    expect(Object.isFrozen(batch)).toBe(true);
    expect(Object.isFrozen(batch.textEntries[0])).toBe(true);
    expect(Object.isFrozen(batch.textEntries[0].embedding)).toBe(true);
    expect(Object.isFrozen(batch.metadata)).toBe(true);
  });

  it('leaves failed units out of both collections and reports them', () => {
    const results = [
      failed('p3-t0', 3),
      embeddedText(textUnit(1, 0, 'kept')),
      failed('p1-img0', 1),
    ];

    const { batch, failures } = builder.build(DOC_ID, METADATA, results);

    expect(batch.textEntries).toHaveLength(1);
    expect(batch.imageEntries).toHaveLength(0);
    expect(failures.map((f) => f.unitId)).toEqual(['p1-img0', 'p3-t0']);
  });

  it('carries the image type the caption model reported', () => {
    const unit = imageUnit(1, 0);
    const typed = { ...unit, summary: { text: 'Bar chart of headcount', status: 'captioned' as const, imageType: 'information' as const } };
    const { batch } = builder.build(DOC_ID, METADATA, [embeddedImage(typed)]);
    expect(batch.imageEntries[0].imageType).toBe('information');
  });

  it('lists image units indexed with the placeholder summary', () => {
    const unit = summarized(imageUnit(4, 0), '[unsummarized image]', 'unsummarized');
    const { batch, degradedUnitIds } = builder.build(DOC_ID, METADATA, [embeddedImage(unit)]);

    expect(batch.imageEntries[0].summaryStatus).toBe('unsummarized');
    expect(degradedUnitIds).toEqual(['p4-img0']);
  });

  it('returns an empty batch for no results', () => {
    const { batch } = builder.build(DOC_ID, METADATA, []);
    expect([batch.textEntries, batch.imageEntries]).toEqual([[], []]);
  });

  it('rejects a unit from another document', () => {
    const unit = { ...textUnit(1, 0, 'x'), documentId: 'other' };
    expect(() => builder.build(DOC_ID, METADATA, [embeddedText(unit)])).toThrow(
      'Unit "p1-t0" belongs to document other',
    );
  });

  it('rejects duplicate units', () => {
    const unit = textUnit(1, 0, 'x');
    expect(() => builder.build(DOC_ID, METADATA, [embeddedText(unit), embeddedText(unit)])).toThrow(
      'Duplicate unit "p1-t0" on page 1',
    );
  });

  it('rejects an embedding that belongs to another unit', () => {
    const result: UnitResult = {
      ok: true,
      value: { unit: textUnit(1, 0, 'x'), embedding: { unitId: 'p1-t9', modality: 'text', vector: [1], tokenCount: 1 } },
    };
    expect(() => builder.build(DOC_ID, METADATA, [result])).toThrow(InconsistentBatchError);
  });

  it('rejects vectors of different lengths', () => {
    const results = [embeddedText(textUnit(1, 0, 'a'), [1, 0, 0]), embeddedText(textUnit(1, 1, 'b'), [1, 0])];
    expect(() => builder.build(DOC_ID, METADATA, results)).toThrow(
      'Unit "p1-t1" has a 2-dimensional vector, expected 3',
    );
  });

  it('rejects a unit reported as both embedded and failed', () => {
    const results = [embeddedText(textUnit(1, 0, 'a')), failed('p1-t0', 1)];
    expect(() => builder.build(DOC_ID, METADATA, results)).toThrow(
      'Unit "p1-t0" reported as both embedded and failed',
    );
  });
});

describe('entryId', () => {
  it('prefixes the modality and document id', () => {
    expect(entryId('image', 'abc', 'p1-page')).toBe('image_abc_p1-page');
  });
});
