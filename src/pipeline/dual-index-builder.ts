// =============================================================================
// DualIndexBuilder — Assemble aligned text and image entry collections
// =============================================================================

import type {
  DocumentMetadata,
  EmbeddedUnit,
  ImageIndexEntry,
  IndexBatch,
  TextIndexEntry,
  UnitFailure,
  UnitResult,
} from "../domain/units.js";
import { IngestionError } from "../sdk/errors.js";

export interface DualIndex {
  batch: IndexBatch;
  /** Units excluded from both collections */
  failures: UnitFailure[];
  /** Image units indexed with the placeholder summary */
  degradedUnitIds: string[];
}

/** A batch that would break the alignment between the two collections. */
export class InconsistentBatchError extends IngestionError {
  constructor(message: string) {
    super("INCONSISTENT_BATCH", message);
    this.name = "InconsistentBatchError";
  }
}

export function entryId(modality: "text" | "image", documentId: string, unitId: string): string {
  return `${modality}_${documentId}_${unitId}`;
}

/**
 * Pure assembly: no I/O, no clock. Entries come out sorted by page, then by
 * extraction order, whatever order the units finished in. Every entry is
 * frozen.
 */
export class DualIndexBuilder {
  build(documentId: string, metadata: DocumentMetadata, results: readonly UnitResult[]): DualIndex {
    const embedded: EmbeddedUnit[] = [];
    const failures: UnitFailure[] = [];

    for (const result of results) {
      if (result.ok) embedded.push(result.value);
      else failures.push(result.failure);
    }

    this.assertConsistent(documentId, embedded, failures);

    embedded.sort((a, b) => a.unit.pageNumber - b.unit.pageNumber || a.unit.ordinal - b.unit.ordinal);
    failures.sort((a, b) => a.pageNumber - b.pageNumber || a.unitId.localeCompare(b.unitId));

    const source = Object.freeze({ ...metadata });
    const textEntries: TextIndexEntry[] = [];
    const imageEntries: ImageIndexEntry[] = [];
    const degradedUnitIds: string[] = [];

    for (const { unit, embedding } of embedded) {
      const common = {
        documentId,
        pageNumber: unit.pageNumber,
        unitId: unit.unitId,
        embedding: Object.freeze([...embedding.vector]),
        source,
      };

      if (unit.kind === "text") {
        textEntries.push(
          Object.freeze({
            ...common,
            id: entryId("text", documentId, unit.unitId),
            modality: "text" as const,
            text: unit.text,
            provenance: unit.provenance,
          }),
        );
        continue;
      }

      if (unit.summary.status === "unsummarized") degradedUnitIds.push(unit.unitId);
      imageEntries.push(
        Object.freeze({
          ...common,
          id: entryId("image", documentId, unit.unitId),
          modality: "image-summary" as const,
          summary: unit.summary.text,
          summaryStatus: unit.summary.status,
          variant: unit.variant,
          imageType: unit.summary.imageType ?? null,
          imageMimeType: unit.image.mimeType,
        }),
      );
    }

    const batch: IndexBatch = Object.freeze({ documentId, metadata: source, textEntries, imageEntries });
    return { batch, failures, degradedUnitIds };
  }

  private assertConsistent(documentId: string, embedded: EmbeddedUnit[], failures: UnitFailure[]): void {
    const seen = new Set<string>();
    let dimensions: number | null = null;

    for (const { unit, embedding } of embedded) {
      if (unit.documentId !== documentId) {
        throw new InconsistentBatchError(`Unit "${unit.unitId}" belongs to document ${unit.documentId}`);
      }
      const key = `${unit.pageNumber}/${unit.unitId}`;
      if (seen.has(key)) throw new InconsistentBatchError(`Duplicate unit "${unit.unitId}" on page ${unit.pageNumber}`);
      seen.add(key);

      const expectedModality = unit.kind === "text" ? "text" : "image-summary";
      if (embedding.unitId !== unit.unitId || embedding.modality !== expectedModality) {
        throw new InconsistentBatchError(`Embedding does not belong to unit "${unit.unitId}"`);
      }
      dimensions ??= embedding.vector.length;
      if (embedding.vector.length !== dimensions) {
        throw new InconsistentBatchError(`Unit "${unit.unitId}" has a ${embedding.vector.length}-dimensional vector, expected ${dimensions}`);
      }
    }

    for (const failure of failures) {
      if (seen.has(`${failure.pageNumber}/${failure.unitId}`)) {
        throw new InconsistentBatchError(`Unit "${failure.unitId}" reported as both embedded and failed`);
      }
    }
  }
}
