// =============================================================================
// Entry records — Flat, serializable shapes of index entries
// =============================================================================

import type { ImageIndexEntry, TextIndexEntry } from "../../domain/units.js";

export interface EntryRecord {
  id: string;
  embedding: number[];
  content: string;
  metadata: Record<string, unknown>;
}

function sourceFields(entry: TextIndexEntry | ImageIndexEntry): Record<string, unknown> {
  const { source } = entry;
  return {
    documentId: entry.documentId,
    pageNumber: entry.pageNumber,
    unitId: entry.unitId,
    modality: entry.modality,
    fileName: source.fileName,
    title: source.title,
    mimeType: source.mimeType,
    uploader: source.uploader,
    department: source.department,
    pageCount: source.pageCount,
    ingestedAt: source.ingestedAt,
    ...(source.producer !== undefined ? { producer: source.producer } : {}),
  };
}

export function textRecord(entry: TextIndexEntry): EntryRecord {
  const provenance =
    entry.provenance.kind === "body"
      ? { provenance: "body", start: entry.provenance.start, end: entry.provenance.end }
      : { provenance: "table", tableIndex: entry.provenance.tableIndex };
  return {
    id: entry.id,
    embedding: [...entry.embedding],
    content: entry.text,
    metadata: { ...sourceFields(entry), ...provenance },
  };
}

export function imageRecord(entry: ImageIndexEntry): EntryRecord {
  return {
    id: entry.id,
    embedding: [...entry.embedding],
    content: entry.summary,
    metadata: {
      ...sourceFields(entry),
      summaryStatus: entry.summaryStatus,
      variant: entry.variant,
      imageMimeType: entry.imageMimeType,
      ...(entry.imageType !== null ? { imageType: entry.imageType } : {}),
    },
  };
}
