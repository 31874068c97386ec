// =============================================================================
// Document metadata — Content-addressed id plus descriptive fields
// =============================================================================

import { createHash } from "node:crypto";

import type { DocumentMetadata } from "../domain/units.js";

/** SHA-256 hex digest of the bytes; a changed document gets a new id. */
export function documentIdFor(bytes: Uint8Array): string {
  return createHash("sha256").update(bytes).digest("hex");
}

/** File name without its directory and last extension. */
export function titleFromFileName(fileName: string): string {
  const base = fileName.split(/[\\/]/).pop() ?? fileName;
  const dot = base.lastIndexOf(".");
  return dot > 0 ? base.slice(0, dot) : base;
}

export interface MetadataInput {
  documentId: string;
  fileName: string;
  mimeType: string;
  pageCount: number;
  producer?: string;
  uploader?: string;
  department?: string;
  ingestedAt: Date;
}

export function buildDocumentMetadata(input: MetadataInput): DocumentMetadata {
  const metadata: DocumentMetadata = {
    documentId: input.documentId,
    fileName: input.fileName,
    title: titleFromFileName(input.fileName),
    mimeType: input.mimeType,
    uploader: input.uploader ?? "default",
    department: input.department ?? "default",
    pageCount: input.pageCount,
    ingestedAt: input.ingestedAt.toISOString(),
  };
  if (input.producer !== undefined) metadata.producer = input.producer;
  return metadata;
}
