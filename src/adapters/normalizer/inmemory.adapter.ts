// =============================================================================
// InMemoryNormalizer — Serves pre-built pages, keyed by the document bytes
// =============================================================================

import type { NormalizedPage } from "../../domain/page-stream.schema.js";
import type { NormalizedDocument, PageNormalizerPort } from "../../ports/page-normalizer.port.js";
import { CorruptDocumentError, FormatUnsupportedError } from "../../sdk/errors.js";

export const IN_MEMORY_MIME_TYPE = "application/x-pagefold-test";

export interface InMemoryNormalizerOptions {
  mimeTypes?: string[];
}

export class InMemoryNormalizer implements PageNormalizerPort {
  private readonly documents = new Map<string, NormalizedDocument>();
  private readonly mimeTypes: ReadonlySet<string>;

  constructor(options?: InMemoryNormalizerOptions) {
    this.mimeTypes = new Set(options?.mimeTypes ?? [IN_MEMORY_MIME_TYPE]);
  }

  /** Register the pages `normalize` returns for these bytes. */
  register(bytes: Uint8Array, pages: NormalizedPage[], producer?: string): this {
    this.documents.set(keyOf(bytes), producer === undefined ? { pages } : { pages, producer });
    return this;
  }

  supports(mimeType: string): boolean {
    return this.mimeTypes.has(mimeType);
  }

  async normalize(bytes: Uint8Array, mimeType: string): Promise<NormalizedDocument> {
    if (!this.supports(mimeType)) throw new FormatUnsupportedError(mimeType);
    const doc = this.documents.get(keyOf(bytes));
    if (!doc) throw new CorruptDocumentError("No pages registered for these bytes");
    return { ...doc, pages: [...doc.pages] };
  }
}

function keyOf(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64");
}
