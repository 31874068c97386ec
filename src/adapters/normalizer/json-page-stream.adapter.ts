// =============================================================================
// JsonPageStreamNormalizer — Reads the page stream of the conversion service
// =============================================================================

import type { NormalizedPage } from "../../domain/page-stream.schema.js";
import { PAGE_STREAM_MIME_TYPE, PageStreamSchema } from "../../domain/page-stream.schema.js";
import type { NormalizedDocument, PageNormalizerPort } from "../../ports/page-normalizer.port.js";
import { CorruptDocumentError, FormatUnsupportedError, toError } from "../../sdk/errors.js";

const decoder = new TextDecoder("utf-8", { fatal: true });

/**
 * The upstream converter renders native office files to JSON: text spans,
 * embedded images and a rasterization per page, all base64-encoded.
 */
export class JsonPageStreamNormalizer implements PageNormalizerPort {
  supports(mimeType: string): boolean {
    return mimeType === PAGE_STREAM_MIME_TYPE;
  }

  async normalize(bytes: Uint8Array, mimeType: string): Promise<NormalizedDocument> {
    if (!this.supports(mimeType)) throw new FormatUnsupportedError(mimeType);

    let raw: unknown;
    try {
      raw = JSON.parse(decoder.decode(bytes));
    } catch (error) {
      throw new CorruptDocumentError("Page stream is not valid UTF-8 JSON", toError(error));
    }

    const parsed = PageStreamSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
      throw new CorruptDocumentError(`Invalid page stream${where}: ${issue?.message ?? "unknown error"}`, parsed.error);
    }

    const { producer, pages } = parsed.data;
    const normalized: NormalizedPage[] = pages.map((page) =>
      page.producer === undefined && producer !== undefined ? { ...page, producer } : page,
    );
    return producer === undefined ? { pages: normalized } : { pages: normalized, producer };
  }
}
