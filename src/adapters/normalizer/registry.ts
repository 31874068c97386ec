// =============================================================================
// NormalizerRegistry — Routes a MIME type to the first normalizer that reads it
// =============================================================================

import type { NormalizedDocument, PageNormalizerPort } from "../../ports/page-normalizer.port.js";
import { FormatUnsupportedError } from "../../sdk/errors.js";

export class NormalizerRegistry implements PageNormalizerPort {
  private readonly normalizers: PageNormalizerPort[] = [];

  constructor(normalizers: PageNormalizerPort[] = []) {
    for (const normalizer of normalizers) this.register(normalizer);
  }

  /** Later registrations are consulted after earlier ones. */
  register(normalizer: PageNormalizerPort): this {
    this.normalizers.push(normalizer);
    return this;
  }

  resolve(mimeType: string): PageNormalizerPort | undefined {
    return this.normalizers.find((n) => n.supports(mimeType));
  }

  supports(mimeType: string): boolean {
    return this.resolve(mimeType) !== undefined;
  }

  async normalize(bytes: Uint8Array, mimeType: string): Promise<NormalizedDocument> {
    const normalizer = this.resolve(mimeType);
    if (!normalizer) throw new FormatUnsupportedError(mimeType);
    return normalizer.normalize(bytes, mimeType);
  }
}
