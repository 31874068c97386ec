// =============================================================================
// Units & Index Entries — What flows between pipeline stages
// =============================================================================

import type { ImageType } from "./image-description.schema.js";
import type { NormalizedPage, RasterImage } from "./page-stream.schema.js";

// =============================================================================
// Documents
// =============================================================================

export interface DocumentMetadata {
  /** SHA-256 of the document bytes */
  documentId: string;
  fileName: string;
  title: string;
  mimeType: string;
  uploader: string;
  department: string;
  pageCount: number;
  producer?: string;
  ingestedAt: string;
}

// =============================================================================
// Classification
// =============================================================================

export type PageComplexity = "simple" | "complex";

export type ComplexityReason =
  | "missing-layout"
  | "presentation-export"
  | "landscape"
  | "visual-density"
  | "visual-elements"
  | "image-only"
  | "overlapping-layout"
  | "sparse-text"
  | "garbled-text";

export interface PageClassification {
  readonly complexity: PageComplexity;
  readonly reasons: readonly ComplexityReason[];
  /** True when the decision fell back to complex for lack of metadata. */
  readonly defaulted: boolean;
}

export interface ClassifiedPage {
  readonly documentId: string;
  readonly page: NormalizedPage;
  readonly classification: PageClassification;
}

// =============================================================================
// Units
// =============================================================================

export type TextProvenance =
  | { kind: "body"; start: number; end: number }
  | { kind: "table"; tableIndex: number };

interface UnitBase {
  readonly documentId: string;
  readonly pageNumber: number;
  /** Unique within the page, stable across reprocessing */
  readonly unitId: string;
  /** Emission order within the page */
  readonly ordinal: number;
}

export interface TextUnit extends UnitBase {
  readonly kind: "text";
  readonly text: string;
  readonly provenance: TextProvenance;
}

export type SummaryStatus = "captioned" | "unsummarized";

export interface ImageSummary {
  text: string;
  status: SummaryStatus;
  /** Set when the caption model classified the image */
  imageType?: ImageType;
  /** Why the placeholder was used (only for "unsummarized") */
  reason?: string;
}

export type ImageVariant = "discrete" | "whole-page";

export interface ImageUnit extends UnitBase {
  readonly kind: "image";
  readonly variant: ImageVariant;
  readonly image: RasterImage;
  readonly summary: ImageSummary | null;
}

export type SummarizedImageUnit = ImageUnit & { readonly summary: ImageSummary };

export type Unit = TextUnit | ImageUnit;

// =============================================================================
// Embeddings
// =============================================================================

export type Modality = "text" | "image-summary";

export interface Embedding {
  unitId: string;
  modality: Modality;
  vector: number[];
  tokenCount: number;
}

export type EmbeddedUnit =
  | { unit: TextUnit; embedding: Embedding }
  | { unit: SummarizedImageUnit; embedding: Embedding };

// =============================================================================
// Failures
// =============================================================================

export type UnitStage = "summarizing" | "embedding";

export type UnitFailureKind = "external-permanent" | "budget-exhausted" | "cancelled" | "timeout";

export interface UnitFailure {
  unitId: string;
  pageNumber: number;
  stage: UnitStage;
  kind: UnitFailureKind;
  message: string;
}

export type UnitResult =
  | { ok: true; value: EmbeddedUnit }
  | { ok: false; failure: UnitFailure };

// =============================================================================
// Index entries
// =============================================================================

interface IndexEntryBase {
  /** `${modality}_${documentId}_${unitId}` */
  readonly id: string;
  readonly documentId: string;
  readonly pageNumber: number;
  readonly unitId: string;
  readonly embedding: readonly number[];
  readonly source: Readonly<DocumentMetadata>;
}

export interface TextIndexEntry extends IndexEntryBase {
  readonly modality: "text";
  readonly text: string;
  readonly provenance: TextProvenance;
}

export interface ImageIndexEntry extends IndexEntryBase {
  readonly modality: "image-summary";
  readonly summary: string;
  readonly summaryStatus: SummaryStatus;
  readonly variant: ImageVariant;
  readonly imageType: ImageType | null;
  readonly imageMimeType: string;
}

export interface IndexBatch {
  readonly documentId: string;
  readonly metadata: Readonly<DocumentMetadata>;
  readonly textEntries: readonly TextIndexEntry[];
  readonly imageEntries: readonly ImageIndexEntry[];
}
