// =============================================================================
// Document Outcome — Lifecycle states and the per-document report
// =============================================================================

import type { CallBudgetSnapshot } from "../graph/call-budget.js";
import type { UnitFailure } from "./units.js";

export const DOCUMENT_STAGES = [
  "Normalizing",
  "Classifying",
  "Extracting",
  "Summarizing",
  "Embedding",
  "Indexing",
] as const;

export type DocumentStage = (typeof DOCUMENT_STAGES)[number];

export type DocumentStatus = "Completed" | "PartiallyCompleted" | "Failed";

export type DocumentState = DocumentStage | DocumentStatus;

export type FailureReason =
  | "format-unsupported"
  | "corrupt-document"
  | "zero-pages"
  | "inconsistent-batch"
  | "sink-error";

export interface PageStats {
  textAndImages: number;
  textOnly: number;
  imagesOnly: number;
  empty: number;
}

export interface DocumentOutcome {
  documentId: string;
  fileName: string;
  status: DocumentStatus;
  /** Set only when status is Failed */
  reason?: FailureReason;
  message?: string;
  history: DocumentState[];
  failures: UnitFailure[];
  /** Image units indexed with a placeholder summary */
  degradedUnitIds: string[];
  textEntryCount: number;
  imageEntryCount: number;
  pageStats: PageStats;
  /** External calls and tokens this document consumed */
  usage: CallBudgetSnapshot;
  /** Generated description passed to every caption call, when one was produced */
  documentSummary?: string;
  cancelled: boolean;
  durationMs: number;
}
