// =============================================================================
// DocumentStateMachine — Forward-only document lifecycle
// =============================================================================

import type { DocumentStage, DocumentState, DocumentStatus } from "../domain/outcome.js";
import { DOCUMENT_STAGES } from "../domain/outcome.js";
import type { Logger } from "../middleware/logging.js";
import { InvalidStateTransitionError } from "../sdk/errors.js";

const TERMINAL: ReadonlySet<DocumentState> = new Set<DocumentState>(["Completed", "PartiallyCompleted", "Failed"]);

function isStage(state: DocumentState): state is DocumentStage {
  return !TERMINAL.has(state);
}

function stageIndex(stage: DocumentStage): number {
  return DOCUMENT_STAGES.indexOf(stage);
}

export class DocumentStateMachine {
  private current: DocumentState = "Normalizing";
  private readonly trail: DocumentState[] = ["Normalizing"];

  constructor(private readonly logger?: Logger) {}

  get state(): DocumentState {
    return this.current;
  }

  get history(): DocumentState[] {
    return [...this.trail];
  }

  get isTerminal(): boolean {
    return TERMINAL.has(this.current);
  }

  /**
   * Stages move strictly forward but may skip ahead (a document without
   * image units goes from Extracting straight to Embedding).
   * Completed and PartiallyCompleted are only reachable from Indexing;
   * Failed from any non-terminal state.
   */
  transition(to: DocumentState): void {
    const from = this.current;
    if (!this.allowed(from, to)) throw new InvalidStateTransitionError(from, to);

    this.current = to;
    this.trail.push(to);
    this.logger?.info("document:state", { from, to });
  }

  /** Move to `stage` unless the document is already there. */
  advanceTo(stage: DocumentStage): void {
    if (this.current !== stage) this.transition(stage);
  }

  finish(status: DocumentStatus): void {
    this.transition(status);
  }

  private allowed(from: DocumentState, to: DocumentState): boolean {
    if (!isStage(from)) return false;
    if (to === "Failed") return true;
    if (to === "Completed" || to === "PartiallyCompleted") return from === "Indexing";
    if (!isStage(to)) return false;
    return stageIndex(to) > stageIndex(from);
  }
}
