// =============================================================================
// External call gate — Budget, throttle and stop checks before each attempt
// =============================================================================

import type { CallBudgetHook } from "../graph/call-budget.js";
import type { Logger } from "../middleware/logging.js";
import type { ExternalCapability } from "../sdk/errors.js";
import { BudgetExhaustedError, CancelledError } from "../sdk/errors.js";
import { abortableSleep } from "../sdk/retry.js";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const defaultSleep: Sleep = abortableSleep;

export interface ExternalCallContext {
  /** Budget consulted before every attempt, retries included */
  budget?: CallBudgetHook;
  /** Once aborted, no new attempt is issued; in-flight calls are left alone */
  stopSignal?: AbortSignal;
  /** Handed to the provider call itself (per-unit timeout) */
  callSignal?: AbortSignal;
  logger?: Logger;
}

/** Take one call from the budget, waiting out any throttle delay. */
export async function acquireCall(capability: ExternalCapability, ctx: ExternalCallContext, sleep: Sleep): Promise<void> {
  if (ctx.stopSignal?.aborted) throw new CancelledError();
  if (ctx.callSignal?.aborted) throw new CancelledError("Unit aborted before its next call");
  const grant = ctx.budget?.acquire(capability) ?? { granted: true, delayMs: 0 };
  if (!grant.granted) throw new BudgetExhaustedError(capability);
  if (grant.delayMs > 0) await sleep(grant.delayMs, ctx.stopSignal);
}
