// =============================================================================
// CallBudget — Acquire/record external calls with soft-limit throttling
// =============================================================================

import type { ExternalCapability } from "../sdk/errors.js";

export type BudgetStatus = "ok" | "soft-limit" | "hard-limit";

export interface CallBudgetConfig {
  limits: Record<ExternalCapability, number>;
  /** Fraction of a limit after which grants carry a throttle delay (default 0.8) */
  softLimitRatio: number;
  /** Delay when the last call of a limit is granted (default 2000) */
  maxThrottleMs: number;
}

export interface BudgetGrant {
  granted: boolean;
  delayMs: number;
}

export interface CallBudgetSnapshot {
  used: Record<ExternalCapability, number>;
  tokens: number;
  status: Record<ExternalCapability, BudgetStatus>;
}

/**
 * Hook the Summarizer and Embedder consult before every external call,
 * retries included. Node runs the check-and-increment without yielding,
 * so concurrent units never overshoot a limit.
 */
export interface CallBudgetHook {
  acquire(capability: ExternalCapability): BudgetGrant;
  /** Report tokens reported by the provider for a finished call */
  record(capability: ExternalCapability, tokens: number): void;
}

const DEFAULT_BUDGET_CONFIG: Omit<CallBudgetConfig, "limits"> = {
  softLimitRatio: 0.8,
  maxThrottleMs: 2_000,
};

export class CallBudget implements CallBudgetHook {
  private readonly config: CallBudgetConfig;
  private readonly parent?: CallBudgetHook;
  private readonly used: Record<ExternalCapability, number> = { caption: 0, embed: 0 };
  private tokens = 0;

  /**
   * @param parent Optional wider budget (e.g. process-wide) that must also grant
   *               every call; a denial there denies here too.
   */
  constructor(
    limits: Record<ExternalCapability, number>,
    config?: Partial<Omit<CallBudgetConfig, "limits">>,
    parent?: CallBudgetHook,
  ) {
    this.config = { ...DEFAULT_BUDGET_CONFIG, ...config, limits };
    this.parent = parent;
  }

  acquire(capability: ExternalCapability): BudgetGrant {
    const limit = this.config.limits[capability];
    const projected = this.used[capability] + 1;
    if (projected > limit) return { granted: false, delayMs: 0 };

    const parentGrant = this.parent?.acquire(capability) ?? { granted: true, delayMs: 0 };
    if (!parentGrant.granted) return parentGrant;

    this.used[capability] = projected;
    return { granted: true, delayMs: Math.max(parentGrant.delayMs, this.throttle(projected / limit)) };
  }

  record(capability: ExternalCapability, tokens: number): void {
    this.tokens += tokens;
    this.parent?.record(capability, tokens);
  }

  /** Calls granted and tokens reported so far; reported on the document outcome */
  snapshot(): CallBudgetSnapshot {
    return {
      used: { ...this.used },
      tokens: this.tokens,
      status: { caption: this.status("caption"), embed: this.status("embed") },
    };
  }

  private status(capability: ExternalCapability): BudgetStatus {
    const ratio = this.used[capability] / this.config.limits[capability];
    if (ratio >= 1) return "hard-limit";
    if (ratio >= this.config.softLimitRatio) return "soft-limit";
    return "ok";
  }

  private throttle(ratio: number): number {
    const { softLimitRatio, maxThrottleMs } = this.config;
    if (ratio <= softLimitRatio || softLimitRatio >= 1) return 0;
    const pressure = (ratio - softLimitRatio) / (1 - softLimitRatio);
    return Math.round(pressure * maxThrottleMs);
  }
}
