import { BudgetExceededError } from "@/lib/errors";
import type { ApiCategory } from "@/lib/config";

export interface BudgetOptions {
  limits: Record<ApiCategory, number>;
  /** Percentage of a limit at which a warning is logged (default 80) */
  warningThresholdPercent?: number;
  /** When false, going over a limit only warns (default true) */
  hardStop?: boolean;
}

export interface BudgetLine {
  callsMade: number;
  limit: number;
  remaining: number;
}

export type BudgetSummary = Record<ApiCategory, BudgetLine>;

/**
 * Per-run counters for the paid map APIs. Created once per run and passed
 * to every call site; nothing is carried over between runs.
 *
 * Each attempt is counted before the limit check, so with a hard stop at
 * N exactly N calls go through and the (N+1)th attempt throws.
 */
export class ApiBudget {
  private readonly counts: Record<ApiCategory, number> = {
    geocoding: 0,
    distance: 0,
    places: 0,
  };
  private readonly attempts: Record<ApiCategory, number> = {
    geocoding: 0,
    distance: 0,
    places: 0,
  };
  private readonly warned = new Set<ApiCategory>();
  private readonly blocked = new Set<ApiCategory>();
  private readonly limits: Record<ApiCategory, number>;
  private readonly warningThresholdPercent: number;
  private readonly hardStop: boolean;

  constructor(opts: BudgetOptions) {
    this.limits = { ...opts.limits };
    this.warningThresholdPercent = opts.warningThresholdPercent ?? 80;
    this.hardStop = opts.hardStop ?? true;
  }

  /**
   * Count one attempt and decide whether it may go out. Throws
   * BudgetExceededError once the category is over its hard limit.
   */
  consume(category: ApiCategory): void {
    const limit = this.limits[category];
    if (this.blocked.has(category)) {
      throw new BudgetExceededError(category, limit);
    }

    this.attempts[category]++;
    const attempt = this.attempts[category];

    if (attempt > limit) {
      if (this.hardStop) {
        this.blocked.add(category);
        console.warn(
          `[budget] ${category}: hard limit of ${limit} calls reached, no more ${category} calls this run`
        );
        throw new BudgetExceededError(category, limit);
      }
      console.warn(`[budget] ${category}: call ${attempt} is over the limit of ${limit}`);
    } else if (
      !this.warned.has(category) &&
      attempt >= Math.ceil((limit * this.warningThresholdPercent) / 100)
    ) {
      this.warned.add(category);
      console.warn(
        `[budget] ${category}: ${attempt}/${limit} calls used (${this.warningThresholdPercent}% warning threshold)`
      );
    }

    this.counts[category]++;
  }

  /** Run `fn` as one counted call of `category`. */
  async call<T>(category: ApiCategory, fn: () => Promise<T>): Promise<T> {
    this.consume(category);
    return fn();
  }

  isBlocked(category: ApiCategory): boolean {
    return this.blocked.has(category);
  }

  callsMade(category: ApiCategory): number {
    return this.counts[category];
  }

  summary(): BudgetSummary {
    const line = (category: ApiCategory): BudgetLine => ({
      callsMade: this.counts[category],
      limit: this.limits[category],
      remaining: Math.max(0, this.limits[category] - this.counts[category]),
    });
    return {
      geocoding: line("geocoding"),
      distance: line("distance"),
      places: line("places"),
    };
  }
}
