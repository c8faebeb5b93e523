import type { TierConfig } from '../config/schema';
import { QuotaExceededError } from './errors';
import { nextQuotaReset, quotaPeriodStart } from './time-window';
import type { ForecastEntry, ForecastReport, QuotaTierState, QuotaTierSummary, TierForecast } from './types';

export interface QuotaLedgerOptions {
  tiers: Record<string, TierConfig>;
  resetHour: number;
}

/**
 * Per-tier daily budget over the ledger's `quota` record. Usage only grows
 * within a period and drops to zero when the reset boundary passes.
 */
export class QuotaLedger {
  private tiers: Record<string, TierConfig>;
  private resetHour: number;

  constructor(
    private readonly state: Record<string, QuotaTierState>,
    options: QuotaLedgerOptions,
    private readonly now: number,
  ) {
    this.tiers = options.tiers;
    this.resetHour = options.resetHour;
    this.refresh();
  }

  get periodStart(): number {
    return quotaPeriodStart(this.now, this.resetHour);
  }

  hasTier(tier: string): boolean {
    return tier in this.tiers;
  }

  getState(tier: string): QuotaTierState {
    const periodStart = this.periodStart;
    let state = this.state[tier];
    if (!state || state.periodStart < periodStart) {
      state = { used: 0, periodStart };
      this.state[tier] = state;
    }
    return state;
  }

  /** Usable units left in the tier. Unlimited and unconfigured tiers are unmetered. */
  usable(tier: string): number {
    const config = this.tiers[tier];
    if (!config || config.limit === null) return Infinity;
    return config.limit * (1 - config.reserveFraction) - this.getState(tier).used;
  }

  wouldExceed(tier: string, amount: number): boolean {
    return amount > this.usable(tier);
  }

  ensureAvailable(tier: string, amount: number): void {
    if (this.wouldExceed(tier, amount)) {
      throw new QuotaExceededError(tier, amount, Math.max(0, this.usable(tier)));
    }
  }

  recordUsage(tier: string, amount: number): number {
    const state = this.getState(tier);
    if (amount > 0) {
      state.used += amount;
    }
    return state.used;
  }

  /**
   * Walk a batch in descending score order and split it into what fits the
   * remaining usable budget and what would have to wait for the next cycle.
   */
  forecast(ranked: ForecastEntry[], window: { start: number; end: number }): ForecastReport {
    const remaining = new Map<string, number>();
    const perTier = new Map<string, TierForecast>();
    const fits: ForecastEntry[] = [];
    const deferred: ForecastEntry[] = [];

    for (const entry of ranked) {
      if (!remaining.has(entry.tier)) {
        remaining.set(entry.tier, this.usable(entry.tier));
      }
      let tier = perTier.get(entry.tier);
      if (!tier) {
        const usable = this.usable(entry.tier);
        tier = { tier: entry.tier, usable: Number.isFinite(usable) ? usable : null, requested: 0, admitted: 0 };
        perTier.set(entry.tier, tier);
      }
      tier.requested += entry.estimatedQuota;

      const left = remaining.get(entry.tier) ?? 0;
      if (entry.estimatedQuota <= left) {
        remaining.set(entry.tier, left - entry.estimatedQuota);
        tier.admitted += entry.estimatedQuota;
        fits.push(entry);
      } else {
        deferred.push(entry);
      }
    }

    return {
      windowStart: window.start,
      windowEnd: window.end,
      fits,
      deferred,
      tiers: [...perTier.values()],
    };
  }

  summary(): QuotaTierSummary[] {
    const resetsAt = nextQuotaReset(this.now, this.resetHour);
    return Object.entries(this.tiers).map(([tier, config]) => {
      const used = this.getState(tier).used;
      if (config.limit === null) {
        return { tier, used, limit: null, effectiveLimit: null, usable: null, percent: 0, resetsAt };
      }
      const effectiveLimit = Math.floor(config.limit * (1 - config.reserveFraction));
      return {
        tier,
        used,
        limit: config.limit,
        effectiveLimit,
        usable: Math.max(0, this.usable(tier)),
        percent: config.limit > 0 ? Math.round((used / config.limit) * 1000) / 10 : 0,
        resetsAt,
      };
    });
  }

  private refresh(): void {
    for (const tier of Object.keys(this.tiers)) {
      this.getState(tier);
    }
  }
}
