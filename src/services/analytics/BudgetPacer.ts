import { diffDays } from '../../utils/dateRange';
import { safeDivide } from '../../utils/stats';

export type PacingStatus = 'over_pacing' | 'under_pacing' | 'on_pace' | 'not_started';

export interface BudgetWindow {
  campaignId: string;
  startDate: string;
  endDate: string;
  totalBudget: number;
}

export interface PacingRecord {
  campaignId: string;
  asOf: string;
  totalBudget: number;
  totalDays: number;
  elapsedDays: number;
  expectedSpend: number;
  actualSpend: number;
  /** actual / expected; null before the flight starts. */
  pacingRatio: number | null;
  status: PacingStatus;
  /** Spend at the end of the flight if the current rate holds. */
  forecastSpend: number | null;
  forecastOverBudget: boolean;
  timeElapsedPct: number;
  budgetSpentPct: number | null;
  remainingBudget: number;
  daysRemaining: number;
  recommendedDailySpend: number | null;
}

export interface InvalidBudget {
  campaignId: string;
  reason: string;
}

export interface PacingBatch {
  records: PacingRecord[];
  invalid: InvalidBudget[];
}

export class BudgetPacer {
  constructor(private readonly tolerance: number) {}

  classify(ratio: number): PacingStatus {
    if (ratio > 1 + this.tolerance) return 'over_pacing';
    if (ratio < 1 - this.tolerance) return 'under_pacing';
    return 'on_pace';
  }

  private statusFor(elapsedDays: number, ratio: number | null, actualSpend: number): PacingStatus {
    if (elapsedDays === 0) return 'not_started';
    // A zero budget has no curve to pace against: any spend overshoots it
    if (ratio === null) return actualSpend > 0 ? 'over_pacing' : 'on_pace';
    return this.classify(ratio);
  }

  /**
   * Compares spend-to-date against a straight-line budget curve. Day counts
   * include the start day, so on the start date one day has elapsed.
   */
  pace(budget: BudgetWindow, actualSpend: number, asOf: string): PacingRecord {
    const totalDays = diffDays(budget.startDate, budget.endDate) + 1;
    if (totalDays < 1) {
      throw new RangeError(`Budget for ${budget.campaignId} ends before it starts`);
    }

    const elapsedDays = Math.min(Math.max(diffDays(budget.startDate, asOf) + 1, 0), totalDays);
    const timeElapsed = elapsedDays / totalDays;

    const expectedSpend = budget.totalBudget * timeElapsed;
    const pacingRatio = safeDivide(actualSpend, expectedSpend);
    const forecastSpend = safeDivide(actualSpend, timeElapsed);
    const remainingBudget = budget.totalBudget - actualSpend;
    const daysRemaining = totalDays - elapsedDays;

    return {
      campaignId: budget.campaignId,
      asOf,
      totalBudget: budget.totalBudget,
      totalDays,
      elapsedDays,
      expectedSpend,
      actualSpend,
      pacingRatio,
      status: this.statusFor(elapsedDays, pacingRatio, actualSpend),
      forecastSpend,
      forecastOverBudget: forecastSpend !== null && forecastSpend > budget.totalBudget,
      timeElapsedPct: timeElapsed,
      budgetSpentPct: safeDivide(actualSpend, budget.totalBudget),
      remainingBudget,
      daysRemaining,
      recommendedDailySpend:
        daysRemaining > 0 ? Math.max(remainingBudget, 0) / daysRemaining : null,
    };
  }

  /**
   * Paces every budget against its spend. A budget whose window cannot be
   * paced is listed under `invalid` and does not stop the others.
   */
  paceAll(budgets: readonly BudgetWindow[], spendByCampaign: ReadonlyMap<string, number>, asOf: string): PacingBatch {
    const batch: PacingBatch = { records: [], invalid: [] };
    for (const budget of budgets) {
      try {
        batch.records.push(this.pace(budget, spendByCampaign.get(budget.campaignId) ?? 0, asOf));
      } catch (error) {
        if (!(error instanceof RangeError)) throw error;
        batch.invalid.push({ campaignId: budget.campaignId, reason: error.message });
      }
    }
    return batch;
  }
}
