import { addDays } from '../../utils/dateRange';
import { mean } from '../../utils/stats';

export const ANOMALY_LOOKBACK_DAYS = 8;
export const CPA_SPIKE_MULTIPLIER = 2;
export const CPA_SPIKE_FLOOR = 5;

export interface DailySpendRow {
  date: string;
  adId: string;
  spend: number;
  conversions: number;
}

export interface AlertDraft {
  alertDate: string;
  metric: 'High CPA';
  adId: string;
  justification: string;
}

// Zero conversions count as one so a day with spend still has a finite CPA
const rowCpa = (row: DailySpendRow): number => row.spend / (row.conversions === 0 ? 1 : row.conversions);

/** First date the detector needs rows for when run on `today`. */
export const anomalyWindowStart = (today: string): string => addDays(today, -ANOMALY_LOOKBACK_DAYS);

/**
 * Flags ads whose CPA yesterday was more than double their average CPA over
 * the preceding days of the window (and above a $5 floor).
 */
export const detectCpaAnomalies = (rows: readonly DailySpendRow[], today: string): AlertDraft[] => {
  const yesterday = addDays(today, -1);
  const windowStart = anomalyWindowStart(today);
  const inWindow = rows.filter((row) => row.date >= windowStart);

  const yesterdayByAd = new Map<string, DailySpendRow>();
  for (const row of inWindow) {
    if (row.date === yesterday && !yesterdayByAd.has(row.adId)) {
      yesterdayByAd.set(row.adId, row);
    }
  }

  const alerts: AlertDraft[] = [];
  for (const [adId, latest] of yesterdayByAd) {
    const history = inWindow.filter((row) => row.adId === adId && row.date < yesterday);
    const averageCpa = mean(history.map(rowCpa));
    if (averageCpa === null) continue;

    const latestCpa = rowCpa(latest);
    if (latestCpa > averageCpa * CPA_SPIKE_MULTIPLIER && latestCpa > CPA_SPIKE_FLOOR) {
      alerts.push({
        alertDate: today,
        metric: 'High CPA',
        adId,
        justification: `Yesterday's CPA ($${latestCpa.toFixed(2)}) is >200% of 7-day avg ($${averageCpa.toFixed(2)}).`,
      });
    }
  }

  return alerts;
};
