import { describe, it, expect } from 'vitest';
import { anomalyWindowStart, DailySpendRow, detectCpaAnomalies } from './AnomalyDetector';

const TODAY = '2025-10-10';
const HISTORY_DATES = [
  '2025-10-02',
  '2025-10-03',
  '2025-10-04',
  '2025-10-05',
  '2025-10-06',
  '2025-10-07',
  '2025-10-08',
];

const history = (adId: string, spend: number, conversions: number): DailySpendRow[] =>
  HISTORY_DATES.map((date) => ({ date, adId, spend, conversions }));

describe('anomalyWindowStart', () => {
  it('starts eight days before today', () => {
    expect(anomalyWindowStart(TODAY)).toBe('2025-10-02');
  });
});

describe('detectCpaAnomalies', () => {
  const rows: DailySpendRow[] = [
    ...history('AD1', 20, 2),
    ...history('AD2', 20, 2),
    ...history('AD3', 1, 1),
    ...history('AD5', 4, 0),
    { date: '2025-09-20', adId: 'AD2', spend: 1, conversions: 1 },
    { date: '2025-10-09', adId: 'AD1', spend: 50, conversions: 2 },
    { date: '2025-10-09', adId: 'AD2', spend: 30, conversions: 2 },
    { date: '2025-10-09', adId: 'AD3', spend: 4, conversions: 0 },
    { date: '2025-10-09', adId: 'AD4', spend: 500, conversions: 1 },
    { date: '2025-10-09', adId: 'AD5', spend: 12, conversions: 0 },
  ];

  it('alerts on CPA spikes above double the recent average', () => {
    expect(detectCpaAnomalies(rows, TODAY)).toEqual([
      {
        alertDate: TODAY,
        metric: 'High CPA',
        adId: 'AD1',
        justification: "Yesterday's CPA ($25.00) is >200% of 7-day avg ($10.00).",
      },
      {
        alertDate: TODAY,
        metric: 'High CPA',
        adId: 'AD5',
        justification: "Yesterday's CPA ($12.00) is >200% of 7-day avg ($4.00).",
      },
    ]);
  });

  it('ignores spikes below the $5 floor', () => {
    const flagged = detectCpaAnomalies(rows, TODAY).map((alert) => alert.adId);
    expect(flagged).not.toContain('AD3');
  });

  it('skips ads with no history in the window', () => {
    const flagged = detectCpaAnomalies(rows, TODAY).map((alert) => alert.adId);
    expect(flagged).not.toContain('AD4');
  });

  it('returns nothing without yesterday rows', () => {
    expect(detectCpaAnomalies(history('AD1', 20, 2), TODAY)).toEqual([]);
  });
});
