import { addDays, diffDays } from '../../utils/dateRange';
import { quantile } from '../../utils/stats';

export interface SaleRow {
  customerId: string;
  saleDate: string;
  saleAmount: number;
}

export interface RfmRecord {
  customerId: string;
  recency: number;
  frequency: number;
  monetary: number;
  rScore: number;
  fScore: number;
  mScore: number;
  rfmScore: string;
  segment: string;
}

// Checked in order; the first match names the segment
const SEGMENTS: Array<[RegExp, string]> = [
  [/^[3-4][3-4][3-4]$/, 'Champions'],
  [/^[2-4][1-2][3-4]$/, 'Potential Loyalists'],
  [/^[3-4][1-2][1-2]$/, 'New Customers'],
  [/^[1-2][3-4][3-4]$/, 'At Risk'],
  [/^1[1-2][1-2]$/, 'Hibernating'],
];

export const segmentFor = (rfmScore: string): string =>
  SEGMENTS.find(([pattern]) => pattern.test(rfmScore))?.[1] ?? 'Other';

/**
 * Assigns quartile scores 1–4 by rank. Ties keep input order, so equal
 * values may straddle a quartile boundary.
 */
export const rankQuartileScores = (values: readonly number[]): number[] => {
  const order = values
    .map((value, index) => ({ value, index }))
    .sort((a, b) => a.value - b.value || a.index - b.index);

  const scores = new Array<number>(values.length);
  order.forEach((entry, rank) => {
    scores[entry.index] = Math.min(4, Math.floor((rank * 4) / values.length) + 1);
  });
  return scores;
};

/**
 * Assigns quartile scores 1–4 against the 25th, 50th and 75th percentiles.
 * Bins include their upper edge, so equal values always share a score.
 */
export const valueQuartileScores = (values: readonly number[]): number[] => {
  const edges = [0.25, 0.5, 0.75].map((q) => quantile(values, q) ?? 0);
  return values.map((value) => 1 + edges.filter((edge) => value > edge).length);
};

/**
 * Recency/frequency/monetary segmentation. Recency is measured from the day
 * after the latest sale; a lower recency scores higher.
 */
export const calculateRfm = (sales: readonly SaleRow[]): RfmRecord[] => {
  if (sales.length === 0) return [];

  const latestSale = sales.reduce((max, sale) => (sale.saleDate > max ? sale.saleDate : max), sales[0].saleDate);
  const snapshot = addDays(latestSale, 1);

  const byCustomer = new Map<string, { last: string; count: number; total: number }>();
  for (const sale of sales) {
    const entry = byCustomer.get(sale.customerId);
    if (entry) {
      entry.count += 1;
      entry.total += sale.saleAmount;
      if (sale.saleDate > entry.last) entry.last = sale.saleDate;
    } else {
      byCustomer.set(sale.customerId, { last: sale.saleDate, count: 1, total: sale.saleAmount });
    }
  }

  const customers = [...byCustomer.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([customerId, entry]) => ({
      customerId,
      recency: diffDays(entry.last, snapshot),
      frequency: entry.count,
      monetary: entry.total,
    }));

  // The most recent customers land in the top quartile
  const rScores = valueQuartileScores(customers.map((c) => c.recency)).map((score) => 5 - score);
  const fScores = rankQuartileScores(customers.map((c) => c.frequency));
  const mScores = valueQuartileScores(customers.map((c) => c.monetary));

  return customers.map((customer, i) => {
    const rfmScore = `${rScores[i]}${fScores[i]}${mScores[i]}`;
    return {
      ...customer,
      rScore: rScores[i],
      fScore: fScores[i],
      mScore: mScores[i],
      rfmScore,
      segment: segmentFor(rfmScore),
    };
  });
};
