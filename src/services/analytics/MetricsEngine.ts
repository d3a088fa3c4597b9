import { safeDivide } from '../../utils/stats';
import {
  DerivedMetrics,
  FactCounts,
  MetricRecord,
  MetricTargets,
  PerformanceFact,
  PerformanceTotals,
  TargetClassification,
  TargetStatus,
} from './types';

const emptyTotals = (): PerformanceTotals => ({
  rows: 0,
  impressions: 0,
  reach: 0,
  clicks: 0,
  spend: 0,
  videoViews: 0,
  addToCarts: 0,
  conversions: 0,
  revenue: 0,
  avgFrequency: null,
});

export const compareToTarget = (value: number | null, target: number): TargetStatus => {
  if (value === null) return 'insufficient_data';
  if (value > target) return 'above';
  if (value < target) return 'below';
  return 'at';
};

/**
 * Aggregates fact rows and derives ROAS, CPA, CTR and CPM from the sums.
 * Every method is a pure function of its input rows and the targets the
 * engine was built with.
 */
export class MetricsEngine {
  constructor(private readonly targets: Readonly<MetricTargets>) {}

  aggregate(rows: readonly FactCounts[]): PerformanceTotals {
    const totals = emptyTotals();
    let frequencySum = 0;

    for (const row of rows) {
      totals.rows += 1;
      totals.impressions += row.impressions;
      totals.reach += row.reach ?? 0;
      totals.clicks += row.clicks;
      totals.spend += row.spend;
      totals.videoViews += row.videoViews ?? 0;
      totals.addToCarts += row.addToCarts ?? 0;
      totals.conversions += row.conversions;
      totals.revenue += row.revenue;
      frequencySum += row.frequency ?? 0;
    }

    totals.avgFrequency = totals.rows > 0 ? frequencySum / totals.rows : null;
    return totals;
  }

  derive(totals: Pick<PerformanceTotals, 'impressions' | 'reach' | 'clicks' | 'spend' | 'conversions' | 'revenue'>): DerivedMetrics {
    const { impressions, reach, clicks, spend, conversions, revenue } = totals;
    const cpmPerImpression = spend === 0 ? null : safeDivide(spend, impressions);

    return {
      roas: safeDivide(revenue, spend),
      cpa: safeDivide(spend, conversions),
      ctr: safeDivide(clicks, impressions),
      cpm: cpmPerImpression === null ? null : cpmPerImpression * 1000,
      conversionRate: safeDivide(conversions, clicks),
      frequency: safeDivide(impressions, reach),
    };
  }

  classify(metrics: Pick<DerivedMetrics, 'roas' | 'cpa' | 'ctr'>): TargetClassification {
    return {
      roas: compareToTarget(metrics.roas, this.targets.roasTarget),
      cpa: compareToTarget(metrics.cpa, this.targets.cpaTarget),
      ctr: compareToTarget(metrics.ctr === null ? null : metrics.ctr * 100, this.targets.ctrTarget),
    };
  }

  summarize(rows: readonly FactCounts[], key = 'all'): MetricRecord {
    const totals = this.aggregate(rows);
    const metrics = this.derive(totals);
    return { key, totals, metrics, status: this.classify(metrics) };
  }

  /**
   * One record per group. Groups are ordered by spend (highest first),
   * then by key so that the order is stable.
   */
  groupBy<T extends FactCounts>(rows: readonly T[], keyOf: (row: T) => string): MetricRecord[] {
    const groups = new Map<string, T[]>();
    for (const row of rows) {
      const key = keyOf(row);
      const bucket = groups.get(key);
      if (bucket) {
        bucket.push(row);
      } else {
        groups.set(key, [row]);
      }
    }

    return [...groups.entries()]
      .map(([key, bucket]) => this.summarize(bucket, key))
      .sort((a, b) => b.totals.spend - a.totals.spend || a.key.localeCompare(b.key));
  }

  byCampaign(rows: readonly PerformanceFact[]): MetricRecord[] {
    return this.groupBy(rows, (row) => row.campaignId);
  }

  byAd(rows: readonly PerformanceFact[]): MetricRecord[] {
    return this.groupBy(rows, (row) => row.adId);
  }

  byPlatform(rows: readonly PerformanceFact[]): MetricRecord[] {
    return this.groupBy(rows, (row) => row.platform ?? 'Unknown');
  }

  /** Daily trend for charting, oldest day first. */
  byDate(rows: readonly PerformanceFact[]): MetricRecord[] {
    return this.groupBy(rows, (row) => row.date).sort((a, b) => a.key.localeCompare(b.key));
  }
}
