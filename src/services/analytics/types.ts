/** The counters every fact table shares. */
export interface FactCounts {
  impressions: number;
  clicks: number;
  spend: number;
  conversions: number;
  revenue: number;
  reach?: number;
  frequency?: number;
  videoViews?: number;
  addToCarts?: number;
}

/**
 * A daily fact row as the analytics services see it: plain numbers,
 * detached from the mongoose document it was loaded from.
 */
export interface PerformanceFact extends FactCounts {
  date: string;
  adId: string;
  campaignId: string;
  platform?: string;
}

export interface PerformanceTotals {
  rows: number;
  impressions: number;
  reach: number;
  clicks: number;
  spend: number;
  videoViews: number;
  addToCarts: number;
  conversions: number;
  revenue: number;
  /** Mean of the per-row frequency column, null when there are no rows. */
  avgFrequency: number | null;
}

/** Derived ratios. A null value means its denominator was zero. */
export interface DerivedMetrics {
  roas: number | null;
  cpa: number | null;
  /** Fraction of impressions that were clicked (0.018 = 1.8%). */
  ctr: number | null;
  cpm: number | null;
  conversionRate: number | null;
  frequency: number | null;
}

export type TargetStatus = 'above' | 'at' | 'below' | 'insufficient_data';

export interface TargetClassification {
  roas: TargetStatus;
  cpa: TargetStatus;
  ctr: TargetStatus;
}

export interface MetricRecord {
  key: string;
  totals: PerformanceTotals;
  metrics: DerivedMetrics;
  status: TargetClassification;
}

export interface MetricTargets {
  roasTarget: number;
  cpaTarget: number;
  /** In percent. */
  ctrTarget: number;
}
