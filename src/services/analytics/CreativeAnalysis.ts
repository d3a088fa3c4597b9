import { quantile } from '../../utils/stats';
import { MetricsEngine } from './MetricsEngine';
import { PerformanceFact } from './types';

export const FATIGUE_FREQUENCY_THRESHOLD = 3;
export const FATIGUE_CTR_QUANTILE = 0.4;
export const PAUSE_CPA_MULTIPLIER = 1.5;

export interface CreativeInfo {
  adId: string;
  name: string;
  creativeType?: string;
  headline?: string;
}

export interface CreativePerformance extends CreativeInfo {
  platform?: string;
  spend: number;
  revenue: number;
  impressions: number;
  clicks: number;
  conversions: number;
  avgFrequency: number;
  roas: number | null;
  cpa: number | null;
  ctr: number | null;
  fatigueWarning: boolean;
}

export type RecommendationType = 'Pause Ad' | 'Creative Fatigue';

export interface RecommendationDraft {
  generationDate: string;
  adId: string;
  recommendationType: RecommendationType;
  justification: string;
}

const money = (value: number): string => `$${value.toFixed(2)}`;

/**
 * Per-creative totals and ratios. An ad is flagged as fatigued when it is
 * shown more than three times per person on average while its CTR sits in
 * the bottom 40% of all creatives in the range.
 */
export const analyzeCreatives = (
  engine: MetricsEngine,
  rows: readonly PerformanceFact[],
  ads: readonly CreativeInfo[]
): CreativePerformance[] => {
  const adsById = new Map(ads.map((ad) => [ad.adId, ad]));

  const base = engine.byAd(rows).map((record) => {
    const info = adsById.get(record.key);
    const platform = rows.find((row) => row.adId === record.key)?.platform;
    return {
      adId: record.key,
      name: info?.name ?? record.key,
      creativeType: info?.creativeType,
      headline: info?.headline,
      platform,
      spend: record.totals.spend,
      revenue: record.totals.revenue,
      impressions: record.totals.impressions,
      clicks: record.totals.clicks,
      conversions: record.totals.conversions,
      avgFrequency: record.totals.avgFrequency ?? 0,
      roas: record.metrics.roas,
      cpa: record.metrics.cpa,
      ctr: record.metrics.ctr,
    };
  });

  const ctrCutoff = quantile(
    base.map((creative) => creative.ctr ?? 0),
    FATIGUE_CTR_QUANTILE
  );

  return base.map((creative) => ({
    ...creative,
    fatigueWarning:
      ctrCutoff !== null &&
      creative.avgFrequency > FATIGUE_FREQUENCY_THRESHOLD &&
      (creative.ctr ?? 0) < ctrCutoff,
  }));
};

export const generateRecommendations = (
  creatives: readonly CreativePerformance[],
  cpaTarget: number,
  today: string
): RecommendationDraft[] => {
  const pause = creatives
    .filter((creative) => creative.cpa !== null && creative.cpa > cpaTarget * PAUSE_CPA_MULTIPLIER)
    .map<RecommendationDraft>((creative) => ({
      generationDate: today,
      adId: creative.adId,
      recommendationType: 'Pause Ad',
      justification: `High CPA: ${money(creative.cpa ?? 0)} is >150% of ${money(cpaTarget)} target.`,
    }));

  const fatigue = creatives
    .filter((creative) => creative.fatigueWarning)
    .map<RecommendationDraft>((creative) => ({
      generationDate: today,
      adId: creative.adId,
      recommendationType: 'Creative Fatigue',
      justification: `High Frequency (${creative.avgFrequency.toFixed(1)}) and low CTR (${(
        (creative.ctr ?? 0) * 100
      ).toFixed(2)}%).`,
    }));

  return [...pause, ...fatigue];
};
