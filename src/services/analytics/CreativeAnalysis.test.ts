import { describe, it, expect } from 'vitest';
import { DEFAULT_ANALYTICS } from '../../config/env';
import { analyzeCreatives, generateRecommendations } from './CreativeAnalysis';
import { MetricsEngine } from './MetricsEngine';
import { PerformanceFact } from './types';

const engine = new MetricsEngine(DEFAULT_ANALYTICS);

const row = (adId: string, values: Partial<PerformanceFact>): PerformanceFact => ({
  date: '2025-10-05',
  adId,
  campaignId: 'C1',
  platform: 'Meta',
  impressions: 1000,
  clicks: 0,
  spend: 0,
  conversions: 0,
  revenue: 0,
  ...values,
});

const rows = [
  row('AD1', { clicks: 30, spend: 40, conversions: 2, revenue: 100, frequency: 1.5 }),
  row('AD2', { clicks: 10, spend: 120, conversions: 2, revenue: 60, frequency: 3.5 }),
  row('AD3', { clicks: 20, spend: 30, frequency: 4 }),
];

const ads = [
  { adId: 'AD1', name: 'Spring A', creativeType: 'Video' },
  { adId: 'AD2', name: 'Spring B', creativeType: 'Video' },
];

describe('analyzeCreatives', () => {
  it('orders creatives by spend and fills in ad details', () => {
    const creatives = analyzeCreatives(engine, rows, ads);

    expect(creatives.map((c) => c.adId)).toEqual(['AD2', 'AD1', 'AD3']);
    expect(creatives[0]).toMatchObject({ name: 'Spring B', creativeType: 'Video', platform: 'Meta', cpa: 60 });
    expect(creatives[2].name).toBe('AD3');
    expect(creatives[2].cpa).toBeNull();
  });

  it('flags high frequency creatives with a bottom-quantile CTR', () => {
    const fatigue = Object.fromEntries(
      analyzeCreatives(engine, rows, ads).map((c) => [c.adId, c.fatigueWarning])
    );

    expect(fatigue).toEqual({ AD1: false, AD2: true, AD3: false });
  });

  it('returns nothing for no rows', () => {
    expect(analyzeCreatives(engine, [], ads)).toEqual([]);
  });
});

describe('generateRecommendations', () => {
  it('suggests pausing expensive ads and refreshing fatigued ones', () => {
    const drafts = generateRecommendations(analyzeCreatives(engine, rows, ads), 35, '2025-10-06');

    expect(drafts).toEqual([
      {
        generationDate: '2025-10-06',
        adId: 'AD2',
        recommendationType: 'Pause Ad',
        justification: 'High CPA: $60.00 is >150% of $35.00 target.',
      },
      {
        generationDate: '2025-10-06',
        adId: 'AD2',
        recommendationType: 'Creative Fatigue',
        justification: 'High Frequency (3.5) and low CTR (1.00%).',
      },
    ]);
  });

  it('leaves ads within target alone', () => {
    const drafts = generateRecommendations(analyzeCreatives(engine, rows.slice(0, 1), ads), 35, '2025-10-06');
    expect(drafts).toEqual([]);
  });
});
