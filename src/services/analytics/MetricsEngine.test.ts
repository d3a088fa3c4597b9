import { describe, it, expect } from 'vitest';
import { DEFAULT_ANALYTICS } from '../../config/env';
import { compareToTarget, MetricsEngine } from './MetricsEngine';
import { PerformanceFact } from './types';

const engine = new MetricsEngine(DEFAULT_ANALYTICS);

const rows: PerformanceFact[] = [
  {
    date: '2025-10-01',
    adId: 'AD1',
    campaignId: 'C1',
    platform: 'Meta',
    impressions: 1000,
    reach: 800,
    frequency: 1.25,
    clicks: 20,
    spend: 50,
    conversions: 2,
    revenue: 150,
  },
  {
    date: '2025-10-02',
    adId: 'AD1',
    campaignId: 'C1',
    platform: 'Meta',
    impressions: 1000,
    reach: 500,
    frequency: 2,
    clicks: 10,
    spend: 50,
    conversions: 0,
    revenue: 0,
  },
  {
    date: '2025-10-01',
    adId: 'AD2',
    campaignId: 'C2',
    platform: 'Google',
    impressions: 500,
    clicks: 25,
    spend: 30,
    conversions: 1,
    revenue: 90,
  },
];

describe('compareToTarget', () => {
  it('classifies values against a target', () => {
    expect(compareToTarget(3, 2.5)).toBe('above');
    expect(compareToTarget(2.5, 2.5)).toBe('at');
    expect(compareToTarget(1, 2.5)).toBe('below');
    expect(compareToTarget(null, 2.5)).toBe('insufficient_data');
  });
});

describe('MetricsEngine', () => {
  it('sums counters and averages frequency over rows', () => {
    const totals = engine.aggregate(rows);

    expect(totals).toMatchObject({
      rows: 3,
      impressions: 2500,
      reach: 1300,
      clicks: 55,
      spend: 130,
      conversions: 3,
      revenue: 240,
      videoViews: 0,
      addToCarts: 0,
    });
    expect(totals.avgFrequency).toBeCloseTo(3.25 / 3, 10);
  });

  it('derives ratios from the summed counters', () => {
    const { metrics, status } = engine.summarize(rows);

    expect(metrics.roas).toBeCloseTo(240 / 130, 10);
    expect(metrics.cpa).toBeCloseTo(130 / 3, 10);
    expect(metrics.ctr).toBeCloseTo(0.022, 10);
    expect(metrics.cpm).toBeCloseTo(52, 10);
    expect(metrics.conversionRate).toBeCloseTo(3 / 55, 10);
    expect(metrics.frequency).toBeCloseTo(2500 / 1300, 10);
    expect(status).toEqual({ roas: 'below', cpa: 'above', ctr: 'above' });
  });

  it('returns null ROAS and CPM when nothing was spent', () => {
    const { metrics, status } = engine.summarize([
      { impressions: 100, clicks: 5, spend: 0, conversions: 0, revenue: 0 },
    ]);

    expect(metrics.roas).toBeNull();
    expect(metrics.cpm).toBeNull();
    expect(metrics.cpa).toBeNull();
    expect(metrics.ctr).toBe(0.05);
    expect(status.roas).toBe('insufficient_data');
    expect(status.cpa).toBe('insufficient_data');
  });

  it('returns null CTR and CPM without impressions', () => {
    const { metrics } = engine.summarize([
      { impressions: 0, clicks: 0, spend: 10, conversions: 1, revenue: 20 },
    ]);

    expect(metrics.ctr).toBeNull();
    expect(metrics.cpm).toBeNull();
    expect(metrics.roas).toBe(2);
  });

  it('handles an empty row set', () => {
    const record = engine.summarize([]);

    expect(record.totals.rows).toBe(0);
    expect(record.totals.avgFrequency).toBeNull();
    expect(record.metrics).toEqual({
      roas: null,
      cpa: null,
      ctr: null,
      cpm: null,
      conversionRate: null,
      frequency: null,
    });
  });

  it('produces identical output when run twice', () => {
    expect(engine.summarize(rows)).toEqual(engine.summarize(rows));
    expect(engine.byCampaign(rows)).toEqual(engine.byCampaign(rows));
  });

  it('groups by campaign with the highest spend first', () => {
    const campaigns = engine.byCampaign(rows);

    expect(campaigns.map((c) => c.key)).toEqual(['C1', 'C2']);
    expect(campaigns[0].metrics.roas).toBe(1.5);
    expect(campaigns[0].metrics.cpa).toBe(50);
    expect(campaigns[0].metrics.ctr).toBe(0.015);
  });

  it('groups by platform and labels rows without one', () => {
    const platforms = engine.byPlatform([
      ...rows,
      { date: '2025-10-01', adId: 'AD3', campaignId: 'C3', impressions: 10, clicks: 1, spend: 1, conversions: 0, revenue: 0 },
    ]);

    expect(platforms.map((p) => p.key)).toEqual(['Meta', 'Google', 'Unknown']);
  });

  it('orders the daily trend by date', () => {
    expect(engine.byDate(rows).map((d) => d.key)).toEqual(['2025-10-01', '2025-10-02']);
  });
});
