import { describe, it, expect } from 'vitest';
import { DEFAULT_ANALYTICS } from '../../config/env';
import { benchmarkCountries, breakdownBySegment } from './Benchmarking';
import { MetricsEngine } from './MetricsEngine';

const engine = new MetricsEngine(DEFAULT_ANALYTICS);

describe('benchmarkCountries', () => {
  it('compares each country against the industry benchmarks', () => {
    const countries = benchmarkCountries(engine, [
      { platform: 'Meta', country: 'CA', impressions: 5000, clicks: 50, spend: 80, conversions: 1, revenue: 200 },
      { platform: 'Meta', country: 'US', impressions: 6000, clicks: 150, spend: 60, conversions: 2, revenue: 300 },
      { platform: 'Google', country: 'US', impressions: 4000, clicks: 100, spend: 40, conversions: 2, revenue: 200 },
    ]);

    expect(countries.map((c) => c.key)).toEqual(['US', 'CA']);
    expect(countries[0].vsBenchmark).toEqual({ roas: 'above', ctr: 'above', cpa: 'below' });
    expect(countries[1].vsBenchmark).toEqual({ roas: 'below', ctr: 'below', cpa: 'above' });
  });
});

describe('breakdownBySegment', () => {
  it('groups rows by segment value', () => {
    const segments = breakdownBySegment(engine, [
      { segmentType: 'age', segmentValue: '35-44', impressions: 400, clicks: 4, spend: 40, conversions: 1, revenue: 50 },
      { segmentType: 'age', segmentValue: '25-34', impressions: 600, clicks: 6, spend: 60, conversions: 2, revenue: 90 },
      { segmentType: 'age', segmentValue: '25-34', impressions: 100, clicks: 1, spend: 10, conversions: 0, revenue: 0 },
    ]);

    expect(segments.map((s) => [s.key, s.totals.spend, s.totals.rows])).toEqual([
      ['25-34', 70, 2],
      ['35-44', 40, 1],
    ]);
  });
});
