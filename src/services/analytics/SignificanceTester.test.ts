import { describe, it, expect } from 'vitest';
import {
  compareVariants,
  isInsufficient,
  pickVariantPair,
  requiredSampleSize,
  twoProportionZTest,
} from './SignificanceTester';

describe('twoProportionZTest', () => {
  it('picks B when its rate is significantly higher', () => {
    const result = twoProportionZTest(10, 100, 30, 100);
    if (isInsufficient(result)) throw new Error('expected a test result');

    expect(result.variantARate).toBe(0.1);
    expect(result.variantBRate).toBe(0.3);
    expect(result.zScore).toBeCloseTo(-3.5355, 4);
    expect(result.pValue).toBeLessThan(0.001);
    expect(result.lift).toBeCloseTo(2, 10);
    expect(result.significant).toBe(true);
    expect(result.winner).toBe('B');
  });

  it('picks A when its rate is significantly higher', () => {
    const result = twoProportionZTest(30, 100, 10, 100);

    expect(result.zScore).toBeCloseTo(3.5355, 4);
    expect(result.winner).toBe('A');
  });

  it('is inconclusive for a small difference', () => {
    const result = twoProportionZTest(10, 100, 12, 100);

    expect(result.significant).toBe(false);
    expect(result.winner).toBe('inconclusive');
  });

  it('honours a stricter confidence level', () => {
    const result = twoProportionZTest(10, 100, 30, 100, 0.9999);

    expect(result.criticalValue).toBeCloseTo(3.8906, 3);
    expect(result.significant).toBe(false);
    expect(result.winner).toBe('inconclusive');
  });

  it('reports insufficient data when a variant has no trials', () => {
    const result = twoProportionZTest(0, 0, 0, 0);

    expect(isInsufficient(result)).toBe(true);
    expect(result.variantARate).toBe('insufficient_data');
    expect(result.variantBRate).toBe('insufficient_data');
    expect(result.winner).toBe('insufficient_data');
    expect(result.zScore).toBeNull();
    expect(twoProportionZTest(5, 50, 0, 0).winner).toBe('insufficient_data');
  });

  it('reports insufficient data when successes exceed trials', () => {
    const result = twoProportionZTest(30, 10, 15, 10);

    expect(isInsufficient(result)).toBe(true);
    expect(result.variantARate).toBe('insufficient_data');
    expect(result.zScore).toBeNull();
    expect(result.significant).toBe(false);
    expect(twoProportionZTest(5, 10, 12, 10).winner).toBe('insufficient_data');
    expect(twoProportionZTest(-1, 10, 2, 10).winner).toBe('insufficient_data');
  });

  it('reports insufficient data when the standard error is not a number', () => {
    const result = twoProportionZTest(Number.NaN, 10, 2, 10);

    expect(result.winner).toBe('insufficient_data');
    expect(result.pValue).toBeNull();
  });

  it('treats zero variance as no difference', () => {
    const result = twoProportionZTest(0, 100, 0, 100);

    expect(result.zScore).toBe(0);
    expect(result.pValue).toBe(1);
    expect(result.lift).toBeNull();
    expect(result.winner).toBe('inconclusive');
  });
});

describe('compareVariants', () => {
  it('tests conversion rate and CTR independently', () => {
    const comparison = compareVariants(
      'TEST01',
      { adId: 'A', impressions: 1000, clicks: 100, conversions: 10 },
      { adId: 'B', impressions: 1000, clicks: 100, conversions: 30 }
    );

    expect(comparison.testId).toBe('TEST01');
    expect(comparison.conversionRate.winner).toBe('B');
    expect(comparison.ctr.zScore).toBe(0);
    expect(comparison.ctr.winner).toBe('inconclusive');
  });

  it('does not crown a winner from conversions above clicks', () => {
    const comparison = compareVariants(
      'TEST01',
      { adId: 'A', impressions: 1000, clicks: 10, conversions: 12 },
      { adId: 'B', impressions: 1000, clicks: 10, conversions: 2 }
    );

    expect(comparison.conversionRate.winner).toBe('insufficient_data');
    expect(comparison.conversionRate.significant).toBe(false);
    expect(comparison.ctr.variantARate).toBe(0.01);
  });
});

describe('pickVariantPair', () => {
  it('needs at least two variants', () => {
    expect(pickVariantPair([])).toBeNull();
    expect(pickVariantPair([{ adId: 'A', impressions: 10, clicks: 1, conversions: 0 }])).toBeNull();
  });

  it('keeps the two most served variants in ad id order', () => {
    const pair = pickVariantPair([
      { adId: 'A', impressions: 500, clicks: 5, conversions: 1 },
      { adId: 'C', impressions: 700, clicks: 7, conversions: 1 },
      { adId: 'B', impressions: 900, clicks: 9, conversions: 1 },
    ]);

    expect(pair?.map((variant) => variant.adId)).toEqual(['B', 'C']);
  });
});

describe('requiredSampleSize', () => {
  it('computes the per-variant sample for a relative lift', () => {
    expect(requiredSampleSize(0.1, 0.2)).toBe(3623);
  });

  it('rejects rates and effects that cannot be tested', () => {
    expect(() => requiredSampleSize(0, 0.2)).toThrow(RangeError);
    expect(() => requiredSampleSize(0.1, 0)).toThrow(RangeError);
    expect(() => requiredSampleSize(0.9, 0.2)).toThrow(RangeError);
  });
});
