import { inverseNormalCdf, normalCdf, safeDivide, twoSidedCriticalValue } from '../../utils/stats';

export type Winner = 'A' | 'B' | 'inconclusive';

export const INSUFFICIENT_DATA = 'insufficient_data' as const;

export interface ProportionTestResult {
  variantARate: number;
  variantBRate: number;
  zScore: number;
  pValue: number;
  /** Relative change of B over A, null when A's rate is zero. */
  lift: number | null;
  criticalValue: number;
  significant: boolean;
  winner: Winner;
  confidenceLevel: number;
}

export interface InsufficientDataResult {
  variantARate: typeof INSUFFICIENT_DATA;
  variantBRate: typeof INSUFFICIENT_DATA;
  zScore: null;
  pValue: null;
  lift: null;
  criticalValue: number;
  significant: false;
  winner: typeof INSUFFICIENT_DATA;
  confidenceLevel: number;
}

export type ProportionComparison = ProportionTestResult | InsufficientDataResult;

export interface VariantCounts {
  adId: string;
  name?: string;
  impressions: number;
  clicks: number;
  conversions: number;
}

export interface VariantComparison {
  testId: string;
  variantA: VariantCounts;
  variantB: VariantCounts;
  /** conversions / clicks */
  conversionRate: ProportionComparison;
  /** clicks / impressions */
  ctr: ProportionComparison;
}

export const isInsufficient = (result: ProportionComparison): result is InsufficientDataResult =>
  result.winner === INSUFFICIENT_DATA;

const insufficientData = (criticalValue: number, confidenceLevel: number): InsufficientDataResult => ({
  variantARate: INSUFFICIENT_DATA,
  variantBRate: INSUFFICIENT_DATA,
  zScore: null,
  pValue: null,
  lift: null,
  criticalValue,
  significant: false,
  winner: INSUFFICIENT_DATA,
  confidenceLevel,
});

/**
 * Two-proportion z-test of x1/n1 against x2/n2 with a pooled standard error.
 * The null hypothesis (equal rates) is rejected when |z| exceeds the two-sided
 * critical value for `confidenceLevel`.
 */
export const twoProportionZTest = (
  x1: number,
  n1: number,
  x2: number,
  n2: number,
  confidenceLevel = 0.95
): ProportionComparison => {
  const criticalValue = twoSidedCriticalValue(confidenceLevel);

  // Successes outside [0, n] are not a proportion (e.g. view-through conversions above clicks)
  const outOfRange = (x: number, n: number): boolean => n <= 0 || x < 0 || x > n;
  if (outOfRange(x1, n1) || outOfRange(x2, n2)) {
    return insufficientData(criticalValue, confidenceLevel);
  }

  const p1 = x1 / n1;
  const p2 = x2 / n2;
  const pooled = (x1 + x2) / (n1 + n2);
  const standardError = Math.sqrt(pooled * (1 - pooled) * (1 / n1 + 1 / n2));
  if (!Number.isFinite(standardError)) {
    return insufficientData(criticalValue, confidenceLevel);
  }

  // Zero variance (no successes, or nothing but successes) leaves z undefined
  const zScore = standardError === 0 ? 0 : (p1 - p2) / standardError;
  const pValue = standardError === 0 ? 1 : Math.min(1, 2 * (1 - normalCdf(Math.abs(zScore))));
  const significant = Math.abs(zScore) > criticalValue;

  let winner: Winner = 'inconclusive';
  if (significant) {
    winner = p1 > p2 ? 'A' : 'B';
  }

  const lift = safeDivide(p2 - p1, p1);

  return {
    variantARate: p1,
    variantBRate: p2,
    zScore,
    pValue,
    lift,
    criticalValue,
    significant,
    winner,
    confidenceLevel,
  };
};

/**
 * Compares two ads of one test on conversion rate and on CTR, each tested
 * independently.
 */
export const compareVariants = (
  testId: string,
  variantA: VariantCounts,
  variantB: VariantCounts,
  confidenceLevel = 0.95
): VariantComparison => ({
  testId,
  variantA,
  variantB,
  conversionRate: twoProportionZTest(
    variantA.conversions,
    variantA.clicks,
    variantB.conversions,
    variantB.clicks,
    confidenceLevel
  ),
  ctr: twoProportionZTest(
    variantA.clicks,
    variantA.impressions,
    variantB.clicks,
    variantB.impressions,
    confidenceLevel
  ),
});

/**
 * Picks the two variants with the most impressions (ties broken by ad id)
 * so tests with a third arm still produce one pairwise comparison.
 * Returns null when fewer than two variants have been served.
 */
export const pickVariantPair = (
  variants: readonly VariantCounts[]
): [VariantCounts, VariantCounts] | null => {
  if (variants.length < 2) return null;
  const [first, second] = [...variants]
    .sort((a, b) => b.impressions - a.impressions || a.adId.localeCompare(b.adId))
    .slice(0, 2)
    .sort((a, b) => a.adId.localeCompare(b.adId));
  return [first, second];
};

/**
 * Per-variant sample size needed to detect a relative lift of
 * `minimumDetectableEffect` over `baselineRate`.
 */
export const requiredSampleSize = (
  baselineRate: number,
  minimumDetectableEffect: number,
  alpha = 0.05,
  power = 0.8
): number => {
  if (!(baselineRate > 0 && baselineRate < 1)) {
    throw new RangeError('baselineRate must be between 0 and 1');
  }
  if (!(minimumDetectableEffect > 0)) {
    throw new RangeError('minimumDetectableEffect must be positive');
  }
  const p1 = baselineRate;
  const p2 = baselineRate * (1 + minimumDetectableEffect);
  if (p2 >= 1) {
    throw new RangeError('baselineRate * (1 + minimumDetectableEffect) must stay below 1');
  }

  const zAlpha = inverseNormalCdf(1 - alpha / 2);
  const zBeta = inverseNormalCdf(power);
  const n =
    ((zAlpha * Math.sqrt(2 * p1 * (1 - p1)) + zBeta * Math.sqrt(p1 * (1 - p1) + p2 * (1 - p2))) /
      (p2 - p1)) **
    2;
  return Math.ceil(n);
};
