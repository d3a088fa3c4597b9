import { compareToTarget, MetricsEngine } from './MetricsEngine';
import { FactCounts, MetricRecord, TargetClassification } from './types';

/** Industry reference points for country-level comparison. */
export const BENCHMARKS = Object.freeze({
  roas: 4.5,
  ctr: 0.018,
  cpa: 35.0,
});

export interface SegmentFact extends FactCounts {
  segmentType: string;
  segmentValue: string;
}

export interface CountryFact extends FactCounts {
  platform: string;
  country: string;
}

export interface CountryBenchmark extends MetricRecord {
  vsBenchmark: TargetClassification;
}

export const breakdownBySegment = (
  engine: MetricsEngine,
  rows: readonly SegmentFact[]
): MetricRecord[] => engine.groupBy(rows, (row) => row.segmentValue);

export const benchmarkCountries = (
  engine: MetricsEngine,
  rows: readonly CountryFact[]
): CountryBenchmark[] =>
  engine.groupBy(rows, (row) => row.country).map((record) => ({
    ...record,
    vsBenchmark: {
      roas: compareToTarget(record.metrics.roas, BENCHMARKS.roas),
      cpa: compareToTarget(record.metrics.cpa, BENCHMARKS.cpa),
      ctr: compareToTarget(record.metrics.ctr, BENCHMARKS.ctr),
    },
  }));
