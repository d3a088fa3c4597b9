import { describe, it, expect } from 'vitest';
import {
  addDays,
  diffDays,
  isIsoDate,
  parseDateRange,
  parseList,
  parsePerformanceFilter,
} from './dateRange';
import { ValidationError } from './errors';

describe('isIsoDate', () => {
  it('accepts real calendar dates only', () => {
    expect(isIsoDate('2024-02-29')).toBe(true);
    expect(isIsoDate('2025-02-29')).toBe(false);
    expect(isIsoDate('2025-1-5')).toBe(false);
    expect(isIsoDate('yesterday')).toBe(false);
  });
});

describe('day arithmetic', () => {
  it('adds and diffs whole days across month ends', () => {
    expect(addDays('2025-10-01', -1)).toBe('2025-09-30');
    expect(diffDays('2025-10-01', '2025-10-10')).toBe(9);
    expect(diffDays('2025-10-10', '2025-10-01')).toBe(-9);
  });
});

describe('parseList', () => {
  it('splits comma separated values and drops blanks', () => {
    expect(parseList('Meta, Google,,')).toEqual(['Meta', 'Google']);
  });

  it('accepts repeated query keys', () => {
    expect(parseList(['a,b', 'c'])).toEqual(['a', 'b', 'c']);
  });

  it('returns an empty list for missing values', () => {
    expect(parseList(undefined)).toEqual([]);
  });
});

describe('parseDateRange', () => {
  it('defaults to the 30 days ending today', () => {
    expect(parseDateRange({}, '2025-10-30')).toEqual({ since: '2025-10-01', until: '2025-10-30' });
  });

  it('rejects an inverted range', () => {
    expect(() => parseDateRange({ since: '2025-10-05', until: '2025-10-01' })).toThrow(
      'since must not be after until'
    );
  });

  it('rejects malformed dates', () => {
    expect(() => parseDateRange({ since: '10/01/2025' }, '2025-10-30')).toThrow(ValidationError);
  });
});

describe('parsePerformanceFilter', () => {
  it('reads dates, platforms and campaigns', () => {
    expect(
      parsePerformanceFilter(
        { until: '2025-10-10', platforms: 'Meta,Google', campaigns: 'META_C01' },
        '2025-12-01'
      )
    ).toEqual({
      since: '2025-09-11',
      until: '2025-10-10',
      platforms: ['Meta', 'Google'],
      campaignIds: ['META_C01'],
    });
  });
});
