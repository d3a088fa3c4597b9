import dayjs from 'dayjs';
import { ValidationError } from './errors';

export const DATE_FORMAT = 'YYYY-MM-DD';

export const DEFAULT_RANGE_DAYS = 30;

export interface DateRange {
  since: string;
  until: string;
}

export interface PerformanceFilter extends DateRange {
  platforms: string[];
  campaignIds: string[];
}

/** True for real calendar dates written as YYYY-MM-DD. */
export const isIsoDate = (value: string): boolean =>
  /^\d{4}-\d{2}-\d{2}$/.test(value) && dayjs(value).format(DATE_FORMAT) === value;

export const formatDate = (date: Date | dayjs.Dayjs | string): string =>
  dayjs(date).format(DATE_FORMAT);

export const addDays = (date: string, days: number): string =>
  dayjs(date).add(days, 'day').format(DATE_FORMAT);

/** Whole days from `from` to `to` (negative when `to` is earlier). */
export const diffDays = (from: string, to: string): number =>
  dayjs(to).startOf('day').diff(dayjs(from).startOf('day'), 'day');

const readString = (value: unknown): string | undefined => {
  if (typeof value === 'string' && value.trim().length > 0) return value.trim();
  return undefined;
};

/** Splits `a,b,c` query values; repeated query keys are accepted too. */
export const parseList = (value: unknown): string[] => {
  const parts = Array.isArray(value) ? value : [value];
  return parts
    .flatMap((part) => (typeof part === 'string' ? part.split(',') : []))
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
};

/**
 * Reads `since`/`until` from a query string. Missing bounds default to the
 * last 30 days ending `today`.
 */
export const parseDateRange = (
  query: Record<string, unknown>,
  today: string = formatDate(new Date())
): DateRange => {
  const until = readString(query.until) ?? today;
  const since = readString(query.since) ?? addDays(until, -(DEFAULT_RANGE_DAYS - 1));

  if (!isIsoDate(since) || !isIsoDate(until)) {
    throw new ValidationError('since and until must be dates formatted as YYYY-MM-DD');
  }
  if (since > until) {
    throw new ValidationError('since must not be after until');
  }
  return { since, until };
};

export const parsePerformanceFilter = (
  query: Record<string, unknown>,
  today?: string
): PerformanceFilter => ({
  ...parseDateRange(query, today),
  platforms: parseList(query.platforms),
  campaignIds: parseList(query.campaigns),
});
