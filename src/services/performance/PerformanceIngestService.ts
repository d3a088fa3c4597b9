import logger from '../../utils/logger';
import { isIsoDate } from '../../utils/dateRange';
import { DuplicateFactError, MissingReferenceError, ValidationError } from '../../utils/errors';
import { PerformanceFact } from '../analytics/types';
import { FactStore } from './FactStore';

type Counter = keyof Omit<Required<PerformanceFact>, 'date' | 'adId' | 'campaignId' | 'platform'>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readId = (raw: Record<string, unknown>, key: string, index: number): string => {
  const value = raw[key];
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError(`Row ${index}: ${key} is required`);
  }
  return value.trim();
};

const readCounter = (raw: Record<string, unknown>, key: Counter, index: number): number => {
  const value = raw[key];
  if (value === undefined || value === null) return 0;
  const num = typeof value === 'string' ? Number(value) : value;
  if (typeof num !== 'number' || !Number.isFinite(num) || num < 0) {
    throw new ValidationError(`Row ${index}: ${key} must be a non-negative number`);
  }
  return num;
};

/** Validates one incoming daily row. */
export const parseDailyRow = (raw: unknown, index: number): PerformanceFact => {
  if (!isRecord(raw)) {
    throw new ValidationError(`Row ${index}: expected an object`);
  }

  const date = readId(raw, 'date', index);
  if (!isIsoDate(date)) {
    throw new ValidationError(`Row ${index}: date must be formatted as YYYY-MM-DD`);
  }

  return {
    date,
    adId: readId(raw, 'adId', index),
    campaignId: readId(raw, 'campaignId', index),
    impressions: readCounter(raw, 'impressions', index),
    reach: readCounter(raw, 'reach', index),
    frequency: readCounter(raw, 'frequency', index),
    clicks: readCounter(raw, 'clicks', index),
    spend: readCounter(raw, 'spend', index),
    videoViews: readCounter(raw, 'videoViews', index),
    addToCarts: readCounter(raw, 'addToCarts', index),
    conversions: readCounter(raw, 'conversions', index),
    revenue: readCounter(raw, 'revenue', index),
  };
};

/**
 * Appends daily fact rows. A batch is accepted whole or not at all: every
 * row must reference a known ad and campaign and must not repeat a
 * (date, adId) pair, within the batch or already stored.
 */
export class PerformanceIngestService {
  constructor(private readonly store: FactStore) {}

  async ingestDaily(input: unknown): Promise<{ inserted: number }> {
    if (!Array.isArray(input) || input.length === 0) {
      throw new ValidationError('Expected a non-empty array of rows');
    }

    const rows = input.map((raw, index) => parseDailyRow(raw, index));

    const seen = new Set<string>();
    for (const row of rows) {
      const key = `${row.date}|${row.adId}`;
      if (seen.has(key)) {
        throw new DuplicateFactError(row.date, row.adId);
      }
      seen.add(key);
    }

    await this.checkReferences(rows);

    for (const row of rows) {
      if (await this.store.hasDaily(row.date, row.adId)) {
        throw new DuplicateFactError(row.date, row.adId);
      }
    }

    const inserted = await this.store.insertDaily(rows);
    logger.info(`Ingested ${inserted} daily performance rows`);
    return { inserted };
  }

  private async checkReferences(rows: readonly PerformanceFact[]): Promise<void> {
    const adIds = new Set(rows.map((row) => row.adId));
    const campaignIds = new Set(rows.map((row) => row.campaignId));

    for (const adId of adIds) {
      if (!(await this.store.adExists(adId))) {
        throw new MissingReferenceError('ad', adId);
      }
    }
    for (const campaignId of campaignIds) {
      if (!(await this.store.campaignExists(campaignId))) {
        throw new MissingReferenceError('campaign', campaignId);
      }
    }
  }
}
