import mongoose from 'mongoose';
import { Ad } from '../../models/Ad';
import { Campaign } from '../../models/Campaign';
import { DailyPerformance } from '../../models/DailyPerformance';
import { DuplicateFactError } from '../../utils/errors';
import { PerformanceFact } from '../analytics/types';

/**
 * Storage seam for the ingest service.
 */
export interface FactStore {
  adExists(adId: string): Promise<boolean>;
  campaignExists(campaignId: string): Promise<boolean>;
  hasDaily(date: string, adId: string): Promise<boolean>;
  insertDaily(rows: readonly PerformanceFact[]): Promise<number>;
}

const DUPLICATE_KEY = 11000;

const isDuplicateKeyError = (error: unknown): error is mongoose.mongo.MongoServerError =>
  error instanceof mongoose.mongo.MongoServerError && error.code === DUPLICATE_KEY;

const firstWriteErrorIndex = (error: mongoose.mongo.MongoServerError): number | null => {
  if (!(error instanceof mongoose.mongo.MongoBulkWriteError)) return null;
  const writeErrors = Array.isArray(error.writeErrors) ? error.writeErrors : [error.writeErrors];
  return writeErrors[0]?.index ?? null;
};

/**
 * Maps a duplicate-key failure to the `(date, adId)` pair that collided,
 * read from the server's `keyValue`, else from the failed write's index.
 * Returns null for any other error.
 */
export const toDuplicateFactError = (
  error: unknown,
  rows: readonly PerformanceFact[]
): DuplicateFactError | null => {
  if (!isDuplicateKeyError(error)) return null;

  const key = error.keyValue;
  if (key && typeof key.date === 'string' && typeof key.adId === 'string') {
    return new DuplicateFactError(key.date, key.adId);
  }

  const index = firstWriteErrorIndex(error);
  const row = index === null ? undefined : rows[index];
  return new DuplicateFactError(row?.date ?? 'unknown date', row?.adId ?? 'unknown ad');
};

export class MongoFactStore implements FactStore {
  async adExists(adId: string): Promise<boolean> {
    return (await Ad.exists({ adId })) !== null;
  }

  async campaignExists(campaignId: string): Promise<boolean> {
    return (await Campaign.exists({ campaignId })) !== null;
  }

  async hasDaily(date: string, adId: string): Promise<boolean> {
    return (await DailyPerformance.exists({ date, adId })) !== null;
  }

  async insertDaily(rows: readonly PerformanceFact[]): Promise<number> {
    try {
      const docs = await DailyPerformance.insertMany([...rows], { ordered: true });
      return docs.length;
    } catch (error) {
      // A concurrent writer got there first; the unique index has the last word
      throw toDuplicateFactError(error, rows) ?? error;
    }
  }
}
