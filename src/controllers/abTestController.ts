import { Response } from 'express';
import { AppContext } from '../context';
import { AuthRequest } from '../middleware/auth';
import { ABTest } from '../models/ABTest';
import {
  compareVariants,
  INSUFFICIENT_DATA,
  pickVariantPair,
  requiredSampleSize,
} from '../services/analytics/SignificanceTester';
import { loadVariantCounts } from '../services/performance/PerformanceRepository';
import { parseDateRange } from '../utils/dateRange';
import { ValidationError } from '../utils/errors';
import { sendError, queryString } from '../utils/http';

const readRate = (value: unknown, name: string): number => {
  const parsed = Number(queryString(value));
  if (!Number.isFinite(parsed)) {
    throw new ValidationError(`${name} must be a number`);
  }
  return parsed;
};

export const createAbTestController = (ctx: AppContext) => {
  const confidenceLevel = ctx.config.analytics.abConfidenceLevel;

  const listTests = async (_req: AuthRequest, res: Response): Promise<void> => {
    try {
      const tests = await ABTest.find().sort({ startDate: -1, testId: 1 }).lean();
      res.json({ tests });
    } catch (error) {
      sendError(res, error, 'List A/B tests error', 'Failed to fetch A/B tests');
    }
  };

  const getTestResult = async (req: AuthRequest, res: Response): Promise<void> => {
    try {
      const { testId } = req.params;
      const test = await ABTest.findOne({ testId }).lean();
      if (!test) {
        res.status(404).json({ error: 'A/B test not found' });
        return;
      }

      const hasRange = Boolean(req.query.since || req.query.until);
      const variants = await loadVariantCounts(testId, hasRange ? parseDateRange(req.query) : undefined);
      const pair = pickVariantPair(variants);

      if (!pair) {
        res.json({
          test,
          variants,
          result: INSUFFICIENT_DATA,
          message: 'At least two ads with data are needed to compare variants',
        });
        return;
      }

      res.json({
        test,
        variants,
        result: compareVariants(testId, pair[0], pair[1], confidenceLevel),
      });
    } catch (error) {
      sendError(res, error, 'A/B test result error', 'Failed to evaluate A/B test');
    }
  };

  const getSampleSize = async (req: AuthRequest, res: Response): Promise<void> => {
    try {
      const baselineRate = readRate(req.query.baselineRate, 'baselineRate');
      const minimumDetectableEffect = readRate(req.query.mde, 'mde');
      const alpha = 1 - confidenceLevel;

      let perVariant: number;
      try {
        perVariant = requiredSampleSize(baselineRate, minimumDetectableEffect, alpha);
      } catch (error) {
        if (error instanceof RangeError) throw new ValidationError(error.message);
        throw error;
      }

      res.json({ baselineRate, minimumDetectableEffect, confidenceLevel, perVariant });
    } catch (error) {
      sendError(res, error, 'Sample size error', 'Failed to compute sample size');
    }
  };

  return { listTests, getTestResult, getSampleSize };
};
