import { Response } from 'express';
import { AppContext } from '../context';
import { AuthRequest } from '../middleware/auth';
import { loadDailyFacts } from '../services/performance/PerformanceRepository';
import { parsePerformanceFilter } from '../utils/dateRange';
import { sendError } from '../utils/http';

export const createPerformanceController = (ctx: AppContext) => {
  const ingestDaily = async (req: AuthRequest, res: Response): Promise<void> => {
    try {
      const result = await ctx.ingest.ingestDaily(req.body);
      res.status(201).json(result);
    } catch (error) {
      sendError(res, error, 'Ingest daily performance error', 'Failed to store performance data');
    }
  };

  const getDailyRows = async (req: AuthRequest, res: Response): Promise<void> => {
    try {
      const filter = parsePerformanceFilter(req.query);
      const rows = await loadDailyFacts(filter);
      res.json({ filter, rows });
    } catch (error) {
      sendError(res, error, 'Get performance data error', 'Failed to fetch performance data');
    }
  };

  return { ingestDaily, getDailyRows };
};
