import { Response } from 'express';
import { AppContext } from '../context';
import { AuthRequest } from '../middleware/auth';
import { BudgetWindow, PacingBatch } from '../services/analytics/BudgetPacer';
import { loadBudgets, loadSpendToDate } from '../services/performance/PerformanceRepository';
import { formatDate, isIsoDate } from '../utils/dateRange';
import { ValidationError } from '../utils/errors';
import { sendError, queryString } from '../utils/http';
import logger from '../utils/logger';

const readAsOf = (value: unknown): string => {
  const asOf = queryString(value) ?? formatDate(new Date());
  if (!isIsoDate(asOf)) {
    throw new ValidationError('asOf must be a date formatted as YYYY-MM-DD');
  }
  return asOf;
};

export const createBudgetController = (ctx: AppContext) => {
  const paceAll = async (budgets: BudgetWindow[], asOf: string): Promise<PacingBatch> => {
    const spend = await loadSpendToDate(
      budgets.map((budget) => budget.campaignId),
      asOf
    );
    const batch = ctx.pacer.paceAll(budgets, spend, asOf);
    for (const invalid of batch.invalid) {
      logger.warn(`Skipping budget pacing: ${invalid.reason}`);
    }
    return batch;
  };

  const getPacing = async (req: AuthRequest, res: Response): Promise<void> => {
    try {
      const asOf = readAsOf(req.query.asOf);
      const budgets = await loadBudgets();
      const { records, invalid } = await paceAll(budgets, asOf);
      res.json({ asOf, campaigns: records, invalidBudgets: invalid });
    } catch (error) {
      sendError(res, error, 'Budget pacing error', 'Failed to compute budget pacing');
    }
  };

  const getCampaignPacing = async (req: AuthRequest, res: Response): Promise<void> => {
    try {
      const asOf = readAsOf(req.query.asOf);
      const budgets = await loadBudgets(req.params.campaignId);
      if (budgets.length === 0) {
        res.status(404).json({ error: 'No budget found for campaign' });
        return;
      }

      const { records, invalid } = await paceAll(budgets, asOf);
      if (records.length === 0) {
        res.status(422).json({ error: invalid[0]?.reason ?? 'Budget cannot be paced' });
        return;
      }
      res.json(records[0]);
    } catch (error) {
      sendError(res, error, 'Budget pacing error', 'Failed to compute budget pacing');
    }
  };

  return { getPacing, getCampaignPacing };
};
