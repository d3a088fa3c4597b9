import { Router } from 'express';
import { AppContext } from '../context';
import { createBudgetController } from '../controllers/budgetController';
import { createAuthenticate } from '../middleware/auth';
import { requirePage } from '../middleware/requirePage';

export const createBudgetRoutes = (ctx: AppContext): Router => {
  const router = Router();
  const { getPacing, getCampaignPacing } = createBudgetController(ctx);

  router.use(createAuthenticate(ctx.config.jwtSecret), requirePage(ctx, 'Budget_Pacing'));

  router.get('/pacing', getPacing);
  router.get('/:campaignId/pacing', getCampaignPacing);

  return router;
};
