import { Router } from 'express';
import { AppContext } from '../context';
import { createPerformanceController } from '../controllers/performanceController';
import { createAuthenticate } from '../middleware/auth';
import { requirePage } from '../middleware/requirePage';

export const createPerformanceRoutes = (ctx: AppContext): Router => {
  const router = Router();
  const { ingestDaily, getDailyRows } = createPerformanceController(ctx);

  router.use(createAuthenticate(ctx.config.jwtSecret));

  router.post('/daily', requirePage(ctx, 'Upload_Data'), ingestDaily);
  router.get('/daily', requirePage(ctx, 'Export'), getDailyRows);

  return router;
};
