import { Router } from 'express';
import { AppContext } from '../context';
import { createAnalyticsController } from '../controllers/analyticsController';
import { createAuthenticate } from '../middleware/auth';
import { requirePage } from '../middleware/requirePage';

export const createAnalyticsRoutes = (ctx: AppContext): Router => {
  const router = Router();
  const controller = createAnalyticsController(ctx);

  router.use(createAuthenticate(ctx.config.jwtSecret));

  router.get('/summary', requirePage(ctx, 'Dashboard'), controller.getSummary);
  router.get('/ads', requirePage(ctx, 'Dashboard'), controller.getAdMetrics);
  router.get('/creatives', requirePage(ctx, 'Creative_Analysis'), controller.getCreatives);
  router.post(
    '/creatives/recommendations',
    requirePage(ctx, 'Creative_Analysis'),
    controller.createRecommendations
  );
  router.get('/segments', requirePage(ctx, 'Segmentation_Analysis'), controller.getSegments);
  router.get('/countries', requirePage(ctx, 'Live_Benchmarking'), controller.getCountries);
  router.get('/customers/rfm', requirePage(ctx, 'Persona_Intelligence'), controller.getRfm);

  return router;
};
