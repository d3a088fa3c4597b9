import { Router } from 'express';
import { AppContext } from '../context';
import {
  getAlerts,
  getRecommendations,
  patchAlert,
  patchRecommendation,
} from '../controllers/insightController';
import { createAuthenticate } from '../middleware/auth';
import { requirePage } from '../middleware/requirePage';

export const createAlertRoutes = (ctx: AppContext): Router => {
  const router = Router();

  router.use(createAuthenticate(ctx.config.jwtSecret), requirePage(ctx, 'Dashboard'));

  router.get('/', getAlerts);
  router.patch('/:id', patchAlert);

  return router;
};

export const createRecommendationRoutes = (ctx: AppContext): Router => {
  const router = Router();

  router.use(createAuthenticate(ctx.config.jwtSecret), requirePage(ctx, 'Creative_Analysis'));

  router.get('/', getRecommendations);
  router.patch('/:id', patchRecommendation);

  return router;
};
