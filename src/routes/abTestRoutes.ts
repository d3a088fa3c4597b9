import { Router } from 'express';
import { AppContext } from '../context';
import { createAbTestController } from '../controllers/abTestController';
import { createAuthenticate } from '../middleware/auth';
import { requirePage } from '../middleware/requirePage';

export const createAbTestRoutes = (ctx: AppContext): Router => {
  const router = Router();
  const { listTests, getTestResult, getSampleSize } = createAbTestController(ctx);

  router.use(createAuthenticate(ctx.config.jwtSecret), requirePage(ctx, 'AB_Testing'));

  router.get('/', listTests);
  // Registered before /:testId so the literal path wins
  router.get('/sample-size', getSampleSize);
  router.get('/:testId', getTestResult);

  return router;
};
