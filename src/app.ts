import express, { Express } from 'express';
import cors from 'cors';
import { AppContext } from './context';
import { errorHandler } from './middleware/errorHandler';
import { createAbTestRoutes } from './routes/abTestRoutes';
import { createAdminRoutes } from './routes/adminRoutes';
import { createAnalyticsRoutes } from './routes/analyticsRoutes';
import { createAuthRoutes } from './routes/authRoutes';
import { createBudgetRoutes } from './routes/budgetRoutes';
import { createAlertRoutes, createRecommendationRoutes } from './routes/insightRoutes';
import { createPerformanceRoutes } from './routes/performanceRoutes';

export const createApp = (ctx: AppContext): Express => {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '5mb' }));
  app.use(express.urlencoded({ extended: true }));

  app.use('/api/auth', createAuthRoutes(ctx));
  app.use('/api/analytics', createAnalyticsRoutes(ctx));
  app.use('/api/ab-tests', createAbTestRoutes(ctx));
  app.use('/api/budgets', createBudgetRoutes(ctx));
  app.use('/api/alerts', createAlertRoutes(ctx));
  app.use('/api/recommendations', createRecommendationRoutes(ctx));
  app.use('/api/performance', createPerformanceRoutes(ctx));
  app.use('/api/admin', createAdminRoutes(ctx));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use(errorHandler);

  return app;
};
