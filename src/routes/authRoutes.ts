import { Router } from 'express';
import { AppContext } from '../context';
import { createAuthController } from '../controllers/authController';
import { createAuthenticate } from '../middleware/auth';

export const createAuthRoutes = (ctx: AppContext): Router => {
  const router = Router();
  const { login, getMe } = createAuthController(ctx);

  router.post('/login', login);
  router.get('/me', createAuthenticate(ctx.config.jwtSecret), getMe);

  return router;
};
