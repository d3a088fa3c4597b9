import { Request, Response } from 'express';
import { AppContext } from '../context';
import { AuthRequest, signToken } from '../middleware/auth';
import { PAGES } from '../models/RolePermission';
import { sendError } from '../utils/http';

export const createAuthController = (ctx: AppContext) => {
  const login = async (req: Request, res: Response): Promise<void> => {
    try {
      const { username, password } = req.body ?? {};

      if (typeof username !== 'string' || typeof password !== 'string' || !username || !password) {
        res.status(400).json({ error: 'Username and password are required' });
        return;
      }

      const result = await ctx.authService.authenticate(username, password);
      if (!result.ok) {
        res.status(401).json({ error: 'Invalid credentials' });
        return;
      }

      const { user } = result;
      const token = signToken(
        { userId: user.id, username: user.username },
        ctx.config.jwtSecret,
        ctx.config.jwtExpiresIn
      );
      const pages = await ctx.accessControl.permittedPages(user, PAGES);

      res.json({
        token,
        user: {
          id: user.id,
          username: user.username,
          name: user.name,
        },
        pages,
      });
    } catch (error) {
      sendError(res, error, 'Login error', 'Login failed');
    }
  };

  const getMe = async (req: AuthRequest, res: Response): Promise<void> => {
    try {
      const user = req.userId ? await ctx.directory.findUserById(req.userId) : null;
      if (!user) {
        res.status(404).json({ error: 'User not found' });
        return;
      }

      const capabilities = await ctx.accessControl.resolveCapabilities(user);
      const pages = await ctx.accessControl.permittedPages(user, PAGES);

      res.json({
        id: user.id,
        username: user.username,
        name: user.name,
        role: capabilities.role,
        pages,
      });
    } catch (error) {
      sendError(res, error, 'Get me error', 'Failed to fetch user');
    }
  };

  return { login, getMe };
};
