import { Response, NextFunction, RequestHandler } from 'express';
import { AppContext } from '../context';
import { PageName } from '../models/RolePermission';
import { DenialReason } from '../services/auth/types';
import { sendError } from '../utils/http';
import { AuthRequest } from './auth';

export type PageAccess =
  | { ok: true }
  | { ok: false; status: 401; error: string }
  | { ok: false; status: 403; error: string; page: PageName; reason: DenialReason };

export const checkPageAccess = async (
  ctx: Pick<AppContext, 'directory' | 'accessControl'>,
  userId: string | undefined,
  page: PageName
): Promise<PageAccess> => {
  if (!userId) {
    return { ok: false, status: 401, error: 'Authentication required' };
  }

  const user = await ctx.directory.findUserById(userId);
  if (!user) {
    return { ok: false, status: 401, error: 'User not found' };
  }

  const decision = await ctx.accessControl.authorize(user, page);
  if (!decision.allowed) {
    return { ok: false, status: 403, error: 'Access denied', page, reason: decision.reason };
  }
  return { ok: true };
};

/**
 * Lets the request through only when the authenticated user's role grants
 * `page`. Denials are answered with 403 and the reason.
 */
export const requirePage = (ctx: AppContext, page: PageName): RequestHandler =>
  async (req: AuthRequest, res: Response, next: NextFunction): Promise<void> => {
    try {
      const access = await checkPageAccess(ctx, req.userId, page);
      if (!access.ok) {
        res
          .status(access.status)
          .json(
            access.status === 403
              ? { error: access.error, page: access.page, reason: access.reason }
              : { error: access.error }
          );
        return;
      }
      next();
    } catch (error) {
      sendError(res, error, `Authorize ${page}`, 'Failed to check permissions');
    }
  };
