import { Router } from 'express';
import { AppContext } from '../context';
import { createAdminController } from '../controllers/adminController';
import { createAuthenticate } from '../middleware/auth';
import { requirePage } from '../middleware/requirePage';

export const createAdminRoutes = (ctx: AppContext): Router => {
  const router = Router();
  const admin = createAdminController(ctx);

  router.use(createAuthenticate(ctx.config.jwtSecret), requirePage(ctx, 'Admin'));

  router.get('/users', admin.listUsers);
  router.post('/users', admin.createUser);
  router.patch('/users/:id/role', admin.assignRole);
  router.delete('/users/:id', admin.deleteUser);

  router.get('/roles', admin.listRoles);
  router.post('/roles', admin.createRole);
  router.put('/roles/:id/permissions', admin.setRolePermissions);
  router.delete('/roles/:id', admin.deleteRole);

  return router;
};
