import { Response } from 'express';
import mongoose from 'mongoose';
import { AppContext } from '../context';
import { AuthRequest } from '../middleware/auth';
import { Role } from '../models/Role';
import { PageName, PAGES, RolePermission } from '../models/RolePermission';
import { User } from '../models/User';
import { NotFoundError, ValidationError } from '../utils/errors';
import logger from '../utils/logger';
import { sendError, queryString } from '../utils/http';

const MIN_PASSWORD_LENGTH = 8;

const isPageName = (value: unknown): value is PageName =>
  typeof value === 'string' && PAGES.some((page) => page === value);

const readPages = (value: unknown): PageName[] => {
  if (!Array.isArray(value)) {
    throw new ValidationError('pages must be an array of page names');
  }
  const invalid = value.filter((page) => !isPageName(page));
  if (invalid.length > 0) {
    throw new ValidationError(`Unknown pages: ${invalid.map(String).join(', ')}`);
  }
  return [...new Set(value.filter(isPageName))];
};

const readRoleId = async (value: unknown): Promise<mongoose.Types.ObjectId | null> => {
  if (value === null || value === undefined) return null;
  if (typeof value !== 'string' || !mongoose.isValidObjectId(value)) {
    throw new ValidationError('roleId must be a role id or null');
  }
  const role = await Role.findById(value);
  if (!role) throw new NotFoundError(`role ${value} not found`);
  return role._id;
};

const replacePermissions = async (roleId: mongoose.Types.ObjectId, pages: PageName[]) => {
  await RolePermission.deleteMany({ roleId });
  if (pages.length > 0) {
    await RolePermission.insertMany(pages.map((pageName) => ({ roleId, pageName })));
  }
};

export const createAdminController = (ctx: AppContext) => {
  const listUsers = async (_req: AuthRequest, res: Response): Promise<void> => {
    try {
      const users = await User.find().select('-passwordHash').sort({ username: 1 }).lean();
      res.json({ users });
    } catch (error) {
      sendError(res, error, 'List users error', 'Failed to fetch users');
    }
  };

  const createUser = async (req: AuthRequest, res: Response): Promise<void> => {
    try {
      const username = queryString(req.body?.username)?.toLowerCase();
      const name = queryString(req.body?.name);
      const password: unknown = req.body?.password;

      if (!username || !name || typeof password !== 'string') {
        res.status(400).json({ error: 'Username, name, and password are required' });
        return;
      }
      if (password.length < MIN_PASSWORD_LENGTH) {
        res.status(400).json({ error: `Password must be at least ${MIN_PASSWORD_LENGTH} characters` });
        return;
      }

      if (await User.exists({ username })) {
        res.status(409).json({ error: 'User already exists' });
        return;
      }

      const user = await User.create({
        username,
        name,
        passwordHash: await ctx.verifier.hash(password),
        roleId: await readRoleId(req.body?.roleId),
      });
      logger.info(`User ${username} created by ${req.username ?? 'unknown'}`);

      res.status(201).json({
        id: user._id,
        username: user.username,
        name: user.name,
        roleId: user.roleId,
      });
    } catch (error) {
      sendError(res, error, 'Create user error', 'Failed to create user');
    }
  };

  const assignRole = async (req: AuthRequest, res: Response): Promise<void> => {
    try {
      const { id } = req.params;
      const user = mongoose.isValidObjectId(id) ? await User.findById(id) : null;
      if (!user) {
        res.status(404).json({ error: 'User not found' });
        return;
      }

      user.roleId = await readRoleId(req.body?.roleId);
      await user.save();

      res.json({ id: user._id, username: user.username, roleId: user.roleId });
    } catch (error) {
      sendError(res, error, 'Assign role error', 'Failed to assign role');
    }
  };

  const deleteUser = async (req: AuthRequest, res: Response): Promise<void> => {
    try {
      const { id } = req.params;
      if (id === req.userId) {
        res.status(400).json({ error: 'You cannot delete your own user' });
        return;
      }

      const deleted = mongoose.isValidObjectId(id) ? await User.findByIdAndDelete(id) : null;
      if (!deleted) {
        res.status(404).json({ error: 'User not found' });
        return;
      }

      res.json({ message: 'User deleted successfully' });
    } catch (error) {
      sendError(res, error, 'Delete user error', 'Failed to delete user');
    }
  };

  const listRoles = async (_req: AuthRequest, res: Response): Promise<void> => {
    try {
      const [roles, permissions] = await Promise.all([
        Role.find().sort({ name: 1 }).lean(),
        RolePermission.find().lean(),
      ]);

      res.json({
        pages: PAGES,
        roles: roles.map((role) => ({
          id: role._id,
          name: role.name,
          superAdmin: role.name === ctx.config.analytics.superAdminRole,
          pages: permissions
            .filter((permission) => permission.roleId.equals(role._id))
            .map((permission) => permission.pageName)
            .sort(),
        })),
      });
    } catch (error) {
      sendError(res, error, 'List roles error', 'Failed to fetch roles');
    }
  };

  const createRole = async (req: AuthRequest, res: Response): Promise<void> => {
    try {
      const name = queryString(req.body?.name);
      if (!name) {
        res.status(400).json({ error: 'Role name is required' });
        return;
      }
      const pages = req.body?.pages === undefined ? [] : readPages(req.body.pages);

      if (await Role.exists({ name })) {
        res.status(409).json({ error: 'Role already exists' });
        return;
      }

      const role = await Role.create({ name });
      await replacePermissions(role._id, pages);
      logger.info(`Role ${name} created with ${pages.length} pages`);

      res.status(201).json({ id: role._id, name: role.name, pages });
    } catch (error) {
      sendError(res, error, 'Create role error', 'Failed to create role');
    }
  };

  const setRolePermissions = async (req: AuthRequest, res: Response): Promise<void> => {
    try {
      const { id } = req.params;
      const role = mongoose.isValidObjectId(id) ? await Role.findById(id) : null;
      if (!role) {
        res.status(404).json({ error: 'Role not found' });
        return;
      }

      const pages = readPages(req.body?.pages);
      await replacePermissions(role._id, pages);

      res.json({ id: role._id, name: role.name, pages });
    } catch (error) {
      sendError(res, error, 'Set role permissions error', 'Failed to update role permissions');
    }
  };

  // Users keep pointing at a deleted role and are denied until reassigned
  const deleteRole = async (req: AuthRequest, res: Response): Promise<void> => {
    try {
      const { id } = req.params;
      const role = mongoose.isValidObjectId(id) ? await Role.findByIdAndDelete(id) : null;
      if (!role) {
        res.status(404).json({ error: 'Role not found' });
        return;
      }

      await RolePermission.deleteMany({ roleId: role._id });
      logger.warn(`Role ${role.name} deleted`);

      res.json({ message: 'Role deleted successfully' });
    } catch (error) {
      sendError(res, error, 'Delete role error', 'Failed to delete role');
    }
  };

  return {
    listUsers,
    createUser,
    assignRole,
    deleteUser,
    listRoles,
    createRole,
    setRolePermissions,
    deleteRole,
  };
};
