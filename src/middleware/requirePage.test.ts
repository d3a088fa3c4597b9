import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config/env';
import { createContext } from '../context';
import { InMemoryFactStore, InMemoryPermissionDirectory } from '../testing/fakes';
import { checkPageAccess } from './requirePage';

const directory = new InMemoryPermissionDirectory()
  .addRole('role-viewer', 'Viewer', ['Dashboard', 'Export'])
  .addRole('role-admin', 'Admin', [])
  .addUser({ id: 'u1', username: 'alice', roleId: 'role-viewer' })
  .addUser({ id: 'u2', username: 'root', roleId: 'role-admin' })
  .addUser({ id: 'u3', username: 'ghost', roleId: 'role-deleted' });

const ctx = createContext(
  loadConfig({ MONGO_URI: 'mongodb://localhost:27017/analytics-test', JWT_SECRET: 'test-secret' }),
  { directory, factStore: new InMemoryFactStore(new Set(), new Set()) }
);

describe('checkPageAccess', () => {
  it('requires an authenticated user', async () => {
    expect(await checkPageAccess(ctx, undefined, 'Dashboard')).toEqual({
      ok: false,
      status: 401,
      error: 'Authentication required',
    });
  });

  it('rejects tokens for users that no longer exist', async () => {
    expect(await checkPageAccess(ctx, 'u404', 'Dashboard')).toEqual({
      ok: false,
      status: 401,
      error: 'User not found',
    });
  });

  it('allows a granted page', async () => {
    expect(await checkPageAccess(ctx, 'u1', 'Dashboard')).toEqual({ ok: true });
  });

  it('answers 403 with the denial reason', async () => {
    expect(await checkPageAccess(ctx, 'u1', 'Admin')).toEqual({
      ok: false,
      status: 403,
      error: 'Access denied',
      page: 'Admin',
      reason: 'page_not_permitted',
    });
    expect(await checkPageAccess(ctx, 'u3', 'Dashboard')).toMatchObject({
      status: 403,
      reason: 'role_missing',
    });
  });

  it('lets the configured super-admin role through', async () => {
    expect(await checkPageAccess(ctx, 'u2', 'Upload_Data')).toEqual({ ok: true });
  });
});
