import { describe, it, expect } from 'vitest';
import { PAGES } from '../../models/RolePermission';
import { InMemoryPermissionDirectory } from '../../testing/fakes';
import { AccessControl, decide } from './AccessControl';

const directory = new InMemoryPermissionDirectory()
  .addRole('role-admin', 'Admin', [])
  .addRole('role-viewer', 'Viewer', ['Dashboard', 'Export'])
  .addUser({ id: 'u1', username: 'alice', roleId: 'role-viewer' })
  .addUser({ id: 'u2', username: 'root', roleId: 'role-admin' })
  .addUser({ id: 'u3', username: 'nobody', roleId: null })
  .addUser({ id: 'u4', username: 'ghost', roleId: 'role-deleted' });

const accessControl = new AccessControl(directory, 'Admin');

const user = async (id: string) => {
  const found = await directory.findUserById(id);
  if (!found) throw new Error(`missing fixture user ${id}`);
  return found;
};

describe('AccessControl', () => {
  it('allows pages granted to the role', async () => {
    expect(await accessControl.authorize(await user('u1'), 'Dashboard')).toEqual({
      allowed: true,
      page: 'Dashboard',
      role: 'Viewer',
      superAdmin: false,
    });
  });

  it('denies pages the role was not granted', async () => {
    expect(await accessControl.authorize(await user('u1'), 'Admin')).toEqual({
      allowed: false,
      page: 'Admin',
      reason: 'page_not_permitted',
      role: 'Viewer',
    });
  });

  it('lets the super-admin role open every page', async () => {
    const root = await user('u2');
    for (const page of PAGES) {
      expect(await accessControl.isAuthorized(root, page)).toBe(true);
    }
  });

  it('denies users without a role', async () => {
    const decision = await accessControl.authorize(await user('u3'), 'Dashboard');
    expect(decision).toEqual({ allowed: false, page: 'Dashboard', reason: 'no_role' });
  });

  it('denies users whose role was deleted', async () => {
    const decision = await accessControl.authorize(await user('u4'), 'Dashboard');
    expect(decision).toEqual({ allowed: false, page: 'Dashboard', reason: 'role_missing' });
  });

  it('lists permitted pages in navigation order', async () => {
    expect(await accessControl.permittedPages(await user('u1'), PAGES)).toEqual(['Dashboard', 'Export']);
    expect(await accessControl.permittedPages(await user('u2'), PAGES)).toEqual([...PAGES]);
    expect(await accessControl.permittedPages(await user('u4'), PAGES)).toEqual([]);
  });

  it('uses the configured super-admin role name', async () => {
    const viewerAsOwner = new AccessControl(directory, 'Viewer');
    expect(await viewerAsOwner.isAuthorized(await user('u1'), 'Admin')).toBe(true);
  });
});

describe('decide', () => {
  it('checks membership in a resolved capability set', () => {
    const capabilities = {
      role: 'Analyst',
      superAdmin: false,
      pages: new Set(['Dashboard']),
      missingRole: false,
    };

    expect(decide(capabilities, 'Dashboard').allowed).toBe(true);
    expect(decide(capabilities, 'Upload_Data').allowed).toBe(false);
  });
});
