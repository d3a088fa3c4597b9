import logger from '../../utils/logger';
import {
  AuthorizationDecision,
  CapabilitySet,
  PermissionDirectory,
  UserRecord,
} from './types';

type Subject = Pick<UserRecord, 'username' | 'roleId'>;

const NO_PAGES: ReadonlySet<string> = new Set();

/**
 * Pure membership check against an already resolved capability set.
 */
export const decide = (capabilities: CapabilitySet, page: string): AuthorizationDecision => {
  if (capabilities.missingRole) {
    return { allowed: false, page, reason: 'role_missing' };
  }
  if (capabilities.role === null) {
    return { allowed: false, page, reason: 'no_role' };
  }
  if (capabilities.superAdmin) {
    return { allowed: true, page, role: capabilities.role, superAdmin: true };
  }
  if (capabilities.pages.has(page)) {
    return { allowed: true, page, role: capabilities.role, superAdmin: false };
  }
  return { allowed: false, page, reason: 'page_not_permitted', role: capabilities.role };
};

/**
 * Role-based page access: a user may view a page when their role has been
 * granted it, or when their role is the super-admin role.
 */
export class AccessControl {
  constructor(
    private readonly directory: PermissionDirectory,
    private readonly superAdminRole: string
  ) {}

  async resolveCapabilities(user: Subject): Promise<CapabilitySet> {
    if (!user.roleId) {
      return { role: null, superAdmin: false, pages: NO_PAGES, missingRole: false };
    }

    const role = await this.directory.findRole(user.roleId);
    if (!role) {
      // Role deleted after it was assigned: treat as no access, never as an error
      logger.warn(`User ${user.username} references missing role ${user.roleId}; denying access`);
      return { role: null, superAdmin: false, pages: NO_PAGES, missingRole: true };
    }

    const pages = await this.directory.listPages(role.id);
    return {
      role: role.name,
      superAdmin: role.name === this.superAdminRole,
      pages: new Set(pages),
      missingRole: false,
    };
  }

  async authorize(user: Subject, page: string): Promise<AuthorizationDecision> {
    const decision = decide(await this.resolveCapabilities(user), page);
    if (!decision.allowed) {
      logger.debug(`Access to ${page} denied for ${user.username}: ${decision.reason}`);
    }
    return decision;
  }

  async isAuthorized(user: Subject, page: string): Promise<boolean> {
    return (await this.authorize(user, page)).allowed;
  }

  /** Pages the user may open, for navigation. Super admins get `allPages`. */
  async permittedPages(user: Subject, allPages: readonly string[]): Promise<string[]> {
    const capabilities = await this.resolveCapabilities(user);
    return allPages.filter((page) => decide(capabilities, page).allowed);
  }
}
