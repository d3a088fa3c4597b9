export interface UserRecord {
  id: string;
  username: string;
  name: string;
  passwordHash: string;
  roleId: string | null;
}

export interface RoleRecord {
  id: string;
  name: string;
}

/**
 * Read access to users, roles and role permissions.
 */
export interface PermissionDirectory {
  findUserByUsername(username: string): Promise<UserRecord | null>;
  findUserById(id: string): Promise<UserRecord | null>;
  findRole(roleId: string): Promise<RoleRecord | null>;
  listPages(roleId: string): Promise<string[]>;
}

export type DenialReason = 'no_role' | 'role_missing' | 'page_not_permitted';

export type AuthorizationDecision =
  | { allowed: true; page: string; role: string; superAdmin: boolean }
  | { allowed: false; page: string; reason: DenialReason; role?: string };

export interface CapabilitySet {
  role: string | null;
  superAdmin: boolean;
  pages: ReadonlySet<string>;
  /** Set when the user points at a role that no longer exists. */
  missingRole: boolean;
}
