import logger from '../../utils/logger';
import { CredentialVerifier } from './CredentialVerifier';
import { PermissionDirectory, UserRecord } from './types';

export type AuthenticationResult =
  | { ok: true; user: UserRecord }
  | { ok: false; reason: 'invalid_credentials' };

/**
 * Username/password check. There is no lockout or attempt limit.
 */
export class AuthService {
  constructor(
    private readonly directory: PermissionDirectory,
    private readonly verifier: CredentialVerifier
  ) {}

  async authenticate(username: string, password: string): Promise<AuthenticationResult> {
    const user = await this.directory.findUserByUsername(username.trim().toLowerCase());
    if (!user) {
      return { ok: false, reason: 'invalid_credentials' };
    }

    const valid = await this.verifier.verify(password, user.passwordHash);
    if (!valid) {
      logger.info(`Failed login for ${user.username}`);
      return { ok: false, reason: 'invalid_credentials' };
    }

    return { ok: true, user };
  }
}
