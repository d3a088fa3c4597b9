import bcrypt from 'bcryptjs';

/**
 * Hashes and checks passwords. Callers depend on this interface only, so the
 * hashing scheme can change without touching them.
 */
export interface CredentialVerifier {
  hash(password: string): Promise<string>;
  verify(password: string, storedHash: string): Promise<boolean>;
}

export const BCRYPT_COST = 12;

export class BcryptCredentialVerifier implements CredentialVerifier {
  constructor(private readonly cost: number = BCRYPT_COST) {}

  async hash(password: string): Promise<string> {
    return bcrypt.hash(password, this.cost);
  }

  async verify(password: string, storedHash: string): Promise<boolean> {
    if (!storedHash) return false;
    return bcrypt.compare(password, storedHash);
  }
}
