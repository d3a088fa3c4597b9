import bcrypt from 'bcryptjs';
import { describe, it, expect, beforeAll } from 'vitest';
import { InMemoryPermissionDirectory } from '../../testing/fakes';
import { AuthService } from './AuthService';
import { BCRYPT_COST, BcryptCredentialVerifier } from './CredentialVerifier';

// A low cost keeps the suite fast; the production cost is checked separately
const verifier = new BcryptCredentialVerifier(4);
const directory = new InMemoryPermissionDirectory();
const authService = new AuthService(directory, verifier);

beforeAll(async () => {
  directory.addUser({
    id: 'u1',
    username: 'alice',
    name: 'Alice',
    passwordHash: await verifier.hash('correct-horse'),
    roleId: null,
  });
});

describe('AuthService', () => {
  it('accepts the right password', async () => {
    const result = await authService.authenticate('alice', 'correct-horse');

    expect(result.ok).toBe(true);
    if (result.ok) expect(result.user.id).toBe('u1');
  });

  it('normalises the username', async () => {
    expect((await authService.authenticate('  Alice ', 'correct-horse')).ok).toBe(true);
  });

  it('rejects a wrong password', async () => {
    expect(await authService.authenticate('alice', 'wrong-horse')).toEqual({
      ok: false,
      reason: 'invalid_credentials',
    });
  });

  it('gives unknown users the same answer', async () => {
    expect(await authService.authenticate('mallory', 'correct-horse')).toEqual({
      ok: false,
      reason: 'invalid_credentials',
    });
  });
});

describe('BcryptCredentialVerifier', () => {
  it('hashes at cost 12 by default', async () => {
    const hash = await new BcryptCredentialVerifier().hash('test-password');

    expect(BCRYPT_COST).toBe(12);
    expect(bcrypt.getRounds(hash)).toBe(12);
  });

  it('never matches an empty stored hash', async () => {
    expect(await verifier.verify('anything', '')).toBe(false);
  });
});
