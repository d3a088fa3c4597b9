import jwt from 'jsonwebtoken';
import { describe, it, expect } from 'vitest';
import { signToken, verifyToken } from './auth';

const SECRET = 'test-secret';

describe('signToken / verifyToken', () => {
  it('round-trips the user claims', () => {
    const token = signToken({ userId: 'u1', username: 'alice' }, SECRET, '1h');
    expect(verifyToken(token, SECRET)).toEqual({ userId: 'u1', username: 'alice' });
  });

  it('rejects a token signed with another secret', () => {
    const token = signToken({ userId: 'u1', username: 'alice' }, 'other-secret', '1h');
    expect(verifyToken(token, SECRET)).toBeNull();
  });

  it('rejects an expired token', () => {
    const token = jwt.sign(
      { userId: 'u1', username: 'alice', exp: Math.floor(Date.now() / 1000) - 60 },
      SECRET
    );
    expect(verifyToken(token, SECRET)).toBeNull();
  });

  it('rejects tokens without the expected claims', () => {
    expect(verifyToken(jwt.sign({ sub: 'u1' }, SECRET), SECRET)).toBeNull();
    expect(verifyToken('not-a-token', SECRET)).toBeNull();
  });
});
