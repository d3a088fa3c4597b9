import { Request, Response, NextFunction, RequestHandler } from 'express';
import jwt from 'jsonwebtoken';

export interface AuthRequest extends Request {
  userId?: string;
  username?: string;
}

export interface TokenClaims {
  userId: string;
  username: string;
}

export const signToken = (claims: TokenClaims, secret: string, expiresIn: string): string =>
  jwt.sign(claims, secret, { expiresIn } as jwt.SignOptions);

const readClaims = (decoded: string | jwt.JwtPayload): TokenClaims | null => {
  if (typeof decoded === 'string') return null;
  const { userId, username } = decoded;
  if (typeof userId !== 'string' || typeof username !== 'string') return null;
  return { userId, username };
};

/** Claims of a valid token, or null when it is expired, forged or malformed. */
export const verifyToken = (token: string, jwtSecret: string): TokenClaims | null => {
  try {
    return readClaims(jwt.verify(token, jwtSecret));
  } catch {
    return null;
  }
};

export const createAuthenticate = (jwtSecret: string): RequestHandler =>
  (req: AuthRequest, res: Response, next: NextFunction): void => {
    const token = req.headers.authorization?.replace('Bearer ', '');

    if (!token) {
      res.status(401).json({ error: 'Authentication required' });
      return;
    }

    const claims = verifyToken(token, jwtSecret);
    if (!claims) {
      res.status(401).json({ error: 'Invalid or expired token' });
      return;
    }

    req.userId = claims.userId;
    req.username = claims.username;
    next();
  };
