import type { Request, Response, NextFunction } from 'express';

/** What the identity provider vouches for once a bearer token checks out. */
export type TokenIdentity = {
  uid: string;
  email?: string | null;
};

export type VerifyIdToken = (token: string) => Promise<TokenIdentity>;

declare module 'express-serve-static-core' {
  interface Request {
    user?: TokenIdentity;
  }
}

const BEARER_PREFIX = /^bearer\s+/i;

export function extractBearerToken(authHeader?: string | null) {
  if (!authHeader) return null;
  const match = authHeader.match(BEARER_PREFIX);
  if (match) {
    return authHeader.slice(match[0].length).trim() || null;
  }
  return authHeader.trim() || null;
}

export function createAuthMiddleware(verifyIdToken: VerifyIdToken) {
  async function authenticate(req: Request, res: Response, next: NextFunction) {
    const authHeader = req.headers.authorization;
    if (!authHeader) {
      return res.status(401).json({ message: 'Missing Authorization header' });
    }

    const token = extractBearerToken(authHeader);
    if (!token) {
      return res.status(401).json({ message: 'Missing bearer token' });
    }

    try {
      const identity = await verifyIdToken(token);
      req.user = { uid: identity.uid, email: identity.email ?? null };
    } catch (error) {
      console.error('[auth] failed to verify token', error);
      return res.status(401).json({ message: 'Invalid or expired token' });
    }
    return next();
  }

  return { authenticate };
}

export type AuthMiddleware = ReturnType<typeof createAuthMiddleware>;
