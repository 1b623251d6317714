import { Request, Response, NextFunction, RequestHandler } from 'express';
import { verifyToken, type JWTPayload } from '../auth/jwt';
import type { Actor } from '../domain';
import type { StoreReader } from '../store/types';

// ─── Extend Express Request ────────────────────────────────────────────────

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      actor?: Actor;
    }
  }
}

// ─── Middleware ───────────────────────────────────────────────────────────

/**
 * Authenticate request via Bearer JWT token, then resolve the caller against
 * the users table so a deactivated account is locked out even while its token
 * is still valid. Role and agency come from the database, not the token.
 */
export function createRequireAuth(store: Pick<StoreReader, 'getUser'>, secret: string): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const header = req.headers.authorization;
    const token = header?.startsWith('Bearer ') ? header.slice(7) : null;

    if (!token) {
      res.status(401).json({ error: 'Unauthorized — missing Bearer token' });
      return;
    }

    let payload: JWTPayload;
    try {
      payload = verifyToken(token, secret);
    } catch {
      res.status(401).json({ error: 'Unauthorized — invalid or expired token' });
      return;
    }

    try {
      const user = await store.getUser(payload.sub);
      if (!user || !user.isActive) {
        res.status(401).json({ error: 'Unauthorized — account not found or inactive' });
        return;
      }
      req.actor = {
        id: user.id,
        role: user.role,
        macId: user.macId,
        email: user.email,
        fullName: user.fullName,
      };
      next();
    } catch (err) {
      next(err);
    }
  };
}

/** The resolved caller. Only valid behind `requireAuth`. */
export function requireActor(req: Request): Actor {
  if (!req.actor) throw new Error('requireActor used on a route without requireAuth');
  return req.actor;
}
