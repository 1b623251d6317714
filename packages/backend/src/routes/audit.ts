import { Router, Request, Response, NextFunction } from 'express';
import { requireActor } from '../middleware/auth';
import type { Services } from '../services';
import { formatAuditEntry } from './format';

export function createAuditRouter({ audit }: Services): Router {
  const router = Router();

  /**
   * GET /api/audit
   * Activity log. Admins get the latest entries system-wide, everyone else
   * their own.
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const entries = await audit.listFor(requireActor(req));
      res.json({ entries: entries.map(formatAuditEntry) });
    } catch (err) { next(err); }
  });

  return router;
}
