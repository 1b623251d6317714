import { Router, Request, Response, NextFunction } from 'express';
import { requireActor } from '../middleware/auth';
import type { Services } from '../services';
import { formatSubmission } from './format';

export function createLibraryRouter({ catalog }: Services): Router {
  const router = Router();

  /**
   * GET /api/library
   * Approved, published content for any signed-in user, newest first.
   * Filters: contentType, macId, search, limit, offset.
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const page = await catalog.library(requireActor(req), req.query);
      res.json({ ...page, submissions: page.submissions.map(formatSubmission) });
    } catch (err) { next(err); }
  });

  return router;
}
