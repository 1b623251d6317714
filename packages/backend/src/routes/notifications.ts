import { Router, Request, Response, NextFunction } from 'express';
import { requireActor } from '../middleware/auth';
import type { Services } from '../services';
import { formatNotification } from './format';

export function createNotificationsRouter({ notifications }: Services): Router {
  const router = Router();

  /**
   * GET /api/notifications
   * The caller's latest notifications plus the unread count.
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { notifications: list, unread } = await notifications.list(requireActor(req));
      res.json({ notifications: list.map(formatNotification), unread });
    } catch (err) { next(err); }
  });

  /**
   * POST /api/notifications/:id/read
   * Idempotent. 404 for anyone but the recipient.
   */
  router.post('/:id/read', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const notification = await notifications.markRead(requireActor(req), req.params.id);
      res.json(formatNotification(notification));
    } catch (err) { next(err); }
  });

  return router;
}
