import { Router, Request, Response, NextFunction } from 'express';
import { requireActor } from '../middleware/auth';
import type { Services } from '../services';
import { toCsv } from '../services/export';
import type { RequestContext } from '../domain';
import { formatComment, formatSubmission } from './format';

function contextOf(req: Request): RequestContext {
  return { ipAddress: req.ip ?? null };
}

export function createSubmissionsRouter({ workflow, catalog, comments }: Services): Router {
  const router = Router();

  /**
   * GET /api/submissions
   * Submissions visible to the caller. Filters: status, macId (ignored for
   * officers), search, limit, offset.
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const page = await catalog.list(requireActor(req), req.query);
      res.json({ ...page, submissions: page.submissions.map(formatSubmission) });
    } catch (err) { next(err); }
  });

  /**
   * POST /api/submissions
   * Create a submission for the caller's agency. Starts PENDING and notifies reviewers.
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const submission = await workflow.create(requireActor(req), req.body, contextOf(req));
      res.status(201).json(formatSubmission(submission));
    } catch (err) { next(err); }
  });

  /**
   * GET /api/submissions/stats
   * Counts by status within the caller's scope.
   */
  router.get('/stats', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await catalog.stats(requireActor(req)));
    } catch (err) { next(err); }
  });

  /**
   * GET /api/submissions/analytics
   * Admin only. System-wide totals, rankings and a daily trend. Query: days (default 30).
   */
  router.get('/analytics', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await catalog.analytics(requireActor(req), req.query));
    } catch (err) { next(err); }
  });

  /**
   * GET /api/submissions/export
   * CSV of the visible submissions matching status/macId/search.
   */
  router.get('/export', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const rows = await catalog.exportRows(requireActor(req), req.query);
      const stamp = new Date().toISOString().slice(0, 10);
      res.setHeader('Content-Type', 'text/csv; charset=utf-8');
      res.setHeader('Content-Disposition', `attachment; filename="submissions-${stamp}.csv"`);
      res.send(toCsv(rows));
    } catch (err) { next(err); }
  });

  /**
   * GET /api/submissions/:id
   * One submission with its agency, visible comments and the caller's capabilities.
   */
  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const detail = await catalog.get(requireActor(req), req.params.id);
      res.json({
        submission: formatSubmission(detail.submission),
        mac: detail.mac,
        comments: detail.comments.map(formatComment),
        canEdit: detail.canEdit,
        canDelete: detail.canDelete,
        canReview: detail.canReview,
      });
    } catch (err) { next(err); }
  });

  /**
   * PATCH /api/submissions/:id
   * Edit content. A RETURNED submission goes back to PENDING.
   */
  router.patch('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const submission = await workflow.edit(requireActor(req), req.params.id, req.body, contextOf(req));
      res.json(formatSubmission(submission));
    } catch (err) { next(err); }
  });

  /**
   * DELETE /api/submissions/:id
   * Admins at any status; the submitter only while PENDING.
   */
  router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await workflow.delete(requireActor(req), req.params.id, contextOf(req));
      res.status(204).end();
    } catch (err) { next(err); }
  });

  /**
   * POST /api/submissions/:id/start-review
   * Claim a PENDING submission: it moves to UNDER_REVIEW, assigned to the caller.
   */
  router.post('/:id/start-review', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const submission = await workflow.startReview(requireActor(req), req.params.id, contextOf(req));
      res.json(formatSubmission(submission));
    } catch (err) { next(err); }
  });

  /**
   * POST /api/submissions/:id/review
   * Body: { action: approve|deny|return, reviewerComments?, priority?, publish?, denialReason? }
   */
  router.post('/:id/review', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const submission = await workflow.review(requireActor(req), req.params.id, req.body, contextOf(req));
      res.json(formatSubmission(submission));
    } catch (err) { next(err); }
  });

  router.get('/:id/comments', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const list = await comments.list(requireActor(req), req.params.id);
      res.json({ comments: list.map(formatComment) });
    } catch (err) { next(err); }
  });

  router.post('/:id/comments', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const comment = await comments.add(requireActor(req), req.params.id, req.body, contextOf(req));
      res.status(201).json(formatComment(comment));
    } catch (err) { next(err); }
  });

  return router;
}
