import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { ConflictError, NotFoundError, PermissionError, ValidationError } from '../../errors';
import type { StoreTx } from '../../store/types';
import { MemoryStore } from '../../store/memory';
import { createWorld, validSubmission, type World } from '../../test-utils/fixtures';
import { verifyAuditChain } from '../audit';
import { nextStatus, TRANSITIONS } from '../workflow';
import type { EmailResult } from '../email';

/** Serves every submission read inside a transaction as if it were still PENDING. */
class StaleReadStore extends MemoryStore {
  transaction<T>(fn: (tx: StoreTx) => Promise<T>): Promise<T> {
    return super.transaction((tx) =>
      fn({
        ...tx,
        getSubmission: async (id) => {
          const current = await tx.getSubmission(id);
          return current ? { ...current, status: 'PENDING' } : null;
        },
      })
    );
  }
}

describe('workflow.ts', () => {
  let world: World;

  beforeEach(() => {
    world = createWorld();
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const create = () => world.services.workflow.create(world.officer, validSubmission, { ipAddress: '10.0.0.7' });
  const auditCount = async () => (await world.store.listAuditEntries({ limit: 1000 })).length;
  const inbox = (userId: string) => world.store.listNotifications(userId, 100);

  describe('transition table', () => {
    it('has review decisions only from PENDING or UNDER_REVIEW', () => {
      expect(TRANSITIONS.approve.from).toEqual(['PENDING', 'UNDER_REVIEW']);
      expect(nextStatus('deny', 'UNDER_REVIEW')).toBe('DENIED');
      expect(nextStatus('approve', 'APPROVED')).toBeNull();
      expect(nextStatus('return', 'DENIED')).toBeNull();
    });

    it('sends a RETURNED submission back to PENDING on edit', () => {
      expect(nextStatus('edit', 'RETURNED')).toBe('PENDING');
      expect(nextStatus('edit', 'UNDER_REVIEW')).toBeNull();
    });
  });

  describe('create', () => {
    it('creates a PENDING submission and alerts every active reviewer', async () => {
      const s = await create();

      expect(s.status).toBe('PENDING');
      expect(s.submittedAt).toEqual(new Date('2026-03-02T09:00:00.000Z'));
      expect(s.macId).toBe(world.agency.id);
      expect(s.submittedBy).toBe(world.officer.id);

      for (const reviewer of [world.reviewer, world.secondReviewer]) {
        const [notification] = await inbox(reviewer.id);
        expect(notification.title).toBe('New Submission');
        expect(notification.message).toBe('MOH submitted: Flood Update');
        expect(notification.submissionId).toBe(s.id);
      }
      expect(await inbox(world.inactiveReviewerId)).toEqual([]);
    });

    it('records one audit entry with the origin address', async () => {
      const s = await create();
      const entries = await world.store.listAuditEntries({ limit: 10 });

      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({
        sequence: 1,
        userId: world.officer.id,
        action: 'SUBMISSION_CREATED',
        submissionId: s.id,
        description: "Created submission 'Flood Update'",
        ipAddress: '10.0.0.7',
        prevHash: null,
      });
    });

    it('emails reviewers after the commit', async () => {
      await create();
      await world.store.settled();

      expect(world.email.sent.map((m) => m.to).sort()).toEqual(
        [world.reviewer.email, world.secondReviewer.email].sort()
      );
      expect(world.email.sent[0].subject).toBe('[Pressdesk] New Submission');
    });

    it('refuses an officer whose agency is deactivated', async () => {
      await expect(
        world.services.workflow.create(world.dormantOfficer, validSubmission)
      ).rejects.toThrow('You must belong to an active agency to submit content');
      expect(await auditCount()).toBe(0);
    });

    it('refuses a reviewer', async () => {
      await expect(world.services.workflow.create(world.reviewer, validSubmission)).rejects.toBeInstanceOf(
        PermissionError
      );
    });

    it('lists every field complaint and writes nothing', async () => {
      const err = await world.services.workflow
        .create(world.officer, { ...validSubmission, title: '  ', contentType: 'MEMO' })
        .catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ValidationError);
      if (!(err instanceof ValidationError)) return;
      expect(err.details).toContain('title: Title is required');
      expect(err.details.some((d) => d.startsWith('contentType:'))).toBe(true);
      expect((await world.store.findSubmissions({ kind: 'all' }, {})).total).toBe(0);
      expect(await auditCount()).toBe(0);
    });
  });

  describe('edit', () => {
    it('lets the submitter edit a PENDING submission without notifying anyone', async () => {
      const s = await create();
      await world.store.settled();
      world.email.sent = [];

      const updated = await world.services.workflow.edit(world.officer, s.id, {
        ...validSubmission,
        title: 'Flood Update (revised)',
      });
      await world.store.settled();

      expect(updated.status).toBe('PENDING');
      expect(updated.title).toBe('Flood Update (revised)');
      expect(updated.fileRef).toBe('uploads/flood-update.pdf');
      const [latest] = await world.store.listAuditEntries({ limit: 1 });
      expect(latest.action).toBe('SUBMISSION_UPDATED');
      expect(world.email.sent).toEqual([]);
    });

    it('resets RETURNED to PENDING and tells the returning reviewer', async () => {
      const s = await create();
      await world.services.workflow.review(world.reviewer, s.id, {
        action: 'return',
        reviewerComments: 'Add a contact line',
      });

      const updated = await world.services.workflow.edit(world.officer, s.id, validSubmission);

      expect(updated.status).toBe('PENDING');
      const [latest] = await inbox(world.reviewer.id);
      expect(latest.title).toBe('Submission Resubmitted');
      expect(latest.message).toBe('MOH resubmitted: Flood Update');
    });

    it("refuses another agency's officer and an officer once review has started", async () => {
      const s = await create();
      await expect(world.services.workflow.edit(world.otherOfficer, s.id, validSubmission)).rejects.toBeInstanceOf(
        PermissionError
      );

      await world.services.workflow.startReview(world.reviewer, s.id);
      await expect(world.services.workflow.edit(world.officer, s.id, validSubmission)).rejects.toThrow(
        "You don't have permission to edit this submission"
      );
    });

    it('lets an admin edit an APPROVED submission without changing its status', async () => {
      const s = await create();
      await world.services.workflow.review(world.reviewer, s.id, { action: 'approve', publish: true });

      const updated = await world.services.workflow.edit(world.admin, s.id, { ...validSubmission, tags: 'flood' });

      expect(updated.status).toBe('APPROVED');
      expect(updated.tags).toBe('flood');
    });

    it('keeps fields the edit leaves out', async () => {
      const s = await world.services.workflow.create(world.officer, {
        ...validSubmission,
        contentType: 'VIDEO',
        isConfidential: true,
      });

      const updated = await world.services.workflow.edit(world.officer, s.id, {
        title: 'Flood Update (revised)',
        description: 'Levels are back to normal.',
      });

      expect(updated).toMatchObject({
        title: 'Flood Update (revised)',
        description: 'Levels are back to normal.',
        contentType: 'VIDEO',
        isConfidential: true,
        tags: 'flood, weather',
        fileRef: 'uploads/flood-update.pdf',
      });
    });

    it('still rejects a blank title on edit', async () => {
      const s = await create();

      await expect(world.services.workflow.edit(world.officer, s.id, { title: '  ' })).rejects.toBeInstanceOf(
        ValidationError
      );
      expect((await world.store.getSubmission(s.id))?.title).toBe('Flood Update');
    });

    it('reports a missing submission before checking permission', async () => {
      await expect(world.services.workflow.edit(world.otherOfficer, 'missing', validSubmission)).rejects.toThrow(
        new NotFoundError('Submission', 'missing')
      );
    });
  });

  describe('startReview', () => {
    it('moves PENDING to UNDER_REVIEW, assigns the reviewer and tells the submitter', async () => {
      const s = await create();

      const updated = await world.services.workflow.startReview(world.reviewer, s.id);

      expect(updated.status).toBe('UNDER_REVIEW');
      expect(updated.assignedTo).toBe(world.reviewer.id);
      const [notification] = await inbox(world.officer.id);
      expect(notification.title).toBe('Submission Under Review');
      expect(notification.message).toBe("Your submission 'Flood Update' is now under review.");
      const [latest] = await world.store.listAuditEntries({ limit: 1 });
      expect(latest.action).toBe('SUBMISSION_REVIEWED');
    });

    it('conflicts when the submission is already under review', async () => {
      const s = await create();
      await world.services.workflow.startReview(world.reviewer, s.id);

      await expect(world.services.workflow.startReview(world.secondReviewer, s.id)).rejects.toThrow(
        'Cannot start reviewing a submission that is UNDER_REVIEW'
      );
    });
  });

  describe('review', () => {
    it('approves and publishes at the same instant, then tells the submitter', async () => {
      const s = await create();

      const approved = await world.services.workflow.review(world.reviewer, s.id, {
        action: 'approve',
        publish: true,
        priority: 'HIGH',
        reviewerComments: 'Good to go',
      });

      expect(approved.status).toBe('APPROVED');
      expect(approved.isPublished).toBe(true);
      expect(approved.approvedAt).not.toBeNull();
      expect(approved.publishedAt).toEqual(approved.approvedAt);
      expect(approved.reviewedAt).toEqual(approved.approvedAt);
      expect(approved.reviewedBy).toBe(world.reviewer.id);
      expect(approved.priority).toBe('HIGH');
      expect(approved.reviewerComments).toBe('Good to go');

      const [notification] = await inbox(world.officer.id);
      expect(notification.title).toBe('Submission Approved');
      expect(notification.message).toBe("Your submission 'Flood Update' has been approved and published.");
      expect(notification.submissionId).toBe(s.id);
    });

    it('leaves publishedAt null when approving without publishing', async () => {
      const s = await create();

      const approved = await world.services.workflow.review(world.reviewer, s.id, { action: 'approve' });

      expect(approved.approvedAt).not.toBeNull();
      expect(approved.isPublished).toBe(false);
      expect(approved.publishedAt).toBeNull();
      await expect(
        world.services.workflow.review(world.reviewer, s.id, { action: 'approve', publish: true })
      ).rejects.toBeInstanceOf(ConflictError);
    });

    it('records the denial reason and passes it on', async () => {
      const s = await create();

      const denied = await world.services.workflow.review(world.reviewer, s.id, {
        action: 'deny',
        denialReason: 'Incomplete data',
      });

      expect(denied.status).toBe('DENIED');
      expect(denied.denialReason).toBe('Incomplete data');
      const [notification] = await inbox(world.officer.id);
      expect(notification.message).toContain('Incomplete data');
    });

    it('requires a reason to deny', async () => {
      const s = await create();

      const err = await world.services.workflow
        .review(world.reviewer, s.id, { action: 'deny' })
        .catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.details).toEqual(['denialReason: Denial reason is required']);
      }
    });

    it('passes reviewer comments on when returning', async () => {
      const s = await create();

      await world.services.workflow.review(world.reviewer, s.id, {
        action: 'return',
        reviewerComments: 'Add a contact line',
      });

      const [notification] = await inbox(world.officer.id);
      expect(notification.title).toBe('Submission Returned for Edits');
      expect(notification.message).toBe(
        "Please review and update your submission 'Flood Update'. Comments: Add a contact line"
      );
    });

    it('refuses officers', async () => {
      const s = await create();
      await expect(
        world.services.workflow.review(world.officer, s.id, { action: 'approve' })
      ).rejects.toThrow('Only reviewers can review submissions');
    });

    it('lets exactly one of two concurrent reviews commit', async () => {
      const s = await create();

      const results = await Promise.allSettled([
        world.services.workflow.review(world.reviewer, s.id, { action: 'approve', publish: true }),
        world.services.workflow.review(world.secondReviewer, s.id, { action: 'deny', denialReason: 'Duplicate' }),
      ]);

      expect(results.map((r) => r.status).sort()).toEqual(['fulfilled', 'rejected']);
      const rejected = results.find((r) => r.status === 'rejected');
      expect(rejected?.status === 'rejected' && rejected.reason).toBeInstanceOf(ConflictError);

      const final = await world.store.getSubmission(s.id);
      expect(['APPROVED', 'DENIED']).toContain(final?.status);
      expect(await inbox(world.officer.id)).toHaveLength(1);
      expect(await auditCount()).toBe(2);
    });

    it('turns a lost compare-and-set into a conflict without touching the row', async () => {
      const stale = createWorld(new StaleReadStore());
      const s = await stale.services.workflow.create(stale.officer, validSubmission);
      await stale.services.workflow.review(stale.reviewer, s.id, { action: 'approve' });

      await expect(
        stale.services.workflow.review(stale.secondReviewer, s.id, { action: 'deny', denialReason: 'Late' })
      ).rejects.toThrow(`Submission ${s.id} was changed by another request (expected PENDING); reload and try again`);

      const final = await stale.store.getSubmission(s.id);
      expect(final?.status).toBe('APPROVED');
      expect(final?.reviewedBy).toBe(stale.reviewer.id);
      expect((await stale.store.listAuditEntries({ limit: 10 })).length).toBe(2);
    });
  });

  describe('delete', () => {
    it('lets the submitter delete while PENDING and audits it by description', async () => {
      const s = await create();

      await world.services.workflow.delete(world.officer, s.id);

      expect(await world.store.getSubmission(s.id)).toBeNull();
      const [latest] = await world.store.listAuditEntries({ limit: 1 });
      expect(latest.action).toBe('SUBMISSION_DELETED');
      expect(latest.submissionId).toBeNull();
      expect(latest.description).toBe(`Deleted submission 'Flood Update' (MOH, PENDING, id ${s.id})`);
    });

    it('stops the submitter once review has started but not an admin', async () => {
      const s = await create();
      await world.services.workflow.review(world.reviewer, s.id, { action: 'approve', publish: true });

      await expect(world.services.workflow.delete(world.officer, s.id)).rejects.toBeInstanceOf(PermissionError);
      await world.services.workflow.delete(world.admin, s.id);
      expect(await world.store.getSubmission(s.id)).toBeNull();
    });

    it('refuses reviewers', async () => {
      const s = await create();
      await expect(world.services.workflow.delete(world.reviewer, s.id)).rejects.toBeInstanceOf(PermissionError);
    });
  });

  describe('unit of work', () => {
    it('rolls the transition back when the audit write fails', async () => {
      const s = await create();
      await world.store.settled();
      world.email.sent = [];
      world.store.failNext('appendAuditEntry', new Error('disk full'));

      await expect(
        world.services.workflow.review(world.reviewer, s.id, { action: 'approve', publish: true })
      ).rejects.toThrow('disk full');
      await world.store.settled();

      const current = await world.store.getSubmission(s.id);
      expect(current?.status).toBe('PENDING');
      expect(current?.approvedAt).toBeNull();
      expect(await inbox(world.officer.id)).toEqual([]);
      expect(world.email.sent).toEqual([]);
      expect(await auditCount()).toBe(1);
    });

    it('rolls the transition and its audit entry back when the notification write fails', async () => {
      const s = await create();
      world.store.failNext('insertNotification');

      await expect(
        world.services.workflow.review(world.reviewer, s.id, { action: 'deny', denialReason: 'Incomplete data' })
      ).rejects.toThrow('insertNotification failed');

      expect((await world.store.getSubmission(s.id))?.status).toBe('PENDING');
      expect(await auditCount()).toBe(1);
    });

    it('rolls creation back when a reviewer alert cannot be stored', async () => {
      world.store.failNext('insertNotification');

      await expect(create()).rejects.toThrow('insertNotification failed');

      expect((await world.store.findSubmissions({ kind: 'all' }, {})).total).toBe(0);
      expect(await auditCount()).toBe(0);
    });

    it('commits even when email delivery fails', async () => {
      const errors = vi.spyOn(console, 'error').mockImplementation(() => {});
      world.email.failWith = 'SMTP down';

      const s = await create();
      await world.store.settled();

      expect(s.status).toBe('PENDING');
      expect(errors).toHaveBeenCalledWith(
        `[email] Failed to send to user ${world.reviewer.id} (submission ${s.id}): SMTP down`
      );
    });

    it('commits even when the transport throws', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      world.email.throwWith = new Error('socket hang up');

      const s = await create();
      await world.store.settled();

      expect(await world.store.getSubmission(s.id)).not.toBeNull();
      expect(await inbox(world.reviewer.id)).toHaveLength(1);
    });

    it('returns before email delivery finishes', async () => {
      vi.spyOn(world.email, 'send').mockReturnValue(new Promise<EmailResult>(() => {}));

      const s = await create();
      const next = await world.services.workflow.startReview(world.reviewer, s.id);

      expect(next.status).toBe('UNDER_REVIEW');
    });

    it('writes exactly one audit entry and one notification per transition', async () => {
      const s = await create();
      expect(await auditCount()).toBe(1);

      await world.services.workflow.startReview(world.reviewer, s.id);
      expect(await auditCount()).toBe(2);
      expect(await inbox(world.officer.id)).toHaveLength(1);

      await world.services.workflow.review(world.reviewer, s.id, { action: 'return', reviewerComments: 'Shorter' });
      expect(await auditCount()).toBe(3);
      expect(await inbox(world.officer.id)).toHaveLength(2);

      await world.services.workflow.edit(world.officer, s.id, validSubmission);
      expect(await auditCount()).toBe(4);
      expect(await inbox(world.reviewer.id)).toHaveLength(2);

      await world.services.workflow.review(world.secondReviewer, s.id, { action: 'approve', publish: true });
      expect(await auditCount()).toBe(5);
      expect(await inbox(world.officer.id)).toHaveLength(3);

      const entries = await world.store.listAuditEntries({ limit: 100 });
      expect(verifyAuditChain(entries)).toEqual({ valid: true });
    });
  });
});
