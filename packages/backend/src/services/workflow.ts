/**
 * Submission State Machine
 *
 * Owns every change to a submission's status. Each operation runs as one unit
 * of work: load, access check, compare-and-set on the status that was read,
 * then the audit entry and notifications. Any failure before COMMIT leaves no
 * trace; email goes out only after COMMIT.
 *
 *   (none)               ─create──────▶ PENDING
 *   PENDING | RETURNED   ─edit────────▶ PENDING
 *   PENDING              ─start_review▶ UNDER_REVIEW
 *   PENDING|UNDER_REVIEW ─approve─────▶ APPROVED
 *   PENDING|UNDER_REVIEW ─deny────────▶ DENIED
 *   PENDING|UNDER_REVIEW ─return──────▶ RETURNED
 *   any                  ─delete──────▶ (removed)
 */

import {
  CreateSubmissionSchema,
  ReviewDecisionSchema,
  UpdateSubmissionSchema,
  type AuditAction,
  type ReviewActionType,
  type ReviewDecision,
  type SubmissionStatusType,
} from '@pressdesk/shared';
import type { Actor, RequestContext, Submission } from '../domain';
import { ConflictError, NotFoundError, PermissionError, parseInput } from '../errors';
import type { Store, StoreTx, SubmissionPatch } from '../store/types';
import { assertCan } from './access';
import type { AuditSink } from './audit';
import type { NotificationDispatcher } from './notifications';

export type TransitionEvent = 'edit' | 'start_review' | ReviewActionType;

export interface Transition {
  from: readonly SubmissionStatusType[];
  to: SubmissionStatusType;
}

export const TRANSITIONS = {
  edit: { from: ['PENDING', 'RETURNED'], to: 'PENDING' },
  start_review: { from: ['PENDING'], to: 'UNDER_REVIEW' },
  approve: { from: ['PENDING', 'UNDER_REVIEW'], to: 'APPROVED' },
  deny: { from: ['PENDING', 'UNDER_REVIEW'], to: 'DENIED' },
  return: { from: ['PENDING', 'UNDER_REVIEW'], to: 'RETURNED' },
} as const satisfies Record<TransitionEvent, Transition>;

const EVENT_VERBS: Record<TransitionEvent, string> = {
  edit: 'edit',
  start_review: 'start reviewing',
  approve: 'approve',
  deny: 'deny',
  return: 'return',
};

const REVIEW_AUDIT: Record<ReviewActionType, AuditAction> = {
  approve: 'SUBMISSION_APPROVED',
  deny: 'SUBMISSION_DENIED',
  return: 'SUBMISSION_RETURNED',
};

/** The target status of `event` from `current`, or null when the table has no such edge. */
export function nextStatus(
  event: TransitionEvent,
  current: SubmissionStatusType
): SubmissionStatusType | null {
  const transition: Transition = TRANSITIONS[event];
  return transition.from.includes(current) ? transition.to : null;
}

export class SubmissionWorkflow {
  constructor(
    private readonly store: Store,
    private readonly audit: AuditSink,
    private readonly notifications: NotificationDispatcher,
    private readonly clock: () => Date = () => new Date()
  ) {}

  // ─── create ────────────────────────────────────────────────────────────────

  async create(actor: Actor, input: unknown, ctx: RequestContext = {}): Promise<Submission> {
    if (!actor.macId) {
      throw new PermissionError('You must be assigned to an agency to submit content');
    }
    const macId = actor.macId;

    return this.store.transaction(async (tx) => {
      const mac = await tx.getMac(macId);
      assertCan(actor, 'submission.create', { macId, macActive: mac?.isActive ?? false });
      if (!mac) throw new NotFoundError('Agency', macId);

      const data = parseInput(CreateSubmissionSchema, input);
      const now = this.clock();
      const submission = await tx.insertSubmission({
        ...data,
        macId,
        submittedBy: actor.id,
        submittedAt: now,
      });

      await this.audit.record(tx, {
        actor,
        action: 'SUBMISSION_CREATED',
        submissionId: submission.id,
        description: `Created submission '${submission.title}'`,
        ipAddress: ctx.ipAddress,
      });
      await this.notifications.notifyReviewers(tx, {
        title: 'New Submission',
        message: `${mac.acronym} submitted: ${submission.title}`,
        submissionId: submission.id,
        eventKey: `submission.created:${submission.id}`,
      });

      console.log(`[workflow] ${submission.id} created by ${actor.id} (PENDING)`);
      return submission;
    });
  }

  // ─── edit ──────────────────────────────────────────────────────────────────

  /**
   * Officers edit their own PENDING or RETURNED submissions; a RETURNED one goes
   * back to PENDING. Admins may edit in any status, which is then left as is
   * apart from the same RETURNED reset.
   */
  async edit(actor: Actor, id: string, input: unknown, ctx: RequestContext = {}): Promise<Submission> {
    return this.store.transaction(async (tx) => {
      const current = await this.load(tx, id);
      assertCan(actor, 'submission.edit', current);
      const data = parseInput(UpdateSubmissionSchema, input);

      const to = nextStatus('edit', current.status) ?? current.status;
      const now = this.clock();
      const patch: SubmissionPatch = {
        title: data.title,
        contentType: data.contentType,
        description: data.description,
        tags: data.tags,
        isConfidential: data.isConfidential,
        fileRef: data.fileRef,
        status: to,
        updatedAt: now,
      };
      const updated = await this.compareAndSet(tx, current, patch);

      await this.audit.record(tx, {
        actor,
        action: 'SUBMISSION_UPDATED',
        submissionId: id,
        description:
          current.status === 'RETURNED'
            ? `Resubmitted '${updated.title}' after edits`
            : `Updated submission '${updated.title}'`,
        ipAddress: ctx.ipAddress,
      });

      if (current.status === 'RETURNED' && current.reviewedBy) {
        const reviewer = await tx.getUser(current.reviewedBy);
        if (reviewer?.isActive) {
          const mac = await tx.getMac(updated.macId);
          await this.notifications.notify(tx, {
            recipient: reviewer,
            title: 'Submission Resubmitted',
            message: `${mac?.acronym ?? 'An agency'} resubmitted: ${updated.title}`,
            submissionId: id,
            eventKey: `submission.resubmitted:${id}:${now.getTime()}`,
          });
        }
      }

      this.logTransition(id, current.status, updated.status, actor);
      return updated;
    });
  }

  // ─── start review ──────────────────────────────────────────────────────────

  async startReview(actor: Actor, id: string, ctx: RequestContext = {}): Promise<Submission> {
    return this.store.transaction(async (tx) => {
      const current = await this.load(tx, id);
      assertCan(actor, 'submission.start_review', current);
      const to = this.requireEdge('start_review', current);

      const now = this.clock();
      const updated = await this.compareAndSet(tx, current, {
        status: to,
        assignedTo: actor.id,
        updatedAt: now,
      });

      await this.audit.record(tx, {
        actor,
        action: 'SUBMISSION_REVIEWED',
        submissionId: id,
        description: `Started review of '${updated.title}'`,
        ipAddress: ctx.ipAddress,
      });
      await this.notifySubmitter(tx, updated, {
        title: 'Submission Under Review',
        message: `Your submission '${updated.title}' is now under review.`,
        eventKey: `submission.under_review:${id}:${now.getTime()}`,
      });

      this.logTransition(id, current.status, to, actor);
      return updated;
    });
  }

  // ─── review ────────────────────────────────────────────────────────────────

  async review(actor: Actor, id: string, input: unknown, ctx: RequestContext = {}): Promise<Submission> {
    return this.store.transaction(async (tx) => {
      const current = await this.load(tx, id);
      assertCan(actor, 'submission.review', current);
      const decision = parseInput(ReviewDecisionSchema, input);
      const to = this.requireEdge(decision.action, current);

      const now = this.clock();
      const patch: SubmissionPatch = {
        status: to,
        reviewedBy: actor.id,
        reviewedAt: now,
        reviewerComments: decision.reviewerComments,
        priority: decision.priority,
        updatedAt: now,
      };
      if (decision.action === 'approve') {
        patch.approvedAt = now;
        patch.isPublished = decision.publish;
        patch.publishedAt = decision.publish ? now : null;
      } else if (decision.action === 'deny') {
        patch.denialReason = decision.denialReason;
      }
      const updated = await this.compareAndSet(tx, current, patch);

      await this.audit.record(tx, {
        actor,
        action: REVIEW_AUDIT[decision.action],
        submissionId: id,
        description: reviewDescription(decision, updated.title),
        ipAddress: ctx.ipAddress,
      });
      await this.notifySubmitter(tx, updated, {
        ...reviewNotice(decision, updated.title),
        eventKey: `submission.${decision.action}:${id}:${now.getTime()}`,
      });

      this.logTransition(id, current.status, to, actor);
      return updated;
    });
  }

  // ─── delete ────────────────────────────────────────────────────────────────

  /** The audit entry is written first and names the submission in text only. */
  async delete(actor: Actor, id: string, ctx: RequestContext = {}): Promise<void> {
    await this.store.transaction(async (tx) => {
      const current = await this.load(tx, id);
      assertCan(actor, 'submission.delete', current);

      const mac = await tx.getMac(current.macId);
      await this.audit.record(tx, {
        actor,
        action: 'SUBMISSION_DELETED',
        submissionId: null,
        description:
          `Deleted submission '${current.title}' (${mac?.acronym ?? current.macId}, ` +
          `${current.status}, id ${current.id})`,
        ipAddress: ctx.ipAddress,
      });

      const removed = await tx.deleteSubmissionIfStatus(id, current.status);
      if (!removed) throw conflict(current);

      console.log(`[workflow] ${id} deleted by ${actor.id} (was ${current.status})`);
    });
  }

  // ─── internals ─────────────────────────────────────────────────────────────

  private async load(tx: StoreTx, id: string): Promise<Submission> {
    const submission = await tx.getSubmission(id);
    if (!submission) throw new NotFoundError('Submission', id);
    return submission;
  }

  private requireEdge(event: TransitionEvent, current: Submission): SubmissionStatusType {
    const to = nextStatus(event, current.status);
    if (!to) {
      throw new ConflictError(`Cannot ${EVENT_VERBS[event]} a submission that is ${current.status}`);
    }
    return to;
  }

  private async compareAndSet(
    tx: StoreTx,
    current: Submission,
    patch: SubmissionPatch
  ): Promise<Submission> {
    const updated = await tx.updateSubmissionIfStatus(current.id, current.status, patch);
    if (!updated) throw conflict(current);
    return updated;
  }

  private async notifySubmitter(
    tx: StoreTx,
    submission: Submission,
    notice: { title: string; message: string; eventKey: string }
  ): Promise<void> {
    if (!submission.submittedBy) return;
    const submitter = await tx.getUser(submission.submittedBy);
    if (!submitter) return;
    await this.notifications.notify(tx, {
      recipient: submitter,
      submissionId: submission.id,
      ...notice,
    });
  }

  private logTransition(
    id: string,
    from: SubmissionStatusType,
    to: SubmissionStatusType,
    actor: Actor
  ): void {
    console.log(`[workflow] ${id} ${from} → ${to} by ${actor.id}`);
  }
}

function conflict(current: Submission): ConflictError {
  return new ConflictError(
    `Submission ${current.id} was changed by another request (expected ${current.status}); reload and try again`
  );
}

function reviewDescription(decision: ReviewDecision, title: string): string {
  switch (decision.action) {
    case 'approve':
      return decision.publish
        ? `Approved and published submission '${title}'`
        : `Approved submission '${title}'`;
    case 'deny':
      return `Denied submission '${title}': ${decision.denialReason}`;
    case 'return':
      return `Returned submission '${title}' for edits`;
  }
}

function reviewNotice(decision: ReviewDecision, title: string): { title: string; message: string } {
  switch (decision.action) {
    case 'approve':
      return {
        title: 'Submission Approved',
        message: decision.publish
          ? `Your submission '${title}' has been approved and published.`
          : `Your submission '${title}' has been approved.`,
      };
    case 'deny':
      return {
        title: 'Submission Denied',
        message: `Your submission '${title}' has been denied. Reason: ${decision.denialReason}`,
      };
    case 'return':
      return {
        title: 'Submission Returned for Edits',
        message: `Please review and update your submission '${title}'. Comments: ${decision.reviewerComments}`,
      };
  }
}
