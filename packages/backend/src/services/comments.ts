import { CommentCreateSchema } from '@pressdesk/shared';
import type { Actor, Comment, RequestContext } from '../domain';
import { NotFoundError, PermissionError, parseInput } from '../errors';
import type { Store } from '../store/types';
import { assertCan } from './access';
import type { AuditSink } from './audit';
import type { NotificationDispatcher } from './notifications';
import { canSeeInternalComments, isVisible } from './visibility';

export class CommentService {
  constructor(
    private readonly store: Store,
    private readonly audit: AuditSink,
    private readonly notifications: NotificationDispatcher,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Reviewer feedback on a submission. Internal comments stay with reviewers;
   * anything else also notifies the submitter.
   */
  async add(actor: Actor, submissionId: string, input: unknown, ctx: RequestContext = {}): Promise<Comment> {
    return this.store.transaction(async (tx) => {
      const submission = await tx.getSubmission(submissionId);
      if (!submission) throw new NotFoundError('Submission', submissionId);
      assertCan(actor, 'comment.add', submission);
      const data = parseInput(CommentCreateSchema, input);

      const comment = await tx.insertComment({
        submissionId,
        userId: actor.id,
        text: data.text,
        isInternal: data.isInternal,
        createdAt: this.clock(),
      });

      await this.audit.record(tx, {
        actor,
        action: 'COMMENT_ADDED',
        submissionId,
        description: `Added ${data.isInternal ? 'internal ' : ''}comment on '${submission.title}'`,
        ipAddress: ctx.ipAddress,
      });

      if (!data.isInternal && submission.submittedBy && submission.submittedBy !== actor.id) {
        const submitter = await tx.getUser(submission.submittedBy);
        if (submitter) {
          await this.notifications.notify(tx, {
            recipient: submitter,
            title: 'New Comment',
            message: `A reviewer added a comment on '${submission.title}'`,
            submissionId,
            eventKey: `comment.added:${comment.id}`,
          });
        }
      }

      return comment;
    });
  }

  async list(actor: Actor, submissionId: string): Promise<Comment[]> {
    const submission = await this.store.getSubmission(submissionId);
    if (!submission) throw new NotFoundError('Submission', submissionId);
    if (!isVisible(actor, submission)) {
      throw new PermissionError("You don't have permission to view this submission");
    }
    return this.store.listComments(submissionId, {
      includeInternal: canSeeInternalComments(actor),
    });
  }
}
