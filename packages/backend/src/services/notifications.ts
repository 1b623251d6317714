/**
 * Notification Dispatcher
 *
 * Persists an in-app notification inside the caller's unit of work (a failed
 * insert aborts the transition) and queues a best-effort email for after the
 * commit. Each (recipient, eventKey) pair is notified at most once.
 */

import type { Actor, Notification, User } from '../domain';
import { NotFoundError } from '../errors';
import type { Store, StoreTx } from '../store/types';
import { deliverBestEffort, type EmailTransport } from './email';

export interface NotifyInput {
  recipient: User;
  title: string;
  message: string;
  submissionId: string | null;
  /** Identifies the triggering event; re-dispatching the same key is a no-op. */
  eventKey: string;
}

export type BroadcastInput = Omit<NotifyInput, 'recipient'>;

const LIST_LIMIT = 100;

export class NotificationDispatcher {
  constructor(
    private readonly store: Store,
    private readonly email: EmailTransport,
    private readonly options: { dashboardUrl: string; clock?: () => Date }
  ) {}

  async notify(tx: StoreTx, input: NotifyInput): Promise<Notification> {
    const now = this.options.clock?.() ?? new Date();
    const { notification, created } = await tx.insertNotification({
      userId: input.recipient.id,
      title: input.title,
      message: input.message,
      submissionId: input.submissionId,
      eventKey: input.eventKey,
      createdAt: now,
    });

    if (created) {
      const { recipient } = input;
      tx.afterCommit(async () => {
        await deliverBestEffort(this.email, {
          to: recipient.email,
          subject: input.title,
          body: this.emailBody(input),
          context: { userId: recipient.id, submissionId: input.submissionId },
        });
      });
    }
    return notification;
  }

  /** Fan out to every active reviewer. Order across recipients is unspecified. */
  async notifyReviewers(tx: StoreTx, input: BroadcastInput): Promise<Notification[]> {
    const reviewers = await tx.listActiveUsersByRole('MICAT_REVIEWER');
    const sent: Notification[] = [];
    for (const recipient of reviewers) {
      sent.push(await this.notify(tx, { ...input, recipient }));
    }
    return sent;
  }

  async list(actor: Actor): Promise<{ notifications: Notification[]; unread: number }> {
    const [notifications, unread] = await Promise.all([
      this.store.listNotifications(actor.id, LIST_LIMIT),
      this.store.countUnreadNotifications(actor.id),
    ]);
    return { notifications, unread };
  }

  /**
   * Recipient-only and idempotent. Someone else's notification reads as not
   * found rather than forbidden. Not audited.
   */
  async markRead(actor: Actor, id: string): Promise<Notification> {
    const notification = await this.store.markNotificationRead(id, actor.id);
    if (!notification) throw new NotFoundError('Notification', id);
    return notification;
  }

  private emailBody(input: NotifyInput): string {
    const lines = [input.message, ''];
    if (input.submissionId) {
      lines.push(`View: ${this.options.dashboardUrl}/submissions/${input.submissionId}`);
    } else {
      lines.push(`Dashboard: ${this.options.dashboardUrl}`);
    }
    return lines.join('\n');
  }
}
