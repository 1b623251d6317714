import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { NotFoundError } from '../../errors';
import { createWorld, validSubmission, type World } from '../../test-utils/fixtures';
import { deliverBestEffort, disabledEmailTransport } from '../email';

describe('notifications.ts', () => {
  let world: World;

  beforeEach(() => {
    world = createWorld();
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const recipient = () => world.store.getUser(world.officer.id);

  describe('notify', () => {
    it('stores one notification per recipient and event key', async () => {
      const user = await recipient();
      if (!user) throw new Error('officer missing');

      const send = () =>
        world.store.transaction((tx) =>
          world.services.notifications.notify(tx, {
            recipient: user,
            title: 'Heads up',
            message: 'Something happened',
            submissionId: null,
            eventKey: 'manual:1',
          })
        );

      const first = await send();
      const second = await send();
      await world.store.settled();

      expect(second.id).toBe(first.id);
      expect(await world.store.listNotifications(user.id, 10)).toHaveLength(1);
      expect(world.email.sent).toHaveLength(1);
    });

    it('emails the message with a dashboard link after commit', async () => {
      const user = await recipient();
      if (!user) throw new Error('officer missing');

      await world.store.transaction((tx) =>
        world.services.notifications.notify(tx, {
          recipient: user,
          title: 'Submission Approved',
          message: 'Approved.',
          submissionId: 'sub-1',
          eventKey: 'manual:2',
        })
      );
      await world.store.settled();

      expect(world.email.sent).toEqual([
        {
          to: user.email,
          subject: '[Pressdesk] Submission Approved',
          body: 'Approved.\n\nView: https://press.example.test/submissions/sub-1',
        },
      ]);
    });

    it('sends no email when the unit of work rolls back', async () => {
      const user = await recipient();
      if (!user) throw new Error('officer missing');

      await expect(
        world.store.transaction(async (tx) => {
          await world.services.notifications.notify(tx, {
            recipient: user,
            title: 'Never',
            message: 'Never sent',
            submissionId: null,
            eventKey: 'manual:3',
          });
          throw new Error('abort');
        })
      ).rejects.toThrow('abort');
      await world.store.settled();

      expect(world.email.sent).toEqual([]);
      expect(await world.store.listNotifications(user.id, 10)).toEqual([]);
    });
  });

  describe('list and markRead', () => {
    it('lists newest first with an unread count', async () => {
      const s = await world.services.workflow.create(world.officer, validSubmission);
      await world.services.workflow.startReview(world.reviewer, s.id);
      await world.services.workflow.review(world.reviewer, s.id, { action: 'approve' });

      const { notifications, unread } = await world.services.notifications.list(world.officer);

      expect(notifications.map((n) => n.title)).toEqual(['Submission Approved', 'Submission Under Review']);
      expect(unread).toBe(2);
    });

    it('is idempotent and adds no audit entry', async () => {
      await world.services.workflow.create(world.officer, validSubmission);
      const [notification] = await world.store.listNotifications(world.reviewer.id, 10);
      const auditBefore = (await world.store.listAuditEntries({ limit: 100 })).length;

      const once = await world.services.notifications.markRead(world.reviewer, notification.id);
      const twice = await world.services.notifications.markRead(world.reviewer, notification.id);

      expect(once.isRead).toBe(true);
      expect(twice.isRead).toBe(true);
      expect((await world.services.notifications.list(world.reviewer)).unread).toBe(0);
      expect((await world.store.listAuditEntries({ limit: 100 })).length).toBe(auditBefore);
    });

    it("treats someone else's notification as not found", async () => {
      await world.services.workflow.create(world.officer, validSubmission);
      const [notification] = await world.store.listNotifications(world.reviewer.id, 10);

      await expect(
        world.services.notifications.markRead(world.secondReviewer, notification.id)
      ).rejects.toBeInstanceOf(NotFoundError);
      const [unchanged] = await world.store.listNotifications(world.reviewer.id, 10);
      expect(unchanged.isRead).toBe(false);
    });
  });

  describe('deliverBestEffort', () => {
    const message = {
      to: 'someone@example.test',
      subject: 'Hello',
      body: 'Body',
      context: { userId: 'u-1', submissionId: 's-1' },
    };

    it('skips when SMTP is not configured', async () => {
      expect(await deliverBestEffort(disabledEmailTransport, message)).toBe('skipped');
    });

    it('reports a failed send without throwing', async () => {
      const errors = vi.spyOn(console, 'error').mockImplementation(() => {});
      world.email.failWith = 'mailbox full';

      expect(await deliverBestEffort(world.email, message)).toBe('failed');
      expect(errors).toHaveBeenCalledWith('[email] Failed to send to user u-1 (submission s-1): mailbox full');
    });

    it('reports a thrown send without throwing', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      world.email.throwWith = new Error('connection reset');

      expect(await deliverBestEffort(world.email, message)).toBe('failed');
    });

    it('prefixes the subject', async () => {
      expect(await deliverBestEffort(world.email, message)).toBe('sent');
      expect(world.email.sent[0].subject).toBe('[Pressdesk] Hello');
    });
  });
});
