import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type { Submission } from '../../domain';
import { NotFoundError, PermissionError, ValidationError } from '../../errors';
import { createWorld, validSubmission, type World } from '../../test-utils/fixtures';

describe('comments.ts', () => {
  let world: World;
  let submission: Submission;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    world = createWorld();
    submission = await world.services.workflow.create(world.officer, validSubmission);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('adds a public comment, audits it and notifies the submitter', async () => {
    const comment = await world.services.comments.add(world.reviewer, submission.id, {
      text: 'Please add a quote from the minister.',
    });

    expect(comment.isInternal).toBe(false);
    expect(comment.userId).toBe(world.reviewer.id);
    const [latest] = await world.store.listAuditEntries({ limit: 1 });
    expect(latest.action).toBe('COMMENT_ADDED');
    expect(latest.description).toBe("Added comment on 'Flood Update'");
    const [notification] = await world.store.listNotifications(world.officer.id, 10);
    expect(notification.title).toBe('New Comment');
    expect(notification.message).toBe("A reviewer added a comment on 'Flood Update'");
  });

  it('keeps internal comments away from the submitter', async () => {
    await world.services.comments.add(world.reviewer, submission.id, { text: 'Looks thin', isInternal: true });
    await world.services.comments.add(world.reviewer, submission.id, { text: 'Needs a date' });

    const forOfficer = await world.services.comments.list(world.officer, submission.id);
    const forReviewer = await world.services.comments.list(world.reviewer, submission.id);

    expect(forOfficer.map((c) => c.text)).toEqual(['Needs a date']);
    expect(forReviewer.map((c) => c.text)).toEqual(['Needs a date', 'Looks thin']);
    expect(await world.store.listNotifications(world.officer.id, 10)).toHaveLength(1);
  });

  it('refuses officers', async () => {
    await expect(
      world.services.comments.add(world.officer, submission.id, { text: 'Me too' })
    ).rejects.toThrow('Only reviewers can add comments');
  });

  it('requires text', async () => {
    await expect(
      world.services.comments.add(world.reviewer, submission.id, { text: '   ' })
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it("hides another agency's comments", async () => {
    await expect(world.services.comments.list(world.otherOfficer, submission.id)).rejects.toBeInstanceOf(
      PermissionError
    );
  });

  it('reports an unknown submission', async () => {
    await expect(world.services.comments.list(world.reviewer, 'nope')).rejects.toBeInstanceOf(NotFoundError);
  });
});
