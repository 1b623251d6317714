import type { Actor, Comment, Submission } from '../domain';
import type { SubmissionScope } from '../store/types';
import { canPerform } from './access';

/**
 * Role-based read scope. Officers see their own agency's submissions;
 * reviewers and admins see everything. An officer with no agency sees nothing.
 */
export function scopeFor(actor: Actor): SubmissionScope {
  switch (actor.role) {
    case 'MAC_OFFICER':
      return actor.macId ? { kind: 'mac', macId: actor.macId } : { kind: 'none' };
    case 'MICAT_REVIEWER':
    case 'ADMIN':
      return { kind: 'all' };
  }
}

/** The content library: approved and published, for any authenticated actor. */
export function publicScope(): SubmissionScope {
  return { kind: 'published' };
}

/** The predicate a scope describes. */
export function inScope(scope: SubmissionScope, s: Submission): boolean {
  switch (scope.kind) {
    case 'all':
      return true;
    case 'mac':
      return s.macId === scope.macId;
    case 'published':
      return s.status === 'APPROVED' && s.isPublished;
    case 'none':
      return false;
  }
}

export function isVisible(actor: Actor, s: Submission): boolean {
  return inScope(scopeFor(actor), s);
}

export function canSeeInternalComments(actor: Actor): boolean {
  return canPerform(actor, 'comment.view_internal');
}

export function visibleComments(actor: Actor, comments: Comment[]): Comment[] {
  return canSeeInternalComments(actor) ? comments : comments.filter((c) => !c.isInternal);
}
