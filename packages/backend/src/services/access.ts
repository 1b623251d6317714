/**
 * Access Evaluator
 *
 * A pure capability table keyed by (role, action). Every mutating service call
 * asks `canPerform` before touching storage. Combinations missing from the
 * table are denied.
 */

import type { SubmissionStatusType, UserRoleType } from '@pressdesk/shared';
import type { Actor } from '../domain';
import { PermissionError } from '../errors';

export type AccessAction =
  | 'submission.create'
  | 'submission.view'
  | 'submission.edit'
  | 'submission.delete'
  | 'submission.start_review'
  | 'submission.review'
  | 'submission.export'
  | 'comment.add'
  | 'comment.view_internal'
  | 'audit.view_all'
  | 'analytics.view'
  | 'library.view'
  | 'user.manage'
  | 'mac.manage';

/** What the evaluator knows about the target. Omitted fields never grant access. */
export interface AccessResource {
  macId?: string | null;
  macActive?: boolean;
  submittedBy?: string | null;
  status?: SubmissionStatusType;
}

type Rule = true | ((actor: Actor, resource: AccessResource) => boolean);

const OFFICER_EDITABLE: ReadonlySet<SubmissionStatusType> = new Set(['PENDING', 'RETURNED']);
const OFFICER_DELETABLE: ReadonlySet<SubmissionStatusType> = new Set(['PENDING']);

const ownMac = (actor: Actor, r: AccessResource): boolean =>
  actor.macId !== null && r.macId === actor.macId;

const isSubmitter = (actor: Actor, r: AccessResource): boolean =>
  r.submittedBy !== undefined && r.submittedBy !== null && r.submittedBy === actor.id;

const CAPABILITIES: Record<UserRoleType, Partial<Record<AccessAction, Rule>>> = {
  MAC_OFFICER: {
    'submission.create': (actor, r) => ownMac(actor, r) && r.macActive === true,
    'submission.view': ownMac,
    'submission.edit': (actor, r) =>
      isSubmitter(actor, r) && r.status !== undefined && OFFICER_EDITABLE.has(r.status),
    'submission.delete': (actor, r) =>
      isSubmitter(actor, r) && r.status !== undefined && OFFICER_DELETABLE.has(r.status),
    'submission.export': true,
    'library.view': true,
  },
  MICAT_REVIEWER: {
    'submission.view': true,
    'submission.start_review': true,
    'submission.review': true,
    'submission.export': true,
    'comment.add': true,
    'comment.view_internal': true,
    'library.view': true,
  },
  ADMIN: {
    'submission.create': true,
    'submission.view': true,
    'submission.edit': true,
    'submission.delete': true,
    'submission.start_review': true,
    'submission.review': true,
    'submission.export': true,
    'comment.add': true,
    'comment.view_internal': true,
    'audit.view_all': true,
    'analytics.view': true,
    'library.view': true,
    'user.manage': true,
    'mac.manage': true,
  },
};

const DENIAL_MESSAGES: Record<AccessAction, string> = {
  'submission.create': 'You must belong to an active agency to submit content',
  'submission.view': "You don't have permission to view this submission",
  'submission.edit': "You don't have permission to edit this submission",
  'submission.delete': "You don't have permission to delete this submission",
  'submission.start_review': 'Only reviewers can start a review',
  'submission.review': 'Only reviewers can review submissions',
  'submission.export': "You don't have permission to export submissions",
  'comment.add': 'Only reviewers can add comments',
  'comment.view_internal': "You don't have permission to view internal comments",
  'audit.view_all': "You don't have permission to view the full activity log",
  'analytics.view': 'Only administrators can view analytics',
  'library.view': "You don't have permission to view the content library",
  'user.manage': 'Only administrators can manage users',
  'mac.manage': 'Only administrators can manage agencies',
};

export function canPerform(
  actor: Actor,
  action: AccessAction,
  resource: AccessResource = {}
): boolean {
  const rule = CAPABILITIES[actor.role]?.[action];
  if (rule === undefined) return false;
  if (rule === true) return true;
  return rule(actor, resource);
}

/** Throws PermissionError when `canPerform` says no. */
export function assertCan(actor: Actor, action: AccessAction, resource?: AccessResource): void {
  if (!canPerform(actor, action, resource)) {
    throw new PermissionError(DENIAL_MESSAGES[action]);
  }
}
