import { z } from 'zod';

/**
 * Canonical audit action tags.
 * Stored in audit_log.action; must remain stable across versions.
 */
export const AuditActions = {
  // Submission lifecycle
  SUBMISSION_CREATED:   'SUBMISSION_CREATED',
  SUBMISSION_UPDATED:   'SUBMISSION_UPDATED',
  SUBMISSION_REVIEWED:  'SUBMISSION_REVIEWED',
  SUBMISSION_APPROVED:  'SUBMISSION_APPROVED',
  SUBMISSION_DENIED:    'SUBMISSION_DENIED',
  SUBMISSION_RETURNED:  'SUBMISSION_RETURNED',
  SUBMISSION_DELETED:   'SUBMISSION_DELETED',

  // Review feedback
  COMMENT_ADDED:        'COMMENT_ADDED',
} as const;

export type AuditAction = (typeof AuditActions)[keyof typeof AuditActions];

export const AuditActionSchema = z.nativeEnum(AuditActions);
