import type {
  AuditEntryRecord,
  CommentRecord,
  NotificationRecord,
  SubmissionRecord,
} from '@pressdesk/shared';
import type { AuditEntry, Comment, Notification, Submission } from '../domain';
import { parseTags } from '../services/tags';

// Domain → API record. Dates become ISO strings; tags also come pre-split.

export function toIso(value: Date): string;
export function toIso(value: Date | null): string | null;
export function toIso(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}

export function formatSubmission(s: Submission): SubmissionRecord {
  return {
    ...s,
    tagList: parseTags(s.tags),
    submittedAt: toIso(s.submittedAt),
    reviewedAt: toIso(s.reviewedAt),
    approvedAt: toIso(s.approvedAt),
    publishedAt: toIso(s.publishedAt),
    updatedAt: toIso(s.updatedAt),
  };
}

export function formatComment(c: Comment): CommentRecord {
  return { ...c, createdAt: toIso(c.createdAt) };
}

export function formatNotification(n: Notification): NotificationRecord {
  return {
    id: n.id,
    title: n.title,
    message: n.message,
    submissionId: n.submissionId,
    isRead: n.isRead,
    createdAt: toIso(n.createdAt),
  };
}

export function formatAuditEntry(e: AuditEntry): AuditEntryRecord {
  return {
    sequence: e.sequence,
    userId: e.userId,
    action: e.action,
    submissionId: e.submissionId,
    description: e.description,
    ipAddress: e.ipAddress,
    hash: e.hash,
    createdAt: toIso(e.createdAt),
  };
}
