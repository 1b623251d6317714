import type {
  AuditAction,
  ContentTypeType,
  PriorityType,
  SubmissionStatusType,
  UserRoleType,
} from '@pressdesk/shared';
import type { AuditEntry, Comment, Mac, Notification, Submission, User } from '../domain';

// ─── Scope ───────────────────────────────────────────────────────────────────

/**
 * The set of submissions a read is restricted to. A data description rather
 * than a closure so every storage engine can translate it (SQL WHERE, array
 * filter) and the visibility rules stay testable without a database.
 */
export type SubmissionScope =
  | { kind: 'all' }
  | { kind: 'mac'; macId: string }
  | { kind: 'published' }
  | { kind: 'none' };

export interface SubmissionFilter {
  status?: SubmissionStatusType;
  macId?: string;
  contentType?: ContentTypeType;
  search?: string;
  reviewedBy?: string;
  orderBy?: 'submitted_at' | 'published_at';
  /** Omit for an unbounded read (export) */
  limit?: number;
  offset?: number;
}

// ─── Write params ────────────────────────────────────────────────────────────

export interface NewSubmission {
  title: string;
  contentType: ContentTypeType;
  description: string;
  tags: string;
  fileRef: string;
  isConfidential: boolean;
  macId: string;
  submittedBy: string;
  submittedAt: Date;
}

/** Fields a transition may write. `status` is only ever set through a compare-and-set. */
export interface SubmissionPatch {
  title?: string;
  contentType?: ContentTypeType;
  description?: string;
  tags?: string;
  fileRef?: string;
  isConfidential?: boolean;
  assignedTo?: string | null;
  reviewedBy?: string | null;
  status?: SubmissionStatusType;
  priority?: PriorityType;
  isPublished?: boolean;
  reviewerComments?: string;
  denialReason?: string;
  reviewedAt?: Date | null;
  approvedAt?: Date | null;
  publishedAt?: Date | null;
  updatedAt: Date;
}

export interface NewComment {
  submissionId: string;
  userId: string;
  text: string;
  isInternal: boolean;
  createdAt: Date;
}

export interface NewNotification {
  userId: string;
  title: string;
  message: string;
  submissionId: string | null;
  eventKey: string;
  createdAt: Date;
}

export interface NewAuditEntry {
  sequence: number;
  userId: string | null;
  action: AuditAction;
  submissionId: string | null;
  description: string;
  ipAddress: string | null;
  prevHash: string | null;
  hash: string;
  createdAt: Date;
}

export interface AuditTip {
  sequence: number;
  hash: string;
}

// ─── Aggregates ──────────────────────────────────────────────────────────────

export interface AgencyTotals {
  macId: string;
  acronym: string;
  name: string;
  total: number;
  approved: number;
  pending: number;
}

export interface PersonCount {
  userId: string;
  fullName: string;
  email: string;
  count: number;
}

/** System-wide counts for the admin analytics view. Lists are already ranked and cut to `top`. */
export interface AnalyticsFacts {
  activeUsers: number;
  activeMacs: number;
  byStatus: Record<SubmissionStatusType, number>;
  byContentType: Record<ContentTypeType, number>;
  /** Agencies, most submissions first */
  byMac: AgencyTotals[];
  /** Officers by submissions made */
  topSubmitters: PersonCount[];
  /** Reviewers by submissions reviewed */
  topReviewers: PersonCount[];
  /** UTC day (YYYY-MM-DD) to submissions that day, for days at or after `since` */
  perDay: Array<{ date: string; count: number }>;
  submittedSince: number;
  approvedSince: number;
}

// ─── Repository ──────────────────────────────────────────────────────────────

export interface StoreReader {
  getSubmission(id: string): Promise<Submission | null>;
  findSubmissions(
    scope: SubmissionScope,
    filter: SubmissionFilter
  ): Promise<{ submissions: Submission[]; total: number }>;
  countSubmissionsByStatus(
    scope: SubmissionScope,
    filter?: Pick<SubmissionFilter, 'reviewedBy'>
  ): Promise<Record<SubmissionStatusType, number>>;

  getUser(id: string): Promise<User | null>;
  getUsersByIds(ids: string[]): Promise<User[]>;
  listActiveUsersByRole(role: UserRoleType): Promise<User[]>;

  getMac(id: string): Promise<Mac | null>;
  getMacsByIds(ids: string[]): Promise<Mac[]>;

  listComments(submissionId: string, opts: { includeInternal: boolean }): Promise<Comment[]>;

  listNotifications(userId: string, limit: number): Promise<Notification[]>;
  countUnreadNotifications(userId: string): Promise<number>;

  listAuditEntries(filter: { userId?: string; limit: number }): Promise<AuditEntry[]>;

  getAnalyticsFacts(since: Date, top: number): Promise<AnalyticsFacts>;
}

/**
 * Writes available inside a unit of work. Audit entries can only be appended:
 * there is deliberately no update or delete for them here.
 */
export interface StoreTx extends StoreReader {
  insertSubmission(params: NewSubmission): Promise<Submission>;
  /** Compare-and-set on status. Returns null when the row is gone or its status moved on. */
  updateSubmissionIfStatus(
    id: string,
    expected: SubmissionStatusType,
    patch: SubmissionPatch
  ): Promise<Submission | null>;
  deleteSubmissionIfStatus(id: string, expected: SubmissionStatusType): Promise<boolean>;

  insertComment(params: NewComment): Promise<Comment>;

  /** Idempotent per (userId, eventKey): `created` is false when the row already existed. */
  insertNotification(params: NewNotification): Promise<{ notification: Notification; created: boolean }>;

  /** Latest audit entry, read under a lock that serialises appends. */
  lockAuditTip(): Promise<AuditTip | null>;
  appendAuditEntry(params: NewAuditEntry): Promise<AuditEntry>;

  /** Run `hook` once the unit of work has committed. Skipped on rollback. */
  afterCommit(hook: () => Promise<void>): void;
}

export interface Store extends StoreReader {
  transaction<T>(fn: (tx: StoreTx) => Promise<T>): Promise<T>;
  /** Recipient-scoped and idempotent. Returns null when no such notification belongs to `userId`. */
  markNotificationRead(id: string, userId: string): Promise<Notification | null>;
}
