import type {
  AuditAction,
  ContentTypeType,
  PriorityType,
  SubmissionStatusType,
  UserRoleType,
} from '@pressdesk/shared';

// ─── Identity ────────────────────────────────────────────────────────────────

/** The authenticated caller, as resolved by the identity middleware. */
export interface Actor {
  id: string;
  role: UserRoleType;
  macId: string | null;
  email: string;
  fullName: string;
}

export interface User {
  id: string;
  email: string;
  fullName: string;
  role: UserRoleType;
  macId: string | null;
  isActive: boolean;
}

/** Ministry, Agency or Commission */
export interface Mac {
  id: string;
  name: string;
  acronym: string;
  isActive: boolean;
}

// ─── Submission ──────────────────────────────────────────────────────────────

export interface Submission {
  id: string;
  title: string;
  contentType: ContentTypeType;
  description: string;
  tags: string;            // comma-delimited, as entered
  fileRef: string;
  isConfidential: boolean;
  macId: string;
  submittedBy: string | null;
  assignedTo: string | null;
  reviewedBy: string | null;
  status: SubmissionStatusType;
  priority: PriorityType;
  isPublished: boolean;
  reviewerComments: string;
  denialReason: string;
  submittedAt: Date;
  reviewedAt: Date | null;
  approvedAt: Date | null;
  publishedAt: Date | null;
  updatedAt: Date;
}

export interface Comment {
  id: string;
  submissionId: string;
  userId: string;
  text: string;
  isInternal: boolean;
  createdAt: Date;
}

// ─── Side-effect records ─────────────────────────────────────────────────────

export interface AuditEntry {
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

export interface Notification {
  id: string;
  userId: string;
  title: string;
  message: string;
  submissionId: string | null;
  eventKey: string;
  isRead: boolean;
  createdAt: Date;
}

/** Per-request data that flows into audit entries. */
export interface RequestContext {
  ipAddress?: string | null;
}
