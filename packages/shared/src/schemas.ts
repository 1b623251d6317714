import { z } from 'zod';

// ─── Roles ───────────────────────────────────────────────────────────────────

export const UserRole = z.enum([
  'MAC_OFFICER',     // submits content on behalf of one agency
  'MICAT_REVIEWER',  // adjudicates submissions
  'ADMIN',
]);
export type UserRoleType = z.infer<typeof UserRole>;

// ─── Submission enums ────────────────────────────────────────────────────────

export const SubmissionStatus = z.enum([
  'PENDING',
  'UNDER_REVIEW',
  'APPROVED',
  'DENIED',
  'RETURNED',
]);
export type SubmissionStatusType = z.infer<typeof SubmissionStatus>;

export const Priority = z.enum(['LOW', 'MEDIUM', 'HIGH', 'URGENT']);
export type PriorityType = z.infer<typeof Priority>;

export const ContentType = z.enum([
  'PRESS_RELEASE',
  'ANNOUNCEMENT',
  'SPEECH',
  'PHOTO',
  'VIDEO',
  'DOCUMENT',
  'OTHER',
]);
export type ContentTypeType = z.infer<typeof ContentType>;

export const ReviewAction = z.enum(['approve', 'deny', 'return']);
export type ReviewActionType = z.infer<typeof ReviewAction>;

export const STATUS_LABELS: Record<SubmissionStatusType, string> = {
  PENDING: 'Pending Review',
  UNDER_REVIEW: 'Under Review',
  APPROVED: 'Approved',
  DENIED: 'Denied',
  RETURNED: 'Returned for Edits',
};

export const CONTENT_TYPE_LABELS: Record<ContentTypeType, string> = {
  PRESS_RELEASE: 'Press Release',
  ANNOUNCEMENT: 'Announcement',
  SPEECH: 'Speech',
  PHOTO: 'Photo',
  VIDEO: 'Video',
  DOCUMENT: 'Document',
  OTHER: 'Other',
};

// ─── Requests ────────────────────────────────────────────────────────────────

export const CreateSubmissionSchema = z.object({
  title: z.string().trim().min(1, 'Title is required').max(300),
  contentType: ContentType.default('PRESS_RELEASE'),
  description: z.string().trim().min(1, 'Description is required'),
  tags: z.string().max(500).optional().default(''),
  isConfidential: z.boolean().optional().default(false),
  fileRef: z
    .string()
    .trim()
    .min(1, 'File is required')
    .describe('Opaque reference to the uploaded artifact, issued by file storage'),
});
export type CreateSubmissionInput = z.input<typeof CreateSubmissionSchema>;
export type CreateSubmission = z.output<typeof CreateSubmissionSchema>;

// Omitted fields keep their stored value
export const UpdateSubmissionSchema = z.object({
  title: z.string().trim().min(1, 'Title is required').max(300).optional(),
  contentType: ContentType.optional(),
  description: z.string().trim().min(1, 'Description is required').optional(),
  tags: z.string().max(500).optional(),
  isConfidential: z.boolean().optional(),
  fileRef: z.string().trim().min(1).optional(),
});
export type UpdateSubmissionInput = z.input<typeof UpdateSubmissionSchema>;
export type UpdateSubmission = z.output<typeof UpdateSubmissionSchema>;

export const ReviewDecisionSchema = z
  .object({
    action: ReviewAction,
    reviewerComments: z.string().optional().default(''),
    priority: Priority.optional().default('MEDIUM'),
    publish: z.boolean().optional().default(false),
    denialReason: z.string().trim().optional().default(''),
  })
  .refine((d) => d.action !== 'deny' || d.denialReason.length > 0, {
    message: 'Denial reason is required',
    path: ['denialReason'],
  });
export type ReviewDecisionInput = z.input<typeof ReviewDecisionSchema>;
export type ReviewDecision = z.output<typeof ReviewDecisionSchema>;

export const CommentCreateSchema = z.object({
  text: z.string().trim().min(1, 'Comment text is required'),
  isInternal: z.boolean().optional().default(false),
});
export type CommentCreateInput = z.input<typeof CommentCreateSchema>;

export const SubmissionsQuerySchema = z.object({
  status: SubmissionStatus.optional(),
  macId: z.string().uuid().optional(),
  search: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(200).optional().default(50),
  offset: z.coerce.number().int().min(0).optional().default(0),
});
export type SubmissionsQuery = z.infer<typeof SubmissionsQuerySchema>;

export const ExportQuerySchema = z.object({
  status: SubmissionStatus.optional(),
  macId: z.string().uuid().optional(),
  search: z.string().optional(),
});
export type ExportQuery = z.infer<typeof ExportQuerySchema>;

export const LibraryQuerySchema = z.object({
  contentType: ContentType.optional(),
  macId: z.string().uuid().optional(),
  search: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(200).optional().default(50),
  offset: z.coerce.number().int().min(0).optional().default(0),
});
export type LibraryQuery = z.infer<typeof LibraryQuerySchema>;

// ─── Records (what the API returns) ──────────────────────────────────────────

export const SubmissionRecordSchema = z.object({
  id: z.string(),
  title: z.string(),
  contentType: ContentType,
  description: z.string(),
  tags: z.string(),
  tagList: z.array(z.string()),
  fileRef: z.string(),
  isConfidential: z.boolean(),
  macId: z.string(),
  submittedBy: z.string().nullable(),
  assignedTo: z.string().nullable(),
  reviewedBy: z.string().nullable(),
  status: SubmissionStatus,
  priority: Priority,
  isPublished: z.boolean(),
  reviewerComments: z.string(),
  denialReason: z.string(),
  submittedAt: z.string(),
  reviewedAt: z.string().nullable(),
  approvedAt: z.string().nullable(),
  publishedAt: z.string().nullable(),
  updatedAt: z.string(),
});
export type SubmissionRecord = z.infer<typeof SubmissionRecordSchema>;

export const CommentRecordSchema = z.object({
  id: z.string(),
  submissionId: z.string(),
  userId: z.string(),
  text: z.string(),
  isInternal: z.boolean(),
  createdAt: z.string(),
});
export type CommentRecord = z.infer<typeof CommentRecordSchema>;

export const NotificationRecordSchema = z.object({
  id: z.string(),
  title: z.string(),
  message: z.string(),
  submissionId: z.string().nullable(),
  isRead: z.boolean(),
  createdAt: z.string(),
});
export type NotificationRecord = z.infer<typeof NotificationRecordSchema>;

export const AuditEntryRecordSchema = z.object({
  sequence: z.number().int(),
  userId: z.string().nullable(),
  action: z.string(),
  submissionId: z.string().nullable(),
  description: z.string(),
  ipAddress: z.string().nullable(),
  hash: z.string(),
  createdAt: z.string(),
});
export type AuditEntryRecord = z.infer<typeof AuditEntryRecordSchema>;

export const SubmissionStatsSchema = z.object({
  total: z.number().int(),
  byStatus: z.record(SubmissionStatus, z.number().int()),
  myReviews: z.number().int().optional(),
});
export type SubmissionStats = z.infer<typeof SubmissionStatsSchema>;

// ─── Analytics (admin) ───────────────────────────────────────────────────────

export const AnalyticsQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(365).optional().default(30),
});
export type AnalyticsQuery = z.infer<typeof AnalyticsQuerySchema>;

const PersonCountSchema = z.object({
  userId: z.string(),
  fullName: z.string(),
  email: z.string(),
  count: z.number().int(),
});

export const SubmissionAnalyticsSchema = z.object({
  days: z.number().int(),
  totals: z.object({
    users: z.number().int(),
    macs: z.number().int(),
    submissions: z.number().int(),
    approved: z.number().int(),
    pending: z.number().int(),
    denied: z.number().int(),
    /** Percent of APPROVED over APPROVED + DENIED, one decimal; 0 when nothing is decided */
    approvalRate: z.number(),
  }),
  byMac: z.array(
    z.object({
      macId: z.string(),
      acronym: z.string(),
      name: z.string(),
      total: z.number().int(),
      approved: z.number().int(),
      pending: z.number().int(),
    })
  ),
  byStatus: z.array(z.object({ status: SubmissionStatus, count: z.number().int() })),
  contentTypes: z.array(z.object({ contentType: ContentType, count: z.number().int() })),
  /** Submissions per UTC day inside the window, oldest first */
  trend: z.array(z.object({ date: z.string(), count: z.number().int() })),
  topSubmitters: z.array(PersonCountSchema),
  topReviewers: z.array(PersonCountSchema),
  recentSubmissions: z.number().int(),
  recentApprovals: z.number().int(),
});
export type SubmissionAnalytics = z.infer<typeof SubmissionAnalyticsSchema>;
