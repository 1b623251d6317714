import { ContentType, Priority, SubmissionStatus, type SubmissionStatusType } from '@pressdesk/shared';
import type { Submission } from '../../domain';
import type {
  NewSubmission,
  SubmissionFilter,
  SubmissionPatch,
  SubmissionScope,
} from '../../store/types';
import type { Queryable } from '../pool';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface SubmissionRow {
  id: string;
  title: string;
  content_type: string;
  description: string;
  tags: string;
  file_ref: string;
  is_confidential: boolean;
  mac_id: string;
  submitted_by: string | null;
  assigned_to: string | null;
  reviewed_by: string | null;
  status: string;
  priority: string;
  is_published: boolean;
  reviewer_comments: string;
  denial_reason: string;
  submitted_at: Date;
  reviewed_at: Date | null;
  approved_at: Date | null;
  published_at: Date | null;
  updated_at: Date;
}

export function toSubmission(row: SubmissionRow): Submission {
  return {
    id: row.id,
    title: row.title,
    contentType: ContentType.parse(row.content_type),
    description: row.description,
    tags: row.tags,
    fileRef: row.file_ref,
    isConfidential: row.is_confidential,
    macId: row.mac_id,
    submittedBy: row.submitted_by,
    assignedTo: row.assigned_to,
    reviewedBy: row.reviewed_by,
    status: SubmissionStatus.parse(row.status),
    priority: Priority.parse(row.priority),
    isPublished: row.is_published,
    reviewerComments: row.reviewer_comments,
    denialReason: row.denial_reason,
    submittedAt: row.submitted_at,
    reviewedAt: row.reviewed_at,
    approvedAt: row.approved_at,
    publishedAt: row.published_at,
    updatedAt: row.updated_at,
  };
}

const PATCH_COLUMNS: Record<keyof SubmissionPatch, string> = {
  title: 'title',
  contentType: 'content_type',
  description: 'description',
  tags: 'tags',
  fileRef: 'file_ref',
  isConfidential: 'is_confidential',
  assignedTo: 'assigned_to',
  reviewedBy: 'reviewed_by',
  status: 'status',
  priority: 'priority',
  isPublished: 'is_published',
  reviewerComments: 'reviewer_comments',
  denialReason: 'denial_reason',
  reviewedAt: 'reviewed_at',
  approvedAt: 'approved_at',
  publishedAt: 'published_at',
  updatedAt: 'updated_at',
};

function isPatchKey(key: string): key is keyof SubmissionPatch {
  return Object.prototype.hasOwnProperty.call(PATCH_COLUMNS, key);
}

// ─── Scope + filter → WHERE ───────────────────────────────────────────────────

interface WhereClause {
  where: string;
  params: unknown[];
  nextIdx: number;
}

function buildWhere(scope: SubmissionScope, filter: SubmissionFilter): WhereClause {
  const conditions: string[] = [];
  const params: unknown[] = [];
  let idx = 1;

  switch (scope.kind) {
    case 'all':
      break;
    case 'mac':
      conditions.push(`s.mac_id = $${idx++}`);
      params.push(scope.macId);
      break;
    case 'published':
      conditions.push(`s.status = 'APPROVED' AND s.is_published = TRUE`);
      break;
    case 'none':
      conditions.push('FALSE');
      break;
  }

  if (filter.status) {
    conditions.push(`s.status = $${idx++}`);
    params.push(filter.status);
  }
  if (filter.macId) {
    conditions.push(`s.mac_id = $${idx++}`);
    params.push(filter.macId);
  }
  if (filter.contentType) {
    conditions.push(`s.content_type = $${idx++}`);
    params.push(filter.contentType);
  }
  if (filter.reviewedBy) {
    conditions.push(`s.reviewed_by = $${idx++}`);
    params.push(filter.reviewedBy);
  }
  if (filter.search) {
    conditions.push(`(s.title ILIKE $${idx} OR s.description ILIKE $${idx} OR s.tags ILIKE $${idx})`);
    params.push(`%${filter.search}%`);
    idx++;
  }

  const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
  return { where, params, nextIdx: idx };
}

// ─── Queries ──────────────────────────────────────────────────────────────────

export async function getSubmissionById(id: string, db: Queryable): Promise<Submission | null> {
  const { rows } = await db.query<SubmissionRow>('SELECT * FROM submissions WHERE id = $1', [id]);
  return rows[0] ? toSubmission(rows[0]) : null;
}

export async function findSubmissions(
  scope: SubmissionScope,
  filter: SubmissionFilter,
  db: Queryable
): Promise<{ submissions: Submission[]; total: number }> {
  const { where, params, nextIdx } = buildWhere(scope, filter);

  const { rows: countRows } = await db.query<{ count: string }>(
    `SELECT COUNT(*) AS count FROM submissions s ${where}`, params
  );
  const total = parseInt(countRows[0]?.count ?? '0', 10);

  const order = filter.orderBy === 'published_at'
    ? 's.published_at DESC NULLS LAST, s.submitted_at DESC'
    : 's.submitted_at DESC';

  // LIMIT NULL is LIMIT ALL in PostgreSQL
  const { rows } = await db.query<SubmissionRow>(
    `SELECT * FROM submissions s ${where}
     ORDER BY ${order}
     LIMIT $${nextIdx} OFFSET $${nextIdx + 1}`,
    [...params, filter.limit ?? null, filter.offset ?? 0]
  );

  return { submissions: rows.map(toSubmission), total };
}

export async function countSubmissionsByStatus(
  scope: SubmissionScope,
  filter: Pick<SubmissionFilter, 'reviewedBy'>,
  db: Queryable
): Promise<Array<{ status: string; count: number }>> {
  const { where, params } = buildWhere(scope, filter);
  const { rows } = await db.query<{ status: string; count: string }>(
    `SELECT s.status, COUNT(*) AS count FROM submissions s ${where} GROUP BY s.status`,
    params
  );
  return rows.map((r) => ({ status: r.status, count: parseInt(r.count, 10) }));
}

export async function insertSubmission(params: NewSubmission, db: Queryable): Promise<Submission> {
  const { rows } = await db.query<SubmissionRow>(
    `INSERT INTO submissions (
       title, content_type, description, tags, file_ref, is_confidential,
       mac_id, submitted_by, status, submitted_at, updated_at
     ) VALUES ($1,$2,$3,$4,$5,$6,$7,$8,'PENDING',$9,$9)
     RETURNING *`,
    [
      params.title, params.contentType, params.description, params.tags, params.fileRef,
      params.isConfidential, params.macId, params.submittedBy, params.submittedAt,
    ]
  );
  return toSubmission(rows[0]);
}

/**
 * Compare-and-set update: only applies when the row still has `expected` status.
 * Returns null when the row is gone or another transition got there first.
 */
export async function updateSubmissionIfStatus(
  id: string,
  expected: SubmissionStatusType,
  patch: SubmissionPatch,
  db: Queryable
): Promise<Submission | null> {
  const sets: string[] = [];
  const params: unknown[] = [id, expected];
  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined || !isPatchKey(key)) continue;
    params.push(value);
    sets.push(`${PATCH_COLUMNS[key]} = $${params.length}`);
  }

  const { rows } = await db.query<SubmissionRow>(
    `UPDATE submissions SET ${sets.join(', ')}
     WHERE id = $1 AND status = $2
     RETURNING *`,
    params
  );
  return rows[0] ? toSubmission(rows[0]) : null;
}

export async function deleteSubmissionIfStatus(
  id: string,
  expected: SubmissionStatusType,
  db: Queryable
): Promise<boolean> {
  const { rowCount } = await db.query(
    'DELETE FROM submissions WHERE id = $1 AND status = $2', [id, expected]
  );
  return (rowCount ?? 0) > 0;
}
