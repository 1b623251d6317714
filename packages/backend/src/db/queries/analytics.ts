import { ContentType, SubmissionStatus, type ContentTypeType, type SubmissionStatusType } from '@pressdesk/shared';
import type { AgencyTotals, AnalyticsFacts, PersonCount } from '../../store/types';
import type { Queryable } from '../pool';

// ─── Types ────────────────────────────────────────────────────────────────────

interface AgencyTotalsRow {
  id: string;
  acronym: string;
  name: string;
  total: string;
  approved: string;
  pending: string;
}

interface PersonCountRow {
  id: string;
  full_name: string;
  email: string;
  count: string;
}

function toAgencyTotals(row: AgencyTotalsRow): AgencyTotals {
  return {
    macId: row.id,
    acronym: row.acronym,
    name: row.name,
    total: parseInt(row.total, 10),
    approved: parseInt(row.approved, 10),
    pending: parseInt(row.pending, 10),
  };
}

function toPersonCount(row: PersonCountRow): PersonCount {
  return { userId: row.id, fullName: row.full_name, email: row.email, count: parseInt(row.count, 10) };
}

// ─── Queries ──────────────────────────────────────────────────────────────────

async function countOf(sql: string, params: unknown[], db: Queryable): Promise<number> {
  const { rows } = await db.query<{ count: string }>(sql, params);
  return parseInt(rows[0]?.count ?? '0', 10);
}

export async function getAnalyticsFacts(since: Date, top: number, db: Queryable): Promise<AnalyticsFacts> {
  const [
    activeUsers,
    activeMacs,
    statusRows,
    typeRows,
    macRows,
    submitterRows,
    reviewerRows,
    dayRows,
    submittedSince,
    approvedSince,
  ] = await Promise.all([
    countOf('SELECT COUNT(*) AS count FROM users WHERE is_active', [], db),
    countOf('SELECT COUNT(*) AS count FROM macs WHERE is_active', [], db),
    db.query<{ status: string; count: string }>(
      'SELECT status, COUNT(*) AS count FROM submissions GROUP BY status'
    ),
    db.query<{ content_type: string; count: string }>(
      'SELECT content_type, COUNT(*) AS count FROM submissions GROUP BY content_type'
    ),
    db.query<AgencyTotalsRow>(
      `SELECT m.id, m.acronym, m.name,
              COUNT(s.id) AS total,
              COUNT(s.id) FILTER (WHERE s.status = 'APPROVED') AS approved,
              COUNT(s.id) FILTER (WHERE s.status = 'PENDING') AS pending
         FROM macs m
         LEFT JOIN submissions s ON s.mac_id = m.id
        GROUP BY m.id
        ORDER BY total DESC, m.acronym ASC
        LIMIT $1`,
      [top]
    ),
    db.query<PersonCountRow>(
      `SELECT u.id, u.full_name, u.email, COUNT(s.id) AS count
         FROM users u
         LEFT JOIN submissions s ON s.submitted_by = u.id
        WHERE u.role = 'MAC_OFFICER'
        GROUP BY u.id
        ORDER BY count DESC, u.full_name ASC, u.email ASC
        LIMIT $1`,
      [top]
    ),
    db.query<PersonCountRow>(
      `SELECT u.id, u.full_name, u.email, COUNT(s.id) AS count
         FROM users u
         LEFT JOIN submissions s ON s.reviewed_by = u.id
        WHERE u.role = 'MICAT_REVIEWER'
        GROUP BY u.id
        ORDER BY count DESC, u.full_name ASC, u.email ASC
        LIMIT $1`,
      [top]
    ),
    db.query<{ day: string; count: string }>(
      `SELECT to_char(submitted_at AT TIME ZONE 'UTC', 'YYYY-MM-DD') AS day, COUNT(*) AS count
         FROM submissions
        WHERE submitted_at >= $1
        GROUP BY day
        ORDER BY day`,
      [since]
    ),
    countOf('SELECT COUNT(*) AS count FROM submissions WHERE submitted_at >= $1', [since], db),
    countOf('SELECT COUNT(*) AS count FROM submissions WHERE approved_at >= $1', [since], db),
  ]);

  const byStatus: Record<SubmissionStatusType, number> = {
    PENDING: 0, UNDER_REVIEW: 0, APPROVED: 0, DENIED: 0, RETURNED: 0,
  };
  for (const row of statusRows.rows) {
    byStatus[SubmissionStatus.parse(row.status)] = parseInt(row.count, 10);
  }

  const byContentType: Record<ContentTypeType, number> = {
    PRESS_RELEASE: 0, ANNOUNCEMENT: 0, SPEECH: 0, PHOTO: 0, VIDEO: 0, DOCUMENT: 0, OTHER: 0,
  };
  for (const row of typeRows.rows) {
    byContentType[ContentType.parse(row.content_type)] = parseInt(row.count, 10);
  }

  return {
    activeUsers,
    activeMacs,
    byStatus,
    byContentType,
    byMac: macRows.rows.map(toAgencyTotals),
    topSubmitters: submitterRows.rows.map(toPersonCount),
    topReviewers: reviewerRows.rows.map(toPersonCount),
    perDay: dayRows.rows.map((r) => ({ date: r.day, count: parseInt(r.count, 10) })),
    submittedSince,
    approvedSince,
  };
}
