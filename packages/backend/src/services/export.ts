import { CONTENT_TYPE_LABELS, STATUS_LABELS } from '@pressdesk/shared';
import type { Mac, Submission, User } from '../domain';

export const EXPORT_HEADER = [
  'ID',
  'Title',
  'MAC',
  'Content Type',
  'Status',
  'Submitted By',
  'Submitted At',
  'Reviewed By',
  'Reviewed At',
  'Approved At',
  'Published At',
  'Tags',
] as const;

const MISSING = 'N/A';

/** `YYYY-MM-DD HH:MM` in UTC, or N/A. */
export function formatTimestamp(value: Date | null): string {
  if (!value) return MISSING;
  return value.toISOString().slice(0, 16).replace('T', ' ');
}

function displayName(user: User | undefined): string {
  if (!user) return MISSING;
  return user.fullName || user.email;
}

export function buildExportRows(
  submissions: Submission[],
  macs: Mac[],
  users: User[]
): string[][] {
  const macById = new Map(macs.map((m) => [m.id, m]));
  const userById = new Map(users.map((u) => [u.id, u]));

  const rows: string[][] = [[...EXPORT_HEADER]];
  for (const s of submissions) {
    rows.push([
      s.id,
      s.title,
      macById.get(s.macId)?.acronym ?? MISSING,
      CONTENT_TYPE_LABELS[s.contentType],
      STATUS_LABELS[s.status],
      displayName(s.submittedBy ? userById.get(s.submittedBy) : undefined),
      formatTimestamp(s.submittedAt),
      displayName(s.reviewedBy ? userById.get(s.reviewedBy) : undefined),
      formatTimestamp(s.reviewedAt),
      formatTimestamp(s.approvedAt),
      formatTimestamp(s.publishedAt),
      s.tags,
    ]);
  }
  return rows;
}

function csvCell(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** RFC 4180: CRLF line endings, fields quoted only when they need it. */
export function toCsv(rows: string[][]): string {
  return rows.map((row) => row.map(csvCell).join(',')).join('\r\n') + '\r\n';
}
