import { AuditActionSchema } from '@pressdesk/shared';
import type { AuditEntry } from '../../domain';
import type { AuditTip, NewAuditEntry } from '../../store/types';
import type { Queryable } from '../pool';

interface AuditRow {
  sequence: string; // BIGINT
  user_id: string | null;
  action: string;
  submission_id: string | null;
  description: string;
  ip_address: string | null;
  prev_hash: string | null;
  hash: string;
  created_at: Date;
}

function toAuditEntry(row: AuditRow): AuditEntry {
  return {
    sequence: Number(row.sequence),
    userId: row.user_id,
    action: AuditActionSchema.parse(row.action),
    submissionId: row.submission_id,
    description: row.description,
    ipAddress: row.ip_address,
    prevHash: row.prev_hash,
    hash: row.hash,
    createdAt: row.created_at,
  };
}

/**
 * Read the chain tip under a transaction-scoped advisory lock so concurrent
 * appends queue up instead of forking the hash chain.
 */
export async function lockAuditTip(db: Queryable): Promise<AuditTip | null> {
  await db.query(`SELECT pg_advisory_xact_lock(hashtext('audit_log'))`);
  const { rows } = await db.query<{ sequence: string; hash: string }>(
    'SELECT sequence, hash FROM audit_log ORDER BY sequence DESC LIMIT 1'
  );
  return rows[0] ? { sequence: Number(rows[0].sequence), hash: rows[0].hash } : null;
}

// NOTE: append-only. No UPDATE or DELETE is ever issued against audit_log.
export async function appendAuditEntry(params: NewAuditEntry, db: Queryable): Promise<AuditEntry> {
  const { rows } = await db.query<AuditRow>(
    `INSERT INTO audit_log
       (sequence, user_id, action, submission_id, description, ip_address, prev_hash, hash, created_at)
     VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9)
     RETURNING *`,
    [
      params.sequence, params.userId, params.action, params.submissionId, params.description,
      params.ipAddress, params.prevHash, params.hash, params.createdAt,
    ]
  );
  return toAuditEntry(rows[0]);
}

export async function listAuditEntries(
  filter: { userId?: string; limit: number },
  db: Queryable
): Promise<AuditEntry[]> {
  const { rows } = filter.userId
    ? await db.query<AuditRow>(
        'SELECT * FROM audit_log WHERE user_id = $1 ORDER BY sequence DESC LIMIT $2',
        [filter.userId, filter.limit]
      )
    : await db.query<AuditRow>(
        'SELECT * FROM audit_log ORDER BY sequence DESC LIMIT $1',
        [filter.limit]
      );
  return rows.map(toAuditEntry);
}
