import crypto from 'crypto';
import type { AuditAction } from '@pressdesk/shared';
import type { Actor, AuditEntry } from '../domain';
import type { Store, StoreTx } from '../store/types';
import { canPerform } from './access';

export interface AuditRecordInput {
  actor: Pick<Actor, 'id'> | null;
  action: AuditAction;
  submissionId?: string | null;
  description: string;
  ipAddress?: string | null;
}

const ADMIN_LOG_LIMIT = 100;
const OWN_LOG_LIMIT = 50;

export function hashAuditEntry(fields: {
  sequence: number;
  userId: string | null;
  action: string;
  submissionId: string | null;
  description: string;
  createdAt: Date;
  prevHash: string | null;
}): string {
  const payload = [
    String(fields.sequence),
    fields.userId ?? '',
    fields.action,
    fields.submissionId ?? '',
    fields.description,
    fields.createdAt.toISOString(),
    fields.prevHash ?? '',
  ].join('|');
  return crypto.createHash('sha256').update(payload).digest('hex');
}

/**
 * Walk entries in ascending sequence order and report the first break in the
 * hash chain, if any.
 */
export function verifyAuditChain(
  entries: AuditEntry[]
): { valid: true } | { valid: false; brokenAt: number } {
  const ordered = [...entries].sort((a, b) => a.sequence - b.sequence);
  for (let i = 0; i < ordered.length; i++) {
    const entry = ordered[i];
    const prev = i > 0 ? ordered[i - 1] : null;
    if (prev && entry.prevHash !== prev.hash) return { valid: false, brokenAt: entry.sequence };
    if (hashAuditEntry(entry) !== entry.hash) return { valid: false, brokenAt: entry.sequence };
  }
  return { valid: true };
}

/**
 * Audit Log Sink
 *
 * Appends a tamper-evident entry inside the caller's unit of work, so a failed
 * write rolls back the transition it describes.
 *
 * Hash formula (SHA-256):
 *   SHA256(sequence | user_id | action | submission_id | description | created_at | prev_hash)
 *
 * There is intentionally no update or delete.
 */
export class AuditSink {
  constructor(
    private readonly store: Store,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async record(tx: StoreTx, input: AuditRecordInput): Promise<AuditEntry> {
    const tip = await tx.lockAuditTip();
    const sequence = (tip?.sequence ?? 0) + 1;
    const prevHash = tip?.hash ?? null;
    const createdAt = this.clock();
    const fields = {
      sequence,
      userId: input.actor?.id ?? null,
      action: input.action,
      submissionId: input.submissionId ?? null,
      description: input.description,
      createdAt,
      prevHash,
    };

    return tx.appendAuditEntry({
      ...fields,
      ipAddress: input.ipAddress ?? null,
      hash: hashAuditEntry(fields),
    });
  }

  /** Activity log: admins see the latest entries system-wide, everyone else their own. */
  async listFor(actor: Actor): Promise<AuditEntry[]> {
    if (canPerform(actor, 'audit.view_all')) {
      return this.store.listAuditEntries({ limit: ADMIN_LOG_LIMIT });
    }
    return this.store.listAuditEntries({ userId: actor.id, limit: OWN_LOG_LIMIT });
  }
}
