import type { Notification } from '../../domain';
import type { NewNotification } from '../../store/types';
import type { Queryable } from '../pool';

interface NotificationRow {
  id: string;
  user_id: string;
  title: string;
  message: string;
  submission_id: string | null;
  event_key: string;
  is_read: boolean;
  created_at: Date;
}

function toNotification(row: NotificationRow): Notification {
  return {
    id: row.id,
    userId: row.user_id,
    title: row.title,
    message: row.message,
    submissionId: row.submission_id,
    eventKey: row.event_key,
    isRead: row.is_read,
    createdAt: row.created_at,
  };
}

/**
 * Insert unless a notification for the same (user, event) already exists,
 * in which case the existing row is returned with `created: false`.
 */
export async function insertNotification(
  params: NewNotification,
  db: Queryable
): Promise<{ notification: Notification; created: boolean }> {
  const { rows } = await db.query<NotificationRow>(
    `INSERT INTO notifications (user_id, title, message, submission_id, event_key, created_at)
     VALUES ($1, $2, $3, $4, $5, $6)
     ON CONFLICT (user_id, event_key) DO NOTHING
     RETURNING *`,
    [params.userId, params.title, params.message, params.submissionId, params.eventKey, params.createdAt]
  );
  if (rows[0]) return { notification: toNotification(rows[0]), created: true };

  const { rows: existing } = await db.query<NotificationRow>(
    'SELECT * FROM notifications WHERE user_id = $1 AND event_key = $2',
    [params.userId, params.eventKey]
  );
  return { notification: toNotification(existing[0]), created: false };
}

export async function listNotifications(
  userId: string,
  limit: number,
  db: Queryable
): Promise<Notification[]> {
  const { rows } = await db.query<NotificationRow>(
    'SELECT * FROM notifications WHERE user_id = $1 ORDER BY created_at DESC LIMIT $2',
    [userId, limit]
  );
  return rows.map(toNotification);
}

export async function countUnreadNotifications(userId: string, db: Queryable): Promise<number> {
  const { rows } = await db.query<{ count: string }>(
    'SELECT COUNT(*) AS count FROM notifications WHERE user_id = $1 AND is_read = FALSE',
    [userId]
  );
  return parseInt(rows[0]?.count ?? '0', 10);
}

export async function markNotificationRead(
  id: string,
  userId: string,
  db: Queryable
): Promise<Notification | null> {
  const { rows } = await db.query<NotificationRow>(
    `UPDATE notifications SET is_read = TRUE
     WHERE id = $1 AND user_id = $2
     RETURNING *`,
    [id, userId]
  );
  return rows[0] ? toNotification(rows[0]) : null;
}
