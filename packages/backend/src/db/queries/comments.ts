import type { Comment } from '../../domain';
import type { NewComment } from '../../store/types';
import type { Queryable } from '../pool';

interface CommentRow {
  id: string;
  submission_id: string;
  user_id: string;
  text: string;
  is_internal: boolean;
  created_at: Date;
}

function toComment(row: CommentRow): Comment {
  return {
    id: row.id,
    submissionId: row.submission_id,
    userId: row.user_id,
    text: row.text,
    isInternal: row.is_internal,
    createdAt: row.created_at,
  };
}

export async function listComments(
  submissionId: string,
  includeInternal: boolean,
  db: Queryable
): Promise<Comment[]> {
  const { rows } = await db.query<CommentRow>(
    `SELECT * FROM comments
     WHERE submission_id = $1 AND ($2::boolean OR is_internal = FALSE)
     ORDER BY created_at DESC`,
    [submissionId, includeInternal]
  );
  return rows.map(toComment);
}

export async function insertComment(params: NewComment, db: Queryable): Promise<Comment> {
  const { rows } = await db.query<CommentRow>(
    `INSERT INTO comments (submission_id, user_id, text, is_internal, created_at)
     VALUES ($1, $2, $3, $4, $5)
     RETURNING *`,
    [params.submissionId, params.userId, params.text, params.isInternal, params.createdAt]
  );
  return toComment(rows[0]);
}
