import { UserRole, type UserRoleType } from '@pressdesk/shared';
import type { User } from '../../domain';
import type { Queryable } from '../pool';

export interface UserRow {
  id: string;
  email: string;
  full_name: string;
  role: string;
  mac_id: string | null;
  is_active: boolean;
  created_at: Date;
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    fullName: row.full_name,
    role: UserRole.parse(row.role),
    macId: row.mac_id,
    isActive: row.is_active,
  };
}

export async function getUserById(id: string, db: Queryable): Promise<User | null> {
  const { rows } = await db.query<UserRow>('SELECT * FROM users WHERE id = $1', [id]);
  return rows[0] ? toUser(rows[0]) : null;
}

export async function getUsersByIds(ids: string[], db: Queryable): Promise<User[]> {
  if (ids.length === 0) return [];
  const { rows } = await db.query<UserRow>('SELECT * FROM users WHERE id = ANY($1::uuid[])', [ids]);
  return rows.map(toUser);
}

export async function listActiveUsersByRole(role: UserRoleType, db: Queryable): Promise<User[]> {
  const { rows } = await db.query<UserRow>(
    'SELECT * FROM users WHERE role = $1 AND is_active = TRUE ORDER BY created_at ASC',
    [role]
  );
  return rows.map(toUser);
}
