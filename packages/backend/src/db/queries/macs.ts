import type { Mac } from '../../domain';
import type { Queryable } from '../pool';

export interface MacRow {
  id: string;
  name: string;
  acronym: string;
  is_active: boolean;
  created_at: Date;
}

function toMac(row: MacRow): Mac {
  return { id: row.id, name: row.name, acronym: row.acronym, isActive: row.is_active };
}

export async function getMacById(id: string, db: Queryable): Promise<Mac | null> {
  const { rows } = await db.query<MacRow>('SELECT * FROM macs WHERE id = $1', [id]);
  return rows[0] ? toMac(rows[0]) : null;
}

export async function getMacsByIds(ids: string[], db: Queryable): Promise<Mac[]> {
  if (ids.length === 0) return [];
  const { rows } = await db.query<MacRow>('SELECT * FROM macs WHERE id = ANY($1::uuid[])', [ids]);
  return rows.map(toMac);
}
