import fs from 'fs';
import path from 'path';
import type { Pool } from 'pg';
import { withTransaction } from './pool';

/**
 * Apply all pending SQL migrations from the migrations/ directory.
 * Migrations are numbered (001_, 002_, etc.) and applied in lexicographic order.
 * Applied migrations are tracked in the `migrations` table and never re-applied.
 */
export async function runMigrations(
  pool: Pool,
  migrationsDir = path.join(__dirname, 'migrations')
): Promise<number> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS migrations (
      id          SERIAL PRIMARY KEY,
      filename    TEXT NOT NULL UNIQUE,
      applied_at  TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  const files = fs
    .readdirSync(migrationsDir)
    .filter((f) => f.endsWith('.sql'))
    .sort(); // lexicographic: 001_ < 002_ < ...

  let applied = 0;
  for (const file of files) {
    const { rows } = await pool.query('SELECT 1 FROM migrations WHERE filename = $1', [file]);
    if (rows.length > 0) continue;

    const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf-8');

    try {
      await withTransaction(pool, async (client) => {
        await client.query(sql);
        await client.query('INSERT INTO migrations (filename) VALUES ($1)', [file]);
      });
    } catch (err) {
      throw new Error(`Migration ${file} failed: ${err instanceof Error ? err.message : String(err)}`);
    }
    console.log(`[db] Applied migration: ${file}`);
    applied++;
  }

  if (applied === 0) {
    console.log('[db] Schema up to date (no pending migrations)');
  }
  return applied;
}
