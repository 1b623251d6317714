import { Pool, PoolClient } from 'pg';

export type Queryable = Pool | PoolClient;

export function createPool(connectionString: string): Pool {
  const pool = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
  });

  pool.on('error', (err) => {
    console.error('[db] Unexpected PostgreSQL pool error:', err);
  });

  return pool;
}

/**
 * Run a set of operations inside a single ACID transaction.
 * On success: COMMIT. On any error: ROLLBACK + rethrow.
 * Pass the PoolClient to query helpers so they share the same connection.
 */
export async function withTransaction<T>(
  pool: Pool,
  fn: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}
