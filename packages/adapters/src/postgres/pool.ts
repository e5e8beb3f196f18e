import pg from 'pg';

const { Pool } = pg;

/** Minimal query surface shared by pools, pool clients and test doubles. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount?: number | null }>;
}

export interface TransactionalPool extends Queryable {
  connect(): Promise<Queryable & { release(): void }>;
  end(): Promise<void>;
}

export function createPool(connectionString: string): pg.Pool {
  const pool = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
    application_name: 'scenario-runner',
  });
  pool.on('error', (err) => {
    console.error('[pg-pool] unexpected error on idle client', err);
  });
  return pool;
}

/** Run a callback inside a transaction; rolls back on error. */
export async function withTransaction<T>(
  pool: TransactionalPool,
  fn: (client: Queryable) => Promise<T>,
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

export function isUniqueViolation(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === '23505';
}
