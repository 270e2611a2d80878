import pg from 'pg';

const { Pool } = pg;

export type DbPool = pg.Pool;

let _pool: pg.Pool | null = null;

export function getPool(connectionString = process.env['DATABASE_URL']): pg.Pool {
  if (!_pool) {
    _pool = new Pool({
      connectionString,
      max: 10,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 5_000,
      application_name: 'pothole-radar-api',
    });
    _pool.on('error', (err) => {
      console.error('[pg-pool] unexpected error on idle client', err);
    });
  }
  return _pool;
}

export async function closePool(): Promise<void> {
  if (_pool) {
    await _pool.end();
    _pool = null;
  }
}
