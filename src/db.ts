import { Pool, QueryResult, QueryResultRow } from 'pg';

let pool: Pool | null = null;

export function isDatabaseConfigured(env: NodeJS.ProcessEnv = process.env): boolean {
  return Boolean(env.DATABASE_URL);
}

// Created on first use so the core and its tests load without a database.
export function getPool(): Pool {
  if (pool) return pool;
  if (!process.env.DATABASE_URL) {
    throw new Error('DATABASE_URL must be set before using the database');
  }
  pool = new Pool({ connectionString: process.env.DATABASE_URL });
  return pool;
}

export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  return getPool().query<T>(text, params);
}

/** The slice of `query` that repositories depend on; tests pass an in-process fake. */
export type RowQuery = (
  text: string,
  params?: unknown[]
) => Promise<{ rows: QueryResultRow[]; rowCount?: number | null }>;

export async function closePool(): Promise<void> {
  if (!pool) return;
  const current = pool;
  pool = null;
  await current.end();
}
