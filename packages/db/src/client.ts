import type { ExtractTablesWithRelations } from 'drizzle-orm';
import { drizzle, type NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import { Pool } from 'pg';
import { type Schema, schema } from './schemas/index.js';

function intFromEnv(name: string, fallback: number): number {
  const raw = (process.env[name] ?? '').trim();
  const n = raw ? Number(raw) : NaN;
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

export const pool = new Pool({
  connectionString: process.env.DATABASE_URL,
  max: intFromEnv('DB_POOL_MAX', 10),
  statement_timeout: intFromEnv('DB_STATEMENT_TIMEOUT_MS', 30_000),
});

export const db = drizzle(pool, { schema });

export type Database = typeof db;
/** Transaction handle passed to `db.transaction` callbacks. */
export type Tx = Parameters<Parameters<Database['transaction']>[0]>[0];
/** Anything that can run queries: the pool-backed db or an open transaction. */
export type Executor = PgDatabase<NodePgQueryResultHKT, Schema, ExtractTablesWithRelations<Schema>>;

export async function closeDatabase(): Promise<void> {
  await pool.end();
}
