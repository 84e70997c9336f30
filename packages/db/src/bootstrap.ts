import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { type SQL, sql } from 'drizzle-orm';

const STATEMENT_BREAKPOINT = '--> statement-breakpoint';

export const SCHEMA_SQL_PATH = fileURLToPath(new URL('../sql/schema.sql', import.meta.url));

type SqlRunner = { execute: (query: SQL) => PromiseLike<unknown> };

export function splitStatements(source: string): string[] {
  return source
    .split(STATEMENT_BREAKPOINT)
    .map((chunk) => chunk.trim())
    .filter((chunk) => chunk.replace(/^--.*$/gm, '').trim().length > 0);
}

/**
 * Applies sql/schema.sql one statement at a time. Every statement is guarded
 * (IF NOT EXISTS / OR REPLACE), so running it against an existing database
 * is a no-op apart from redefining views and the append-only trigger.
 */
export async function applySchema(runner: SqlRunner, path = SCHEMA_SQL_PATH): Promise<number> {
  const source = await readFile(path, 'utf8');
  const statements = splitStatements(source);
  for (const statement of statements) {
    await runner.execute(sql.raw(statement));
  }
  return statements.length;
}
