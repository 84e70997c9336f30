import { PGlite } from '@electric-sql/pglite';
import { type SQL, sql } from 'drizzle-orm';
import { drizzle } from 'drizzle-orm/pglite';
import { applySchema } from '@tracklane/db/bootstrap';
import { schema } from '@tracklane/db/schemas';

const TABLES = [
  'tracking_events',
  'customs_clearance',
  'exceptions',
  'shipment_containers',
  'shipment_legs',
  'shipments',
  'containers',
  'vessels',
  'carriers',
  'locations',
  'customers',
  'api_keys',
  'derived_refreshes',
];

/**
 * In-process Postgres with the full schema applied. Test files swap it in for
 * the pool-backed client:
 *
 *   vi.mock('@tracklane/db', async (importOriginal) => ({
 *     ...(await importOriginal<typeof import('@tracklane/db')>()),
 *     db: await createTestDb(),
 *   }));
 */
export async function createTestDb() {
  const client = new PGlite();
  const testDb = drizzle(client, { schema });
  await applySchema(testDb);
  return testDb;
}

type SqlRunner = { execute: (query: SQL) => PromiseLike<unknown> };

/** TRUNCATE bypasses the row-level append-only trigger on tracking_events. */
export async function resetDatabase(runner: SqlRunner): Promise<void> {
  await runner.execute(sql.raw(`TRUNCATE ${TABLES.join(', ')} CASCADE`));
  await runner.execute(sql.raw('REFRESH MATERIALIZED VIEW mv_eta_risk'));
}
