import { asc, eq } from 'drizzle-orm';
import { carriersTable, db } from '@tracklane/db';
import type { CarrierInsert } from '@tracklane/types';
import { withPgErrors } from '../../../lib/pg-errors.js';

export type CarrierRow = typeof carriersTable.$inferSelect;

export async function createCarrier(input: CarrierInsert): Promise<CarrierRow> {
  return withPgErrors(async () => {
    const rows = await db.insert(carriersTable).values(input).returning();
    const row = rows[0];
    if (!row) throw new Error('Failed to create carrier');
    return row;
  });
}

export async function getCarrierByScac(scac: string): Promise<CarrierRow | null> {
  const rows = await db.select().from(carriersTable).where(eq(carriersTable.scac, scac)).limit(1);
  return rows[0] ?? null;
}

export async function listCarriers(limit = 100) {
  return db.select().from(carriersTable).orderBy(asc(carriersTable.scac)).limit(limit);
}
