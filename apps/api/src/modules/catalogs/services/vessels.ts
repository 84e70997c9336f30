import { asc, eq } from 'drizzle-orm';
import { db, vesselsTable } from '@tracklane/db';
import type { VesselInsert } from '@tracklane/types';
import { withPgErrors } from '../../../lib/pg-errors.js';

export type VesselRow = typeof vesselsTable.$inferSelect;

export async function createVessel(input: VesselInsert): Promise<VesselRow> {
  return withPgErrors(async () => {
    const rows = await db.insert(vesselsTable).values(input).returning();
    const row = rows[0];
    if (!row) throw new Error('Failed to create vessel');
    return row;
  });
}

export async function getVesselByImo(imoNumber: string): Promise<VesselRow | null> {
  const rows = await db
    .select()
    .from(vesselsTable)
    .where(eq(vesselsTable.imoNumber, imoNumber))
    .limit(1);
  return rows[0] ?? null;
}

export async function listVessels(q: { carrierId?: string; limit?: number } = {}) {
  return db
    .select()
    .from(vesselsTable)
    .where(q.carrierId ? eq(vesselsTable.carrierId, q.carrierId) : undefined)
    .orderBy(asc(vesselsTable.name))
    .limit(q.limit ?? 100);
}
