import { asc, eq } from 'drizzle-orm';
import { db, locationsTable } from '@tracklane/db';
import type { LocationInsert } from '@tracklane/types';
import { withPgErrors } from '../../../lib/pg-errors.js';

export type LocationRow = typeof locationsTable.$inferSelect;

export async function createLocation(input: LocationInsert): Promise<LocationRow> {
  return withPgErrors(async () => {
    const rows = await db.insert(locationsTable).values(input).returning();
    const row = rows[0];
    if (!row) throw new Error('Failed to create location');
    return row;
  });
}

export async function getLocationByCode(unlocode: string): Promise<LocationRow | null> {
  const rows = await db
    .select()
    .from(locationsTable)
    .where(eq(locationsTable.unlocode, unlocode))
    .limit(1);
  return rows[0] ?? null;
}

export async function listLocations(q: { country?: string; limit?: number } = {}) {
  return db
    .select()
    .from(locationsTable)
    .where(q.country ? eq(locationsTable.countryCode, q.country) : undefined)
    .orderBy(asc(locationsTable.unlocode))
    .limit(q.limit ?? 100);
}
