import { asc, eq } from 'drizzle-orm';
import { containersTable, db } from '@tracklane/db';
import type { ContainerInsert } from '@tracklane/types';
import { withPgErrors } from '../../../lib/pg-errors.js';

export type ContainerRow = typeof containersTable.$inferSelect;

export async function createContainer(input: ContainerInsert): Promise<ContainerRow> {
  return withPgErrors(async () => {
    const rows = await db.insert(containersTable).values(input).returning();
    const row = rows[0];
    if (!row) throw new Error('Failed to create container');
    return row;
  });
}

export async function getContainerByNumber(containerNo: string): Promise<ContainerRow | null> {
  const rows = await db
    .select()
    .from(containersTable)
    .where(eq(containersTable.containerNo, containerNo))
    .limit(1);
  return rows[0] ?? null;
}

export async function listContainers(limit = 100) {
  return db.select().from(containersTable).orderBy(asc(containersTable.containerNo)).limit(limit);
}
