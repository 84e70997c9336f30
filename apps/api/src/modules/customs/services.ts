import { and, asc, desc, eq, isNull, or, sql } from 'drizzle-orm';
import { customsClearanceTable, db, type Executor, locationsTable } from '@tracklane/db';
import { NotFoundError, ReferenceViolationError } from '../../lib/errors.js';
import { withPgErrors } from '../../lib/pg-errors.js';

export type CustomsClearanceRow = typeof customsClearanceTable.$inferSelect;

export type CustomsClearanceInput = {
  portId?: string | null;
  portCode?: string;
  status: string;
  notes?: string | null;
  updatedAt?: Date;
};

export async function resolvePortId(
  exec: Executor,
  input: { portId?: string | null; portCode?: string }
): Promise<string | null> {
  if (input.portCode === undefined) return input.portId ?? null;
  const rows = await exec
    .select({ id: locationsTable.id })
    .from(locationsTable)
    .where(eq(locationsTable.unlocode, input.portCode))
    .limit(1);
  const row = rows[0];
  if (!row) throw new ReferenceViolationError('location', input.portCode);
  return row.id;
}

export async function createCustomsClearance(
  shipmentId: string,
  input: CustomsClearanceInput,
  exec: Executor = db
): Promise<CustomsClearanceRow> {
  return withPgErrors(async () => {
    const portId = await resolvePortId(exec, input);
    const rows = await exec
      .insert(customsClearanceTable)
      .values({
        shipmentId,
        portId,
        status: input.status,
        notes: input.notes ?? null,
        ...(input.updatedAt ? { updatedAt: input.updatedAt } : {}),
      })
      .returning();
    const row = rows[0];
    if (!row) throw new Error('Failed to create customs clearance');
    return row;
  });
}

export async function updateCustomsClearance(
  id: string,
  patch: { status?: string; notes?: string | null },
  exec: Executor = db
): Promise<CustomsClearanceRow> {
  const rows = await exec
    .update(customsClearanceTable)
    .set({
      ...(patch.status !== undefined ? { status: patch.status } : {}),
      ...(patch.notes !== undefined ? { notes: patch.notes } : {}),
      updatedAt: new Date(),
    })
    .where(eq(customsClearanceTable.id, id))
    .returning();
  const row = rows[0];
  if (!row) throw new NotFoundError('customs_clearance', id);
  return row;
}

export async function listCustomsClearances(
  shipmentId: string,
  exec: Executor = db
): Promise<CustomsClearanceRow[]> {
  return exec
    .select()
    .from(customsClearanceTable)
    .where(eq(customsClearanceTable.shipmentId, shipmentId))
    .orderBy(desc(customsClearanceTable.updatedAt));
}

/**
 * Marks the newest HOLD record RELEASED; creates a RELEASED record when there
 * is no hold to release. With a `portId`, holds at that port or with no port
 * recorded qualify, and a hold at the exact port wins over a portless one.
 */
export async function releaseCustomsHold(
  exec: Executor,
  shipmentId: string,
  portId: string | null,
  at: Date,
  notes?: string | null
): Promise<CustomsClearanceRow> {
  const holds = await exec
    .select()
    .from(customsClearanceTable)
    .where(
      and(
        eq(customsClearanceTable.shipmentId, shipmentId),
        eq(customsClearanceTable.status, 'HOLD'),
        ...(portId
          ? [or(eq(customsClearanceTable.portId, portId), isNull(customsClearanceTable.portId))]
          : [])
      )
    )
    .orderBy(
      ...(portId ? [asc(sql<boolean>`${customsClearanceTable.portId} IS NULL`)] : []),
      desc(customsClearanceTable.updatedAt)
    )
    .limit(1);

  const hold = holds[0];
  if (!hold) {
    return createCustomsClearance(
      shipmentId,
      { portId, status: 'RELEASED', notes: notes ?? null, updatedAt: at },
      exec
    );
  }

  const rows = await exec
    .update(customsClearanceTable)
    .set({ status: 'RELEASED', updatedAt: at, ...(notes ? { notes } : {}) })
    .where(eq(customsClearanceTable.id, hold.id))
    .returning();
  const row = rows[0];
  if (!row) throw new NotFoundError('customs_clearance', hold.id);
  return row;
}
