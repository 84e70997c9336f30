import { and, desc, eq, isNotNull, isNull } from 'drizzle-orm';
import { db, type ExceptionSeverity, exceptionsTable, type Executor } from '@tracklane/db';
import { ConflictError, NotFoundError } from '../../lib/errors.js';
import { withPgErrors } from '../../lib/pg-errors.js';

export type ExceptionRow = typeof exceptionsTable.$inferSelect;

export type OpenExceptionInput = {
  severity: ExceptionSeverity;
  category: string;
  summary: string;
  openedAt?: Date;
  details?: Record<string, unknown> | null;
};

export async function openException(
  shipmentId: string,
  input: OpenExceptionInput,
  exec: Executor = db
): Promise<ExceptionRow> {
  return withPgErrors(async () => {
    const rows = await exec
      .insert(exceptionsTable)
      .values({
        shipmentId,
        severity: input.severity,
        category: input.category,
        summary: input.summary,
        details: input.details ?? null,
        ...(input.openedAt ? { openedAt: input.openedAt } : {}),
      })
      .returning();
    const row = rows[0];
    if (!row) throw new Error('Failed to open exception');
    return row;
  });
}

/** closed_at is written once; closing an already closed exception is a conflict. */
export async function closeException(
  id: string,
  closedAt: Date = new Date(),
  exec: Executor = db
): Promise<ExceptionRow> {
  const rows = await exec
    .update(exceptionsTable)
    .set({ closedAt })
    .where(and(eq(exceptionsTable.id, id), isNull(exceptionsTable.closedAt)))
    .returning();
  const row = rows[0];
  if (row) return row;

  const existing = await exec
    .select({ id: exceptionsTable.id })
    .from(exceptionsTable)
    .where(eq(exceptionsTable.id, id))
    .limit(1);
  if (!existing[0]) throw new NotFoundError('exception', id);
  throw new ConflictError(`Exception ${id} is already closed`);
}

export async function closeOpenExceptions(
  exec: Executor,
  shipmentId: string,
  category: string,
  closedAt: Date
): Promise<number> {
  const rows = await exec
    .update(exceptionsTable)
    .set({ closedAt })
    .where(
      and(
        eq(exceptionsTable.shipmentId, shipmentId),
        eq(exceptionsTable.category, category),
        isNull(exceptionsTable.closedAt)
      )
    )
    .returning({ id: exceptionsTable.id });
  return rows.length;
}

export async function listExceptions(
  q: { shipmentId?: string; open?: boolean; limit?: number },
  exec: Executor = db
): Promise<ExceptionRow[]> {
  const where = and(
    ...(q.shipmentId ? [eq(exceptionsTable.shipmentId, q.shipmentId)] : []),
    ...(q.open === true ? [isNull(exceptionsTable.closedAt)] : []),
    ...(q.open === false ? [isNotNull(exceptionsTable.closedAt)] : [])
  );

  return exec
    .select()
    .from(exceptionsTable)
    .where(where)
    .orderBy(desc(exceptionsTable.openedAt))
    .limit(q.limit ?? 100);
}

export function listOpenExceptions(shipmentId?: string, exec: Executor = db) {
  return listExceptions({ shipmentId, open: true }, exec);
}
