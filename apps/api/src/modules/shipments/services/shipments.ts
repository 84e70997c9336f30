import { and, desc, eq } from 'drizzle-orm';
import { db, shipmentsTable } from '@tracklane/db';
import type { ShipmentCreate, ShipmentPlanUpdate, ShipmentsListQuery } from '@tracklane/types';
import { NotFoundError } from '../../../lib/errors.js';
import { withPgErrors } from '../../../lib/pg-errors.js';
import type { ShipmentRow } from './get-shipment.js';

/** New shipments always start in CREATED; only tracking events move the status. */
export async function createShipment(input: ShipmentCreate): Promise<ShipmentRow> {
  return withPgErrors(async () => {
    const rows = await db
      .insert(shipmentsTable)
      .values({
        customerId: input.customerId,
        referenceNo: input.referenceNo,
        originId: input.originId,
        destinationId: input.destinationId,
        incoterm: input.incoterm ?? null,
        etaFinal: input.etaFinal ?? null,
        etdOrigin: input.etdOrigin ?? null,
      })
      .returning();
    const row = rows[0];
    if (!row) throw new Error('Failed to create shipment');
    return row;
  });
}

/** Planning fields only: final ETA, departure time, incoterm. */
export async function updateShipmentPlan(
  shipmentId: string,
  patch: ShipmentPlanUpdate
): Promise<ShipmentRow> {
  const set = {
    ...(patch.etaFinal !== undefined ? { etaFinal: patch.etaFinal } : {}),
    ...(patch.etdOrigin !== undefined ? { etdOrigin: patch.etdOrigin } : {}),
    ...(patch.incoterm !== undefined ? { incoterm: patch.incoterm } : {}),
  };

  if (Object.keys(set).length === 0) {
    const rows = await db.select().from(shipmentsTable).where(eq(shipmentsTable.id, shipmentId));
    const row = rows[0];
    if (!row) throw new NotFoundError('shipment', shipmentId);
    return row;
  }

  const rows = await db
    .update(shipmentsTable)
    .set(set)
    .where(eq(shipmentsTable.id, shipmentId))
    .returning();
  const row = rows[0];
  if (!row) throw new NotFoundError('shipment', shipmentId);
  return row;
}

export async function listShipments(q: ShipmentsListQuery = {}): Promise<ShipmentRow[]> {
  const where = and(
    ...(q.customerId ? [eq(shipmentsTable.customerId, q.customerId)] : []),
    ...(q.status ? [eq(shipmentsTable.status, q.status)] : [])
  );

  return db
    .select()
    .from(shipmentsTable)
    .where(where)
    .orderBy(desc(shipmentsTable.createdAt))
    .limit(q.limit ?? 100);
}
