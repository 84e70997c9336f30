import { asc, eq } from 'drizzle-orm';
import { db, type Executor, shipmentLegsTable, shipmentsTable } from '@tracklane/db';
import { NotFoundError } from '../../../lib/errors.js';
import { listShipmentContainers } from './containers.js';

export type ShipmentRow = typeof shipmentsTable.$inferSelect;

export async function findShipmentByRef(
  referenceNo: string,
  exec: Executor = db
): Promise<ShipmentRow | null> {
  const rows = await exec
    .select()
    .from(shipmentsTable)
    .where(eq(shipmentsTable.referenceNo, referenceNo))
    .limit(1);
  return rows[0] ?? null;
}

export async function requireShipmentByRef(referenceNo: string, exec: Executor = db) {
  const row = await findShipmentByRef(referenceNo, exec);
  if (!row) throw new NotFoundError('shipment', referenceNo);
  return row;
}

/** Shipment with its legs (by sequence) and linked containers. */
export async function getShipmentDetail(referenceNo: string) {
  const shipment = await findShipmentByRef(referenceNo);
  if (!shipment) return null;

  const [legs, containers] = await Promise.all([
    db
      .select()
      .from(shipmentLegsTable)
      .where(eq(shipmentLegsTable.shipmentId, shipment.id))
      .orderBy(asc(shipmentLegsTable.sequenceNo)),
    listShipmentContainers(shipment.id),
  ]);

  return { ...shipment, legs, containers };
}
