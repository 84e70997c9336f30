import { asc, and, eq } from 'drizzle-orm';
import { db, shipmentLegsTable } from '@tracklane/db';
import type { ShipmentLegCreate, ShipmentLegUpdate } from '@tracklane/types';
import { ConflictError, NotFoundError } from '../../../lib/errors.js';
import { withPgErrors } from '../../../lib/pg-errors.js';

export type ShipmentLegRow = typeof shipmentLegsTable.$inferSelect;

export async function addLeg(shipmentId: string, input: ShipmentLegCreate): Promise<ShipmentLegRow> {
  try {
    return await withPgErrors(async () => {
      const rows = await db
        .insert(shipmentLegsTable)
        .values({
          shipmentId,
          sequenceNo: input.sequenceNo,
          mode: input.mode,
          carrierId: input.carrierId ?? null,
          vesselId: input.vesselId ?? null,
          originId: input.originId,
          destinationId: input.destinationId,
          etd: input.etd ?? null,
          eta: input.eta ?? null,
          ata: input.ata ?? null,
          ...(input.status ? { status: input.status } : {}),
        })
        .returning();
      const row = rows[0];
      if (!row) throw new Error('Failed to create shipment leg');
      return row;
    });
  } catch (err) {
    if (err instanceof ConflictError) {
      throw new ConflictError(`Leg ${input.sequenceNo} already exists for this shipment`, err.details, err);
    }
    throw err;
  }
}

export async function updateLeg(
  shipmentId: string,
  sequenceNo: number,
  patch: ShipmentLegUpdate
): Promise<ShipmentLegRow> {
  return withPgErrors(async () => {
    const rows = await db
      .update(shipmentLegsTable)
      .set({
        ...(patch.mode !== undefined ? { mode: patch.mode } : {}),
        ...(patch.carrierId !== undefined ? { carrierId: patch.carrierId } : {}),
        ...(patch.vesselId !== undefined ? { vesselId: patch.vesselId } : {}),
        ...(patch.etd !== undefined ? { etd: patch.etd } : {}),
        ...(patch.eta !== undefined ? { eta: patch.eta } : {}),
        ...(patch.ata !== undefined ? { ata: patch.ata } : {}),
        ...(patch.status !== undefined ? { status: patch.status } : {}),
      })
      .where(
        and(eq(shipmentLegsTable.shipmentId, shipmentId), eq(shipmentLegsTable.sequenceNo, sequenceNo))
      )
      .returning();
    const row = rows[0];
    if (!row) throw new NotFoundError('leg', `${shipmentId}#${sequenceNo}`);
    return row;
  });
}

export async function listLegs(shipmentId: string): Promise<ShipmentLegRow[]> {
  return db
    .select()
    .from(shipmentLegsTable)
    .where(eq(shipmentLegsTable.shipmentId, shipmentId))
    .orderBy(asc(shipmentLegsTable.sequenceNo));
}
