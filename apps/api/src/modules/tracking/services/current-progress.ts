import { eq } from 'drizzle-orm';
import { db, shipmentProgressView } from '@tracklane/db';
import type { ShipmentProgress } from '@tracklane/types';
import { classifyEtaRisk } from './classify-eta-risk.js';

/**
 * The current leg is the one with the highest sequence number, even when a
 * lower leg carries newer events. Null for a shipment without legs.
 */
export async function getCurrentProgress(shipmentId: string): Promise<ShipmentProgress | null> {
  const rows = await db
    .select()
    .from(shipmentProgressView)
    .where(eq(shipmentProgressView.shipmentId, shipmentId))
    .limit(1);

  const row = rows[0];
  if (!row) return null;

  return {
    shipmentId: row.shipmentId,
    referenceNo: row.referenceNo,
    status: row.status,
    etaFinal: row.etaFinal,
    currentLocationId: row.currentLocationId,
    leg: {
      id: row.legId,
      sequenceNo: row.sequenceNo,
      mode: row.mode,
      originUnlocode: row.originUnlocode,
      destUnlocode: row.destUnlocode,
      etd: row.etd,
      eta: row.eta,
      ata: row.ata,
      status: row.legStatus,
    },
    etaRisk: classifyEtaRisk(row.eta, row.etaFinal),
  };
}
