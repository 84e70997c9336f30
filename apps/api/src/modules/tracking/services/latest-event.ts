import { desc, eq } from 'drizzle-orm';
import { db, locationsTable, trackingEventsTable } from '@tracklane/db';

/**
 * Newest event of one shipment by occurred_at: one index-ordered probe of
 * idx_tracking_events_shipment_time. Ties on occurred_at resolve arbitrarily.
 */
export async function getLatestEvent(shipmentId: string) {
  const rows = await db
    .select({
      event: trackingEventsTable,
      location: {
        id: locationsTable.id,
        name: locationsTable.name,
        unlocode: locationsTable.unlocode,
      },
    })
    .from(trackingEventsTable)
    .leftJoin(locationsTable, eq(locationsTable.id, trackingEventsTable.locationId))
    .where(eq(trackingEventsTable.shipmentId, shipmentId))
    .orderBy(desc(trackingEventsTable.occurredAt))
    .limit(1);

  const row = rows[0];
  if (!row) return null;
  return { ...row.event, location: row.location };
}
