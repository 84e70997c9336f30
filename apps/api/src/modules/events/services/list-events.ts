import { and, desc, eq, lt } from 'drizzle-orm';
import { db, trackingEventsTable } from '@tracklane/db';

export type ListEventsOptions = { limit?: number; before?: Date };

/** Event history of one shipment, newest first; `before` pages by occurred_at. */
export async function listShipmentEvents(shipmentId: string, opts: ListEventsOptions = {}) {
  return db
    .select()
    .from(trackingEventsTable)
    .where(
      and(
        eq(trackingEventsTable.shipmentId, shipmentId),
        opts.before ? lt(trackingEventsTable.occurredAt, opts.before) : undefined
      )
    )
    .orderBy(desc(trackingEventsTable.occurredAt), desc(trackingEventsTable.ingestedAt))
    .limit(opts.limit ?? 100);
}
