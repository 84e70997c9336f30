import { desc } from 'drizzle-orm';
import { index, jsonb, pgTable, uniqueIndex, uuid } from 'drizzle-orm/pg-core';
import { eventKindEnum, shipmentStatusEnum } from '../enums.js';
import { createTimestampColumn } from '../utils.js';
import { containersTable } from './containers.js';
import { locationsTable } from './locations.js';
import { shipmentLegsTable } from './shipment-legs.js';
import { shipmentsTable } from './shipments.js';
import { vesselsTable } from './vessels.js';

/**
 * Append-only. A row trigger (see sql/schema.sql) rejects UPDATE and DELETE,
 * so the deduplication key (shipment_id, occurred_at, event) always points at
 * the first write.
 */
export const trackingEventsTable = pgTable(
  'tracking_events',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    occurredAt: createTimestampColumn('occurred_at', { defaultNow: false }),
    ingestedAt: createTimestampColumn('ingested_at'),
    shipmentId: uuid('shipment_id')
      .notNull()
      .references(() => shipmentsTable.id, { onDelete: 'restrict' }),
    legId: uuid('leg_id').references(() => shipmentLegsTable.id, { onDelete: 'restrict' }),
    containerId: uuid('container_id').references(() => containersTable.id, {
      onDelete: 'restrict',
    }),
    vesselId: uuid('vessel_id').references(() => vesselsTable.id, { onDelete: 'restrict' }),
    locationId: uuid('location_id').references(() => locationsTable.id, { onDelete: 'restrict' }),
    event: eventKindEnum('event').notNull(),
    statusHint: shipmentStatusEnum('status_hint'),
    details: jsonb('details').$type<Record<string, unknown>>(),
  },
  (t) => [
    uniqueIndex('ux_tracking_events_dedupe').on(t.shipmentId, t.occurredAt, t.event),
    index('idx_tracking_events_shipment_time').on(t.shipmentId, desc(t.occurredAt)),
    index('idx_tracking_events_container_time').on(t.containerId, desc(t.occurredAt)),
    index('idx_tracking_events_vessel_time').on(t.vesselId, desc(t.occurredAt)),
    index('idx_tracking_events_details').using('gin', t.details),
  ]
);
