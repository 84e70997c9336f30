import { desc } from 'drizzle-orm';
import { index, pgTable, text, uuid } from 'drizzle-orm/pg-core';
import { createTimestampColumn } from '../utils.js';
import { locationsTable } from './locations.js';
import { shipmentsTable } from './shipments.js';

export const customsClearanceTable = pgTable(
  'customs_clearance',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    shipmentId: uuid('shipment_id')
      .notNull()
      .references(() => shipmentsTable.id, { onDelete: 'cascade' }),
    portId: uuid('port_id').references(() => locationsTable.id, { onDelete: 'restrict' }),
    // SUBMITTED | HOLD | RELEASED (open vocabulary)
    status: text('status').notNull(),
    updatedAt: createTimestampColumn('updated_at', { onUpdate: true }),
    notes: text('notes'),
  },
  (t) => [
    index('idx_customs_status_updated').on(t.status, desc(t.updatedAt)),
    index('idx_customs_shipment').on(t.shipmentId),
  ]
);
