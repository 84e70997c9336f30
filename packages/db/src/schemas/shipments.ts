import { desc } from 'drizzle-orm';
import { index, pgTable, text, uniqueIndex, uuid } from 'drizzle-orm/pg-core';
import { shipmentStatusEnum } from '../enums.js';
import { createOptionalTimestampColumn, createTimestampColumn } from '../utils.js';
import { customersTable } from './customers.js';
import { locationsTable } from './locations.js';

export const shipmentsTable = pgTable(
  'shipments',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    customerId: uuid('customer_id')
      .notNull()
      .references(() => customersTable.id, { onDelete: 'restrict' }),
    referenceNo: text('reference_no').notNull(),
    originId: uuid('origin_id')
      .notNull()
      .references(() => locationsTable.id, { onDelete: 'restrict' }),
    destinationId: uuid('destination_id')
      .notNull()
      .references(() => locationsTable.id, { onDelete: 'restrict' }),
    incoterm: text('incoterm'),
    // Derived from tracking events only; never written by create/update.
    status: shipmentStatusEnum('status').notNull().default('CREATED'),
    createdAt: createTimestampColumn('created_at'),
    etaFinal: createOptionalTimestampColumn('eta_final'),
    // Actual departure from origin.
    etdOrigin: createOptionalTimestampColumn('etd_origin'),
    currentLocationId: uuid('current_location_id').references(() => locationsTable.id, {
      onDelete: 'set null',
    }),
  },
  (t) => [
    uniqueIndex('ux_shipments_reference_no').on(t.referenceNo),
    index('idx_shipments_customer_status').on(t.customerId, t.status),
    index('idx_shipments_customer_created').on(t.customerId, desc(t.createdAt)),
    index('idx_shipments_current_location').on(t.currentLocationId),
  ]
);
