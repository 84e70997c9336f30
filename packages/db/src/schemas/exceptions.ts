import { desc, isNull } from 'drizzle-orm';
import { index, jsonb, pgTable, text, uuid } from 'drizzle-orm/pg-core';
import { createOptionalTimestampColumn, createTimestampColumn } from '../utils.js';
import { shipmentsTable } from './shipments.js';

export const exceptionsTable = pgTable(
  'exceptions',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    shipmentId: uuid('shipment_id')
      .notNull()
      .references(() => shipmentsTable.id, { onDelete: 'cascade' }),
    severity: text('severity').notNull(),
    category: text('category').notNull(),
    openedAt: createTimestampColumn('opened_at'),
    // null while open
    closedAt: createOptionalTimestampColumn('closed_at'),
    summary: text('summary').notNull(),
    details: jsonb('details').$type<Record<string, unknown>>(),
  },
  (t) => [
    index('idx_exceptions_shipment_opened').on(t.shipmentId, desc(t.openedAt)),
    index('idx_exceptions_open').on(t.shipmentId).where(isNull(t.closedAt)),
  ]
);
