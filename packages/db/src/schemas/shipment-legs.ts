import { check, index, integer, pgTable, text, uniqueIndex, uuid } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { legStatusEnum } from '../enums.js';
import { createOptionalTimestampColumn } from '../utils.js';
import { carriersTable } from './carriers.js';
import { locationsTable } from './locations.js';
import { shipmentsTable } from './shipments.js';
import { vesselsTable } from './vessels.js';

export const shipmentLegsTable = pgTable(
  'shipment_legs',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    shipmentId: uuid('shipment_id')
      .notNull()
      .references(() => shipmentsTable.id, { onDelete: 'cascade' }),
    sequenceNo: integer('sequence_no').notNull(),
    mode: text('mode').notNull(),
    carrierId: uuid('carrier_id').references(() => carriersTable.id, { onDelete: 'set null' }),
    vesselId: uuid('vessel_id').references(() => vesselsTable.id, { onDelete: 'set null' }),
    originId: uuid('origin_id')
      .notNull()
      .references(() => locationsTable.id, { onDelete: 'restrict' }),
    destinationId: uuid('destination_id')
      .notNull()
      .references(() => locationsTable.id, { onDelete: 'restrict' }),
    etd: createOptionalTimestampColumn('etd'),
    eta: createOptionalTimestampColumn('eta'),
    ata: createOptionalTimestampColumn('ata'),
    status: legStatusEnum('status').notNull().default('PENDING'),
  },
  (t) => [
    uniqueIndex('ux_shipment_legs_sequence').on(t.shipmentId, t.sequenceNo),
    index('idx_shipment_legs_dest_eta').on(t.destinationId, t.eta),
    index('idx_shipment_legs_vessel_etd').on(t.vesselId, t.etd),
    check('ck_shipment_legs_sequence', sql`${t.sequenceNo} >= 1`),
  ]
);
