import { boolean, check, index, pgTable, text, uniqueIndex, uuid } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { carriersTable } from './carriers.js';

export const vesselsTable = pgTable(
  'vessels',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    name: text('name').notNull(),
    imoNumber: text('imo_number').notNull(),
    mmsi: text('mmsi'),
    carrierId: uuid('carrier_id').references(() => carriersTable.id, { onDelete: 'set null' }),
    active: boolean('active').notNull().default(true),
  },
  (t) => [
    uniqueIndex('ux_vessels_imo').on(t.imoNumber),
    uniqueIndex('ux_vessels_mmsi').on(t.mmsi),
    index('idx_vessels_carrier').on(t.carrierId),
    check('ck_vessels_imo', sql`${t.imoNumber} ~ '^[0-9]{7}$'`),
    check('ck_vessels_mmsi', sql`${t.mmsi} IS NULL OR ${t.mmsi} ~ '^[0-9]{9}$'`),
  ]
);
