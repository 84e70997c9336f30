import { pgTable, text, uniqueIndex, uuid } from 'drizzle-orm/pg-core';
import { createTimestampColumn } from '../utils.js';

export const carriersTable = pgTable(
  'carriers',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    name: text('name').notNull(),
    scac: text('scac').notNull(),
    createdAt: createTimestampColumn('created_at'),
  },
  (t) => [uniqueIndex('ux_carriers_scac').on(t.scac)]
);
