import {
  boolean,
  check,
  numeric,
  pgTable,
  text,
  uniqueIndex,
  uuid,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { containerTypeEnum } from '../enums.js';
import { carriersTable } from './carriers.js';

export const containersTable = pgTable(
  'containers',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    // ISO 6346: owner code (3) + category (U/J/Z) + serial (6) + check digit
    containerNo: text('container_no').notNull(),
    type: containerTypeEnum('type').notNull(),
    ownerCarrierId: uuid('owner_carrier_id').references(() => carriersTable.id, {
      onDelete: 'set null',
    }),
    reeferSetpointC: numeric('reefer_setpoint_c', { precision: 5, scale: 2, mode: 'number' }),
    active: boolean('active').notNull().default(true),
  },
  (t) => [
    uniqueIndex('ux_containers_no').on(t.containerNo),
    check('ck_containers_no', sql`${t.containerNo} ~ '^[A-Z]{3}[UJZ][0-9]{7}$'`),
  ]
);
