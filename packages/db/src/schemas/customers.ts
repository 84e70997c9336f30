import { pgTable, text, uniqueIndex, uuid } from 'drizzle-orm/pg-core';
import { createTimestampColumn } from '../utils.js';

export const customersTable = pgTable(
  'customers',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    name: text('name').notNull(),
    accountCode: text('account_code').notNull(),
    contactEmail: text('contact_email'),
    createdAt: createTimestampColumn('created_at'),
  },
  (t) => [uniqueIndex('ux_customers_account_code').on(t.accountCode)]
);
