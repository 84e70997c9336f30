import { asc, eq } from 'drizzle-orm';
import { customersTable, db } from '@tracklane/db';
import type { CustomerInsert } from '@tracklane/types';
import { withPgErrors } from '../../../lib/pg-errors.js';

export type CustomerRow = typeof customersTable.$inferSelect;

export async function createCustomer(input: CustomerInsert): Promise<CustomerRow> {
  return withPgErrors(async () => {
    const rows = await db.insert(customersTable).values(input).returning();
    const row = rows[0];
    if (!row) throw new Error('Failed to create customer');
    return row;
  });
}

export async function getCustomerByCode(accountCode: string): Promise<CustomerRow | null> {
  const rows = await db
    .select()
    .from(customersTable)
    .where(eq(customersTable.accountCode, accountCode))
    .limit(1);
  return rows[0] ?? null;
}

export async function listCustomers(limit = 100) {
  return db.select().from(customersTable).orderBy(asc(customersTable.accountCode)).limit(limit);
}
