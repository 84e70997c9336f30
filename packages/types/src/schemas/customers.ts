import { z } from 'zod/v4';
import { createInsertSchema, createSelectSchema } from 'drizzle-zod';
import { customersTable } from '@tracklane/db/schemas';

export const CustomerSelectSchema = createSelectSchema(customersTable);

export const CustomerInsertSchema = createInsertSchema(customersTable, {
  name: (s) => s.min(1),
  accountCode: (s) => s.min(1).max(32),
  contactEmail: z.string().email().nullable().optional(),
}).omit({ id: true, createdAt: true });

export const CustomerByCodeSchema = z.object({ accountCode: z.string().min(1).max(32) });
