import { z } from 'zod/v4';
import { createInsertSchema, createSelectSchema } from 'drizzle-zod';
import { containersTable } from '@tracklane/db/schemas';
import { CONTAINER_NO_RE } from './patterns.js';

export const ContainerSelectSchema = createSelectSchema(containersTable);

export const ContainerInsertSchema = createInsertSchema(containersTable, {
  containerNo: (s) => s.regex(CONTAINER_NO_RE, 'expected an ISO 6346 container number'),
  reeferSetpointC: z.number().min(-999.99).max(999.99).nullable().optional(),
}).omit({ id: true });

export const ContainerByNumberSchema = z.object({ containerNo: z.string().regex(CONTAINER_NO_RE) });
