import { z } from 'zod/v4';
import { createInsertSchema, createSelectSchema } from 'drizzle-zod';
import { carriersTable } from '@tracklane/db/schemas';
import { SCAC_RE } from './patterns.js';

export const CarrierSelectSchema = createSelectSchema(carriersTable);

export const CarrierInsertSchema = createInsertSchema(carriersTable, {
  name: (s) => s.min(1),
  scac: (s) => s.regex(SCAC_RE, 'expected a 2-4 letter SCAC'),
}).omit({ id: true, createdAt: true });

export const CarrierByCodeSchema = z.object({ scac: z.string().regex(SCAC_RE) });
