import { z } from 'zod/v4';
import { createInsertSchema, createSelectSchema } from 'drizzle-zod';
import { vesselsTable } from '@tracklane/db/schemas';
import { IMO_RE, MMSI_RE } from './patterns.js';

export const VesselSelectSchema = createSelectSchema(vesselsTable);

export const VesselInsertSchema = createInsertSchema(vesselsTable, {
  name: (s) => s.min(1),
  imoNumber: (s) => s.regex(IMO_RE, 'expected a 7-digit IMO number'),
  mmsi: z.string().regex(MMSI_RE, 'expected a 9-digit MMSI').nullable().optional(),
}).omit({ id: true });

export const VesselByImoSchema = z.object({ imoNumber: z.string().regex(IMO_RE) });
