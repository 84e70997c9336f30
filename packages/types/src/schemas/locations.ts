import { z } from 'zod/v4';
import { createInsertSchema, createSelectSchema } from 'drizzle-zod';
import { locationsTable } from '@tracklane/db/schemas';
import { COUNTRY_CODE_RE, UNLOCODE_RE } from './patterns.js';

export const LocationSelectSchema = createSelectSchema(locationsTable);

export const LocationInsertSchema = createInsertSchema(locationsTable, {
  name: (s) => s.min(1),
  unlocode: (s) => s.regex(UNLOCODE_RE, 'expected a UN/LOCODE such as NLRTM'),
  countryCode: (s) => s.regex(COUNTRY_CODE_RE, 'expected an ISO 3166 alpha-2 code'),
  tz: (s) => s.min(1),
}).omit({ id: true });

export const LocationByCodeSchema = z.object({
  unlocode: z.string().regex(UNLOCODE_RE),
});

export const LocationsListQuerySchema = z.object({
  country: z.string().regex(COUNTRY_CODE_RE).optional(),
  limit: z.coerce.number().int().positive().max(500).optional(),
});
