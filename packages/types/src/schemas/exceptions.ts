import { z } from 'zod/v4';
import { createSelectSchema } from 'drizzle-zod';
import { EXCEPTION_SEVERITIES } from '@tracklane/db/enums';
import { exceptionsTable } from '@tracklane/db/schemas';
import { DetailsSchema } from './common.js';

export const ExceptionSelectSchema = createSelectSchema(exceptionsTable, {
  details: DetailsSchema.nullable(),
});

export const ExceptionOpenSchema = z.object({
  severity: z.enum(EXCEPTION_SEVERITIES),
  category: z
    .string()
    .min(1)
    .max(32)
    .regex(/^[A-Z_]+$/),
  summary: z.string().min(1).max(500),
  openedAt: z.coerce.date().optional(),
  details: DetailsSchema.nullable().optional(),
});

export const ExceptionCloseSchema = z.object({
  closedAt: z.coerce.date().optional(),
});

export const ExceptionsListQuerySchema = z.object({
  shipmentRef: z.string().min(1).max(64).optional(),
  open: z.enum(['true', 'false']).optional(),
  limit: z.coerce.number().int().positive().max(500).optional(),
});
