import { z } from 'zod/v4';
import { createSelectSchema } from 'drizzle-zod';
import { customsClearanceTable } from '@tracklane/db/schemas';
import { UNLOCODE_RE } from './patterns.js';

export const CustomsClearanceSelectSchema = createSelectSchema(customsClearanceTable);

/** Customs status is an open vocabulary; SUBMITTED, HOLD and RELEASED are the usual values. */
const CustomsStatusInput = z
  .string()
  .min(1)
  .max(32)
  .regex(/^[A-Z_]+$/, 'expected an upper-case status such as HOLD');

export const CustomsCreateSchema = z
  .object({
    portId: z.string().uuid().nullable().optional(),
    portCode: z.string().regex(UNLOCODE_RE).optional(),
    status: CustomsStatusInput,
    notes: z.string().max(2000).nullable().optional(),
  })
  .refine((v) => !(v.portId && v.portCode), {
    message: 'portId and portCode are mutually exclusive',
    path: ['portCode'],
  });

export const CustomsUpdateSchema = z
  .object({
    status: CustomsStatusInput.optional(),
    notes: z.string().max(2000).nullable().optional(),
  })
  .refine((v) => v.status !== undefined || v.notes !== undefined, {
    message: 'nothing to update',
  });
