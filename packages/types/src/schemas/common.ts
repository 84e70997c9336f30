import { z } from 'zod/v4';

export const IdParamSchema = z.object({ id: z.string().uuid() });

export const LimitQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(500).optional(),
});

export const DetailsSchema = z.record(z.string(), z.unknown());

/** Required business timestamp: ISO-8601 with offset, or a Date. No null, boolean or epoch number. */
export const TimestampInput = z
  .union([z.iso.datetime({ offset: true }), z.date()])
  .pipe(z.coerce.date());

/** Optional timestamp accepted from JSON (ISO-8601 string) and returned as a Date. */
export const OptionalDateInput = z.coerce.date().nullable().optional();
