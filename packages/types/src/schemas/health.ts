import { z } from 'zod/v4';

export const HealthSchema = z.object({
  ok: z.boolean(),
  service: z.string().default('tracklane-api'),
  time: z.object({
    server: z.string(),
    uptimeSec: z.number(),
    tz: z.string(),
  }),
  db: z.object({
    ok: z.boolean(),
    latencyMs: z.number().nullable(),
  }),
  etaRiskCache: z.object({
    ok: z.boolean().nullable(),
    refreshedAt: z.string().nullable(),
    ageMinutes: z.number().nullable(),
    maxAgeMinutes: z.number(),
  }),
  version: z.object({
    commit: z.string().nullable(),
    env: z.string(),
  }),
  durationMs: z.number(),
});
