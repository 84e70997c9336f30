import { z } from 'zod/v4';
import { createSelectSchema } from 'drizzle-zod';
import { EVENT_KIND_VALUES, SHIPMENT_STATUS_VALUES } from '@tracklane/db/enums';
import { trackingEventsTable } from '@tracklane/db/schemas';
import { DetailsSchema, TimestampInput } from './common.js';
import { UNLOCODE_RE } from './patterns.js';

export const TrackingEventSelectSchema = createSelectSchema(trackingEventsTable, {
  details: DetailsSchema.nullable(),
});

/**
 * One observation from a carrier/terminal feed. The shipment is addressed by
 * id or by reference number, the location by id or by UN/LOCODE.
 */
export const TrackingEventInputSchema = z
  .object({
    shipmentId: z.string().uuid().optional(),
    shipmentRef: z.string().min(1).max(64).optional(),
    occurredAt: TimestampInput,
    event: z.enum(EVENT_KIND_VALUES),
    legId: z.string().uuid().nullable().optional(),
    containerId: z.string().uuid().nullable().optional(),
    vesselId: z.string().uuid().nullable().optional(),
    locationId: z.string().uuid().nullable().optional(),
    locationCode: z.string().regex(UNLOCODE_RE).optional(),
    statusHint: z.enum(SHIPMENT_STATUS_VALUES).nullable().optional(),
    details: DetailsSchema.nullable().optional(),
  })
  .refine((v) => (v.shipmentId === undefined) !== (v.shipmentRef === undefined), {
    message: 'exactly one of shipmentId or shipmentRef is required',
    path: ['shipmentId'],
  })
  .refine((v) => !(v.locationId && v.locationCode), {
    message: 'locationId and locationCode are mutually exclusive',
    path: ['locationCode'],
  });

export const DUPLICATE_POLICIES = ['ignore', 'error'] as const;

export const IngestQuerySchema = z.object({
  onDuplicate: z.enum(DUPLICATE_POLICIES).optional(),
});

export const StatusDecisionSchema = z.object({
  kind: z.enum(['applied', 'ignored']),
  reason: z.string(),
  from: z.enum(SHIPMENT_STATUS_VALUES),
  to: z.enum(SHIPMENT_STATUS_VALUES),
});

export const IngestResultSchema = z.object({
  duplicate: z.boolean(),
  event: TrackingEventSelectSchema,
  shipment: z.object({
    id: z.string().uuid(),
    referenceNo: z.string(),
    status: z.enum(SHIPMENT_STATUS_VALUES),
    currentLocationId: z.string().uuid().nullable(),
  }),
  decision: StatusDecisionSchema.nullable(),
});

export const BulkIngestBodySchema = z.object({
  events: z.array(TrackingEventInputSchema).min(1).max(1000),
  refreshRisk: z.boolean().optional(),
});

export const BulkIngestItemSchema = z.union([
  z.object({
    ok: z.literal(true),
    index: z.number().int(),
    duplicate: z.boolean(),
    eventId: z.string().uuid(),
  }),
  z.object({
    ok: z.literal(false),
    index: z.number().int(),
    error: z.object({ code: z.string(), message: z.string() }),
  }),
]);

export const BulkIngestResultSchema = z.object({
  recorded: z.number().int(),
  duplicates: z.number().int(),
  failed: z.number().int(),
  items: z.array(BulkIngestItemSchema),
  riskRefreshedAt: z.date().nullable(),
});

export const EventsListQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(500).optional(),
  before: z.coerce.date().optional(),
});
