import { z } from 'zod/v4';
import { ETA_RISK_VALUES, LEG_STATUS_VALUES, SHIPMENT_STATUS_VALUES } from '@tracklane/db/enums';
import { TrackingEventSelectSchema } from './tracking-events.js';

export const LatestEventSchema = TrackingEventSelectSchema.extend({
  location: z
    .object({
      id: z.string().uuid(),
      name: z.string(),
      unlocode: z.string(),
    })
    .nullable(),
});

export const ShipmentProgressSchema = z.object({
  shipmentId: z.string().uuid(),
  referenceNo: z.string(),
  status: z.enum(SHIPMENT_STATUS_VALUES),
  etaFinal: z.date().nullable(),
  currentLocationId: z.string().uuid().nullable(),
  leg: z.object({
    id: z.string().uuid(),
    sequenceNo: z.number().int(),
    mode: z.string(),
    originUnlocode: z.string(),
    destUnlocode: z.string(),
    etd: z.date().nullable(),
    eta: z.date().nullable(),
    ata: z.date().nullable(),
    status: z.enum(LEG_STATUS_VALUES),
  }),
  etaRisk: z.enum(ETA_RISK_VALUES),
});

export const EtaRiskRowSchema = z.object({
  shipmentId: z.string().uuid(),
  referenceNo: z.string(),
  customerId: z.string().uuid(),
  destinationId: z.string().uuid(),
  legId: z.string().uuid().nullable(),
  eta: z.date().nullable(),
  etaFinal: z.date().nullable(),
  etaStatus: z.enum(ETA_RISK_VALUES),
});

export const EtaRiskListQuerySchema = z.object({
  status: z.enum(ETA_RISK_VALUES).optional(),
  customerId: z.string().uuid().optional(),
  limit: z.coerce.number().int().positive().max(500).optional(),
});

export const EtaRiskListSchema = z.object({
  refreshedAt: z.date().nullable(),
  items: z.array(EtaRiskRowSchema),
});

export const EtaRiskRefreshResultSchema = z.object({
  refreshedAt: z.date(),
  rowCount: z.number().int(),
  durationMs: z.number().int(),
  concurrent: z.boolean(),
});
