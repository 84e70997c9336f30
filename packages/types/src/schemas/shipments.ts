import { z } from 'zod/v4';
import { createInsertSchema, createSelectSchema } from 'drizzle-zod';
import { LEG_STATUS_VALUES, SHIPMENT_STATUS_VALUES } from '@tracklane/db/enums';
import { shipmentLegsTable, shipmentsTable } from '@tracklane/db/schemas';
import { ContainerSelectSchema } from './containers.js';
import { OptionalDateInput } from './common.js';

export const ShipmentSelectSchema = createSelectSchema(shipmentsTable);

/**
 * Status and current location are derived from tracking events, so neither
 * is accepted here; unknown keys are rejected rather than dropped.
 */
export const ShipmentCreateSchema = createInsertSchema(shipmentsTable, {
  referenceNo: (s) => s.min(1).max(64),
  incoterm: z.string().min(3).max(8).nullable().optional(),
})
  .omit({ id: true, status: true, createdAt: true, currentLocationId: true })
  .extend({
    etaFinal: OptionalDateInput,
    etdOrigin: OptionalDateInput,
  })
  .strict();

export const ShipmentPlanUpdateSchema = z
  .object({
    etaFinal: OptionalDateInput,
    etdOrigin: OptionalDateInput,
    incoterm: z.string().min(3).max(8).nullable().optional(),
  })
  .strict();

export const ShipmentByRefSchema = z.object({ ref: z.string().min(1).max(64) });

export const ShipmentsListQuerySchema = z.object({
  customerId: z.string().uuid().optional(),
  status: z.enum(SHIPMENT_STATUS_VALUES).optional(),
  limit: z.coerce.number().int().positive().max(500).optional(),
});

// ───────────────────────────────────────────────────────────────────────────────
// Legs
// ───────────────────────────────────────────────────────────────────────────────

export const ShipmentLegSelectSchema = createSelectSchema(shipmentLegsTable);

export const ShipmentLegCreateSchema = createInsertSchema(shipmentLegsTable, {
  sequenceNo: (s) => s.int().min(1),
  mode: (s) => s.min(1).max(16),
})
  .omit({ id: true, shipmentId: true })
  .extend({
    etd: OptionalDateInput,
    eta: OptionalDateInput,
    ata: OptionalDateInput,
  });

export const ShipmentLegUpdateSchema = z.object({
  mode: z.string().min(1).max(16).optional(),
  carrierId: z.string().uuid().nullable().optional(),
  vesselId: z.string().uuid().nullable().optional(),
  etd: OptionalDateInput,
  eta: OptionalDateInput,
  ata: OptionalDateInput,
  status: z.enum(LEG_STATUS_VALUES).optional(),
});

export const ShipmentLegParamsSchema = z.object({
  ref: z.string().min(1).max(64),
  sequenceNo: z.coerce.number().int().min(1),
});

// ───────────────────────────────────────────────────────────────────────────────
// Containers
// ───────────────────────────────────────────────────────────────────────────────

export const ShipmentContainerLinkSchema = z.object({ containerId: z.string().uuid() });

export const ShipmentDetailSchema = ShipmentSelectSchema.extend({
  legs: z.array(ShipmentLegSelectSchema),
  containers: z.array(ContainerSelectSchema),
});
