import { z } from 'zod/v4';
import {
  ShipmentCreateSchema,
  ShipmentDetailSchema,
  ShipmentLegCreateSchema,
  ShipmentLegSelectSchema,
  ShipmentLegUpdateSchema,
  ShipmentPlanUpdateSchema,
  ShipmentSelectSchema,
  ShipmentsListQuerySchema,
} from '../schemas/shipments.js';

export type Shipment = z.infer<typeof ShipmentSelectSchema>;
export type ShipmentCreate = z.infer<typeof ShipmentCreateSchema>;
export type ShipmentPlanUpdate = z.infer<typeof ShipmentPlanUpdateSchema>;
export type ShipmentsListQuery = z.infer<typeof ShipmentsListQuerySchema>;
export type ShipmentDetail = z.infer<typeof ShipmentDetailSchema>;
export type ShipmentLeg = z.infer<typeof ShipmentLegSelectSchema>;
export type ShipmentLegCreate = z.infer<typeof ShipmentLegCreateSchema>;
export type ShipmentLegUpdate = z.infer<typeof ShipmentLegUpdateSchema>;
