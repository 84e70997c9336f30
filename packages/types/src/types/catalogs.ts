import { z } from 'zod/v4';
import { CarrierInsertSchema, CarrierSelectSchema } from '../schemas/carriers.js';
import { ContainerInsertSchema, ContainerSelectSchema } from '../schemas/containers.js';
import { CustomerInsertSchema, CustomerSelectSchema } from '../schemas/customers.js';
import { LocationInsertSchema, LocationSelectSchema } from '../schemas/locations.js';
import { VesselInsertSchema, VesselSelectSchema } from '../schemas/vessels.js';

export type Location = z.infer<typeof LocationSelectSchema>;
export type LocationInsert = z.infer<typeof LocationInsertSchema>;
export type Carrier = z.infer<typeof CarrierSelectSchema>;
export type CarrierInsert = z.infer<typeof CarrierInsertSchema>;
export type Vessel = z.infer<typeof VesselSelectSchema>;
export type VesselInsert = z.infer<typeof VesselInsertSchema>;
export type Container = z.infer<typeof ContainerSelectSchema>;
export type ContainerInsert = z.infer<typeof ContainerInsertSchema>;
export type Customer = z.infer<typeof CustomerSelectSchema>;
export type CustomerInsert = z.infer<typeof CustomerInsertSchema>;
