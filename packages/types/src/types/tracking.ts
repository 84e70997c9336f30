import { z } from 'zod/v4';
import {
  EtaRiskListQuerySchema,
  EtaRiskListSchema,
  EtaRiskRefreshResultSchema,
  EtaRiskRowSchema,
  LatestEventSchema,
  ShipmentProgressSchema,
} from '../schemas/tracking.js';

export type LatestEvent = z.infer<typeof LatestEventSchema>;
export type ShipmentProgress = z.infer<typeof ShipmentProgressSchema>;
export type EtaRiskRow = z.infer<typeof EtaRiskRowSchema>;
export type EtaRiskListQuery = z.infer<typeof EtaRiskListQuerySchema>;
export type EtaRiskList = z.infer<typeof EtaRiskListSchema>;
export type EtaRiskRefreshResult = z.infer<typeof EtaRiskRefreshResultSchema>;
