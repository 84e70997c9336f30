import { z } from 'zod/v4';
import {
  BulkIngestBodySchema,
  BulkIngestItemSchema,
  BulkIngestResultSchema,
  DUPLICATE_POLICIES,
  IngestResultSchema,
  StatusDecisionSchema,
  TrackingEventInputSchema,
  TrackingEventSelectSchema,
} from '../schemas/tracking-events.js';

export type TrackingEvent = z.infer<typeof TrackingEventSelectSchema>;
export type TrackingEventInput = z.infer<typeof TrackingEventInputSchema>;
export type DuplicatePolicy = (typeof DUPLICATE_POLICIES)[number];
export type StatusDecisionView = z.infer<typeof StatusDecisionSchema>;
export type IngestResult = z.infer<typeof IngestResultSchema>;
export type BulkIngestBody = z.infer<typeof BulkIngestBodySchema>;
export type BulkIngestItem = z.infer<typeof BulkIngestItemSchema>;
export type BulkIngestResult = z.infer<typeof BulkIngestResultSchema>;
