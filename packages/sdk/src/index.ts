export * from './client.js';

export type {
  BulkIngestResult,
  EtaRiskList,
  EtaRiskListQuery,
  EtaRiskRefreshResult,
  IngestResult,
  LatestEvent,
  ShipmentDetail,
  ShipmentException,
  ShipmentProgress,
  TrackingEventInput,
} from './types.js';

export type { IngestOptions, SDKOptions } from './types.js';
