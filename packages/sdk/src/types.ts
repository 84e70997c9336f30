export type SDKOptions = {
  baseUrl: string;
  apiKey: string;
  fetch?: typeof globalThis.fetch;
};

export type IngestOptions = {
  onDuplicate?: 'ignore' | 'error';
};

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
} from '@tracklane/types';
