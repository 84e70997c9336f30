import { z } from 'zod/v4';
import {
  BulkIngestResultSchema,
  EtaRiskListSchema,
  EtaRiskRefreshResultSchema,
  ExceptionSelectSchema,
  IngestResultSchema,
  LatestEventSchema,
  ShipmentDetailSchema,
  ShipmentProgressSchema,
} from '@tracklane/types';
import type {
  BulkIngestResult,
  EtaRiskList,
  EtaRiskListQuery,
  EtaRiskRefreshResult,
  IngestOptions,
  IngestResult,
  LatestEvent,
  SDKOptions,
  ShipmentDetail,
  ShipmentException,
  ShipmentProgress,
  TrackingEventInput,
} from './types.js';

// -------------------------------
// Errors
// -------------------------------
export class TracklaneApiError extends Error {
  readonly status: number;
  readonly code: string;
  readonly details?: unknown;

  constructor(status: number, code: string, message: string, details?: unknown) {
    super(`${status} ${message}`);
    this.name = 'TracklaneApiError';
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

const ErrorBody = z.object({
  error: z.object({ code: z.string(), message: z.string(), details: z.unknown().optional() }),
});

// -------------------------------
// Internal HTTP helper
// -------------------------------

// Exactly what Date#toJSON emits; the API serializes every timestamp this way.
const ISO_TIMESTAMP_RE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/;

function reviveDates(_key: string, value: unknown): unknown {
  return typeof value === 'string' && ISO_TIMESTAMP_RE.test(value) ? new Date(value) : value;
}

function joinUrl(base: string, path: string) {
  const b = base.replace(/\/+$/, '');
  const p = path.startsWith('/') ? path : `/${path}`;
  return `${b}${p}`;
}

function query(params: Record<string, string | number | undefined>) {
  const q = new URLSearchParams();
  for (const [k, v] of Object.entries(params)) {
    if (v !== undefined) q.set(k, String(v));
  }
  const s = q.toString();
  return s ? `?${s}` : '';
}

async function http<S extends z.ZodType>(
  opts: SDKOptions,
  path: string,
  schema: S,
  init: RequestInit = {}
): Promise<z.output<S>> {
  if (!opts.baseUrl) throw new Error('SDK baseUrl is required');
  if (!opts.apiKey) throw new Error('SDK apiKey is required');

  const f = opts.fetch ?? fetch;
  const headers: Record<string, string> = {
    authorization: `Bearer ${opts.apiKey}`,
    ...(init.body !== undefined ? { 'content-type': 'application/json' } : {}),
  };

  const res = await f(joinUrl(opts.baseUrl, path), { ...init, headers });
  const text = await res.text();

  let body: unknown = null;
  if (text) {
    try {
      body = JSON.parse(text, reviveDates);
    } catch {
      body = text;
    }
  }

  if (!res.ok) {
    const parsed = ErrorBody.safeParse(body);
    if (parsed.success) {
      const { code, message, details } = parsed.data.error;
      throw new TracklaneApiError(res.status, code, message, details);
    }
    throw new TracklaneApiError(res.status, 'ERR_HTTP', text || 'request failed');
  }

  return schema.parse(body);
}

const ref = (shipmentRef: string) => `/v1/shipments/${encodeURIComponent(shipmentRef)}`;

// -------------------------------
// Read interface
// -------------------------------
export async function getShipment(sdk: SDKOptions, shipmentRef: string): Promise<ShipmentDetail> {
  return http(sdk, ref(shipmentRef), ShipmentDetailSchema);
}

export async function getLatestEvent(sdk: SDKOptions, shipmentRef: string): Promise<LatestEvent> {
  return http(sdk, `${ref(shipmentRef)}/latest-event`, LatestEventSchema);
}

export async function getProgress(sdk: SDKOptions, shipmentRef: string): Promise<ShipmentProgress> {
  return http(sdk, `${ref(shipmentRef)}/progress`, ShipmentProgressSchema);
}

/** Cached classification; `refreshedAt` says how old it is. */
export async function listEtaRisk(sdk: SDKOptions, params: EtaRiskListQuery = {}): Promise<EtaRiskList> {
  return http(sdk, `/v1/eta-risk${query(params)}`, EtaRiskListSchema);
}

/** Shipments whose current leg ETA is past the promised final ETA. */
export async function findDelayedShipments(
  sdk: SDKOptions,
  params: { customerId?: string; limit?: number } = {}
): Promise<EtaRiskList> {
  return listEtaRisk(sdk, { ...params, status: 'AT_RISK' });
}

export async function listOpenExceptions(
  sdk: SDKOptions,
  params: { shipmentRef?: string; limit?: number } = {}
): Promise<ShipmentException[]> {
  const data = await http(
    sdk,
    `/v1/exceptions${query({ ...params, open: 'true' })}`,
    z.object({ items: z.array(ExceptionSelectSchema) })
  );
  return data.items;
}

// -------------------------------
// Trusted ingestion
// -------------------------------
export async function ingestEvent(
  sdk: SDKOptions,
  event: TrackingEventInput,
  opts: IngestOptions = {}
): Promise<IngestResult> {
  return http(sdk, `/v1/events${query({ onDuplicate: opts.onDuplicate })}`, IngestResultSchema, {
    method: 'POST',
    body: JSON.stringify(event),
  });
}

export async function ingestEvents(
  sdk: SDKOptions,
  events: TrackingEventInput[],
  opts: IngestOptions & { refreshRisk?: boolean } = {}
): Promise<BulkIngestResult> {
  return http(
    sdk,
    `/v1/events/bulk${query({ onDuplicate: opts.onDuplicate })}`,
    BulkIngestResultSchema,
    { method: 'POST', body: JSON.stringify({ events, refreshRisk: opts.refreshRisk }) }
  );
}

export async function refreshEtaRisk(sdk: SDKOptions): Promise<EtaRiskRefreshResult> {
  return http(sdk, '/v1/eta-risk/refresh', EtaRiskRefreshResultSchema, { method: 'POST' });
}
