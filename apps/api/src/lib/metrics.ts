import { collectDefaultMetrics, Counter, Gauge, Histogram, Registry } from 'prom-client';

export const registry = new Registry();
collectDefaultMetrics({ register: registry, prefix: 'tracklane_' });

// ───────────────────────────────────────────────────────────────────────────────
// HTTP
// ───────────────────────────────────────────────────────────────────────────────

export const httpRequestDuration = new Histogram({
  name: 'http_server_request_duration_seconds',
  help: 'HTTP request duration (seconds)',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

export const httpRequestsTotal = new Counter({
  name: 'http_server_requests_total',
  help: 'HTTP requests count',
  labelNames: ['method', 'route', 'status_code'] as const,
  registers: [registry],
});

// ───────────────────────────────────────────────────────────────────────────────
// Tracking
// ───────────────────────────────────────────────────────────────────────────────

export const eventsIngested = new Counter({
  name: 'tracklane_events_ingested_total',
  help: 'Tracking events submitted, by kind and outcome (recorded | duplicate | rejected).',
  labelNames: ['event', 'outcome'] as const,
  registers: [registry],
});

export const statusDecisions = new Counter({
  name: 'tracklane_status_decisions_total',
  help: 'Shipment status decisions made while ingesting events.',
  labelNames: ['decision', 'reason'] as const,
  registers: [registry],
});

export const etaRiskRefreshDuration = new Histogram({
  name: 'tracklane_eta_risk_refresh_duration_seconds',
  help: 'Duration of mv_eta_risk refreshes.',
  labelNames: ['mode'] as const,
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 30, 60],
  registers: [registry],
});

export const etaRiskLastRefresh = new Gauge({
  name: 'tracklane_eta_risk_last_refresh_timestamp',
  help: 'UNIX timestamp (seconds) of the last successful mv_eta_risk refresh.',
  registers: [registry],
});

export function startRefreshTimer(mode: 'concurrent' | 'blocking') {
  const end = etaRiskRefreshDuration.startTimer({ mode });
  return () => end();
}
