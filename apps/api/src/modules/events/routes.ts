import type { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import {
  BulkIngestBodySchema,
  BulkIngestResultSchema,
  ErrorResponseSchema,
  IngestQuerySchema,
  IngestResultSchema,
  TrackingEventInputSchema,
  type BulkIngestItem,
  type IngestResult,
} from '@tracklane/types';
import { TrackingError } from '../../lib/errors.js';
import { refreshEtaRisk } from '../tracking/services/eta-risk.js';
import { type IngestOutcome, ingestTrackingEvent, ingestTrackingEvents } from './services/ingest-event.js';

export function toIngestResult(outcome: IngestOutcome): IngestResult {
  const { shipment } = outcome;
  return {
    duplicate: outcome.outcome === 'duplicate',
    event: outcome.event,
    shipment: {
      id: shipment.id,
      referenceNo: shipment.referenceNo,
      status: shipment.status,
      currentLocationId: shipment.currentLocationId,
    },
    decision: outcome.outcome === 'recorded' ? outcome.decision : null,
  };
}

export default async function eventRoutes(app: FastifyInstance) {
  const r = app.withTypeProvider<ZodTypeProvider>();

  // POST /v1/events
  r.post(
    '/',
    {
      preHandler: app.requireApiKey(['tracking:write']),
      schema: {
        tags: ['Tracking'],
        body: TrackingEventInputSchema,
        querystring: IngestQuerySchema,
        response: {
          200: IngestResultSchema,
          201: IngestResultSchema,
          400: ErrorResponseSchema,
          409: ErrorResponseSchema,
          422: ErrorResponseSchema,
        },
      },
    },
    async (req, reply) => {
      const outcome = await ingestTrackingEvent(req.body, { onDuplicate: req.query.onDuplicate });
      const result = toIngestResult(outcome);
      req.log.info(
        {
          eventId: result.event.id,
          shipmentId: result.shipment.id,
          event: result.event.event,
          duplicate: result.duplicate,
          decision: result.decision?.reason ?? null,
        },
        'tracking_event_ingested'
      );
      return reply.code(result.duplicate ? 200 : 201).send(result);
    }
  );

  // POST /v1/events/bulk
  r.post(
    '/bulk',
    {
      preHandler: app.requireApiKey(['tracking:write']),
      schema: {
        tags: ['Tracking'],
        body: BulkIngestBodySchema,
        querystring: IngestQuerySchema,
        response: { 200: BulkIngestResultSchema, 400: ErrorResponseSchema },
      },
      config: { rateLimit: { max: 60, timeWindow: '1 minute' } },
    },
    async (req) => {
      const outcomes = await ingestTrackingEvents(req.body.events, {
        onDuplicate: req.query.onDuplicate,
      });

      let recorded = 0;
      let duplicates = 0;
      const items = outcomes.map((o): BulkIngestItem => {
        if (o.ok) {
          if (o.outcome.outcome === 'duplicate') duplicates++;
          else recorded++;
          return {
            ok: true,
            index: o.index,
            duplicate: o.outcome.outcome === 'duplicate',
            eventId: o.outcome.event.id,
          };
        }
        if (o.error instanceof TrackingError) {
          return { ok: false, index: o.index, error: { code: o.error.code, message: o.error.message } };
        }
        req.log.error({ err: o.error, index: o.index }, 'bulk_item_failed');
        return { ok: false, index: o.index, error: { code: 'ERR_INTERNAL', message: 'Internal error' } };
      });

      const riskRefreshedAt = req.body.refreshRisk ? (await refreshEtaRisk()).refreshedAt : null;

      req.log.info(
        { recorded, duplicates, failed: items.length - recorded - duplicates },
        'tracking_events_bulk_ingested'
      );
      return {
        recorded,
        duplicates,
        failed: items.length - recorded - duplicates,
        items,
        riskRefreshedAt,
      };
    }
  );
}
