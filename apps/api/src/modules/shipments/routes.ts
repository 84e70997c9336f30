import type { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { z } from 'zod/v4';
import {
  ContainerSelectSchema,
  CustomsClearanceSelectSchema,
  CustomsCreateSchema,
  ErrorResponseSchema,
  EventsListQuerySchema,
  ExceptionOpenSchema,
  ExceptionSelectSchema,
  LatestEventSchema,
  ShipmentByRefSchema,
  ShipmentContainerLinkSchema,
  ShipmentCreateSchema,
  ShipmentDetailSchema,
  ShipmentLegCreateSchema,
  ShipmentLegParamsSchema,
  ShipmentLegSelectSchema,
  ShipmentLegUpdateSchema,
  ShipmentPlanUpdateSchema,
  ShipmentProgressSchema,
  ShipmentSelectSchema,
  ShipmentsListQuerySchema,
  TrackingEventSelectSchema,
} from '@tracklane/types';
import { NotFoundError } from '../../lib/errors.js';
import { createCustomsClearance, listCustomsClearances } from '../customs/services.js';
import { listShipmentEvents } from '../events/services/list-events.js';
import { listExceptions, openException } from '../exceptions/services.js';
import { getCurrentProgress } from '../tracking/services/current-progress.js';
import { getLatestEvent } from '../tracking/services/latest-event.js';
import { attachContainer, listShipmentContainers } from './services/containers.js';
import { getShipmentDetail, requireShipmentByRef } from './services/get-shipment.js';
import { addLeg, listLegs, updateLeg } from './services/legs.js';
import { createShipment, listShipments, updateShipmentPlan } from './services/shipments.js';

const WriteErrors = {
  400: ErrorResponseSchema,
  404: ErrorResponseSchema,
  409: ErrorResponseSchema,
  422: ErrorResponseSchema,
};

export default async function shipmentRoutes(app: FastifyInstance) {
  const r = app.withTypeProvider<ZodTypeProvider>();
  const read = app.requireApiKey(['tracking:read']);
  const write = app.requireApiKey(['tracking:write']);

  // ───────────────────────────────────────────────────────────────────────────
  // Shipments
  // ───────────────────────────────────────────────────────────────────────────

  r.get(
    '/',
    {
      preHandler: read,
      schema: {
        tags: ['Shipments'],
        querystring: ShipmentsListQuerySchema,
        response: { 200: z.object({ items: z.array(ShipmentSelectSchema) }) },
      },
    },
    async (req) => ({ items: await listShipments(req.query) })
  );

  r.post(
    '/',
    {
      preHandler: write,
      schema: {
        tags: ['Shipments'],
        body: ShipmentCreateSchema,
        response: { 201: ShipmentSelectSchema, ...WriteErrors },
      },
    },
    async (req, reply) => reply.code(201).send(await createShipment(req.body))
  );

  r.get(
    '/:ref',
    {
      preHandler: read,
      schema: {
        tags: ['Shipments'],
        params: ShipmentByRefSchema,
        response: { 200: ShipmentDetailSchema, 404: ErrorResponseSchema },
      },
    },
    async (req) => {
      const detail = await getShipmentDetail(req.params.ref);
      if (!detail) throw new NotFoundError('shipment', req.params.ref);
      return detail;
    }
  );

  r.patch(
    '/:ref',
    {
      preHandler: write,
      schema: {
        tags: ['Shipments'],
        params: ShipmentByRefSchema,
        body: ShipmentPlanUpdateSchema,
        response: { 200: ShipmentSelectSchema, ...WriteErrors },
      },
    },
    async (req) => {
      const shipment = await requireShipmentByRef(req.params.ref);
      return updateShipmentPlan(shipment.id, req.body);
    }
  );

  // ───────────────────────────────────────────────────────────────────────────
  // Legs
  // ───────────────────────────────────────────────────────────────────────────

  r.get(
    '/:ref/legs',
    {
      preHandler: read,
      schema: {
        tags: ['Shipments'],
        params: ShipmentByRefSchema,
        response: { 200: z.object({ items: z.array(ShipmentLegSelectSchema) }), 404: ErrorResponseSchema },
      },
    },
    async (req) => {
      const shipment = await requireShipmentByRef(req.params.ref);
      return { items: await listLegs(shipment.id) };
    }
  );

  r.post(
    '/:ref/legs',
    {
      preHandler: write,
      schema: {
        tags: ['Shipments'],
        params: ShipmentByRefSchema,
        body: ShipmentLegCreateSchema,
        response: { 201: ShipmentLegSelectSchema, ...WriteErrors },
      },
    },
    async (req, reply) => {
      const shipment = await requireShipmentByRef(req.params.ref);
      return reply.code(201).send(await addLeg(shipment.id, req.body));
    }
  );

  r.patch(
    '/:ref/legs/:sequenceNo',
    {
      preHandler: write,
      schema: {
        tags: ['Shipments'],
        params: ShipmentLegParamsSchema,
        body: ShipmentLegUpdateSchema,
        response: { 200: ShipmentLegSelectSchema, ...WriteErrors },
      },
    },
    async (req) => {
      const shipment = await requireShipmentByRef(req.params.ref);
      return updateLeg(shipment.id, req.params.sequenceNo, req.body);
    }
  );

  // ───────────────────────────────────────────────────────────────────────────
  // Containers
  // ───────────────────────────────────────────────────────────────────────────

  r.get(
    '/:ref/containers',
    {
      preHandler: read,
      schema: {
        tags: ['Shipments'],
        params: ShipmentByRefSchema,
        response: { 200: z.object({ items: z.array(ContainerSelectSchema) }), 404: ErrorResponseSchema },
      },
    },
    async (req) => {
      const shipment = await requireShipmentByRef(req.params.ref);
      return { items: await listShipmentContainers(shipment.id) };
    }
  );

  r.post(
    '/:ref/containers',
    {
      preHandler: write,
      schema: {
        tags: ['Shipments'],
        params: ShipmentByRefSchema,
        body: ShipmentContainerLinkSchema,
        response: { 200: z.object({ linked: z.boolean() }), ...WriteErrors },
      },
    },
    async (req) => {
      const shipment = await requireShipmentByRef(req.params.ref);
      return attachContainer(shipment.id, req.body.containerId);
    }
  );

  // ───────────────────────────────────────────────────────────────────────────
  // Tracking reads
  // ───────────────────────────────────────────────────────────────────────────

  r.get(
    '/:ref/events',
    {
      preHandler: read,
      schema: {
        tags: ['Tracking'],
        params: ShipmentByRefSchema,
        querystring: EventsListQuerySchema,
        response: { 200: z.object({ items: z.array(TrackingEventSelectSchema) }), 404: ErrorResponseSchema },
      },
    },
    async (req) => {
      const shipment = await requireShipmentByRef(req.params.ref);
      return { items: await listShipmentEvents(shipment.id, req.query) };
    }
  );

  r.get(
    '/:ref/latest-event',
    {
      preHandler: read,
      schema: {
        tags: ['Tracking'],
        params: ShipmentByRefSchema,
        response: { 200: LatestEventSchema, 404: ErrorResponseSchema },
      },
    },
    async (req) => {
      const shipment = await requireShipmentByRef(req.params.ref);
      const latest = await getLatestEvent(shipment.id);
      if (!latest) throw new NotFoundError('shipment', `${req.params.ref} has no events`);
      return latest;
    }
  );

  r.get(
    '/:ref/progress',
    {
      preHandler: read,
      schema: {
        tags: ['Tracking'],
        params: ShipmentByRefSchema,
        response: { 200: ShipmentProgressSchema, 404: ErrorResponseSchema },
      },
    },
    async (req) => {
      const shipment = await requireShipmentByRef(req.params.ref);
      const progress = await getCurrentProgress(shipment.id);
      if (!progress) throw new NotFoundError('leg', `${req.params.ref} has no legs`);
      return progress;
    }
  );

  // ───────────────────────────────────────────────────────────────────────────
  // Customs & exceptions
  // ───────────────────────────────────────────────────────────────────────────

  r.get(
    '/:ref/customs',
    {
      preHandler: read,
      schema: {
        tags: ['Customs'],
        params: ShipmentByRefSchema,
        response: {
          200: z.object({ items: z.array(CustomsClearanceSelectSchema) }),
          404: ErrorResponseSchema,
        },
      },
    },
    async (req) => {
      const shipment = await requireShipmentByRef(req.params.ref);
      return { items: await listCustomsClearances(shipment.id) };
    }
  );

  r.post(
    '/:ref/customs',
    {
      preHandler: write,
      schema: {
        tags: ['Customs'],
        params: ShipmentByRefSchema,
        body: CustomsCreateSchema,
        response: { 201: CustomsClearanceSelectSchema, ...WriteErrors },
      },
    },
    async (req, reply) => {
      const shipment = await requireShipmentByRef(req.params.ref);
      return reply.code(201).send(await createCustomsClearance(shipment.id, req.body));
    }
  );

  r.get(
    '/:ref/exceptions',
    {
      preHandler: read,
      schema: {
        tags: ['Customs'],
        params: ShipmentByRefSchema,
        querystring: z.object({ open: z.enum(['true', 'false']).optional() }),
        response: { 200: z.object({ items: z.array(ExceptionSelectSchema) }), 404: ErrorResponseSchema },
      },
    },
    async (req) => {
      const shipment = await requireShipmentByRef(req.params.ref);
      const open = req.query.open === undefined ? undefined : req.query.open === 'true';
      return { items: await listExceptions({ shipmentId: shipment.id, open }) };
    }
  );

  r.post(
    '/:ref/exceptions',
    {
      preHandler: write,
      schema: {
        tags: ['Customs'],
        params: ShipmentByRefSchema,
        body: ExceptionOpenSchema,
        response: { 201: ExceptionSelectSchema, ...WriteErrors },
      },
    },
    async (req, reply) => {
      const shipment = await requireShipmentByRef(req.params.ref);
      return reply.code(201).send(await openException(shipment.id, req.body));
    }
  );
}
