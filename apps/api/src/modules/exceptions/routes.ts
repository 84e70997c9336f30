import type { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { z } from 'zod/v4';
import {
  ErrorResponseSchema,
  ExceptionCloseSchema,
  ExceptionSelectSchema,
  ExceptionsListQuerySchema,
  IdParamSchema,
} from '@tracklane/types';
import { findShipmentByRef } from '../shipments/services/get-shipment.js';
import { closeException, listExceptions } from './services.js';

export default async function exceptionRoutes(app: FastifyInstance) {
  const r = app.withTypeProvider<ZodTypeProvider>();

  // GET /v1/exceptions?shipmentRef=&open=
  r.get(
    '/',
    {
      preHandler: app.requireApiKey(['tracking:read']),
      schema: {
        tags: ['Customs'],
        querystring: ExceptionsListQuerySchema,
        response: { 200: z.object({ items: z.array(ExceptionSelectSchema) }) },
      },
    },
    async (req) => {
      const { shipmentRef, limit } = req.query;
      let shipmentId: string | undefined;
      if (shipmentRef) {
        const shipment = await findShipmentByRef(shipmentRef);
        if (!shipment) return { items: [] };
        shipmentId = shipment.id;
      }
      const open = req.query.open === undefined ? undefined : req.query.open === 'true';
      return { items: await listExceptions({ shipmentId, open, limit }) };
    }
  );

  // POST /v1/exceptions/:id/close
  r.post(
    '/:id/close',
    {
      preHandler: app.requireApiKey(['tracking:write']),
      schema: {
        tags: ['Customs'],
        params: IdParamSchema,
        body: ExceptionCloseSchema.optional(),
        response: { 200: ExceptionSelectSchema, 404: ErrorResponseSchema, 409: ErrorResponseSchema },
      },
    },
    async (req) => closeException(req.params.id, req.body?.closedAt ?? new Date())
  );
}
