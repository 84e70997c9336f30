import type { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { z } from 'zod/v4';
import {
  CarrierByCodeSchema,
  CarrierInsertSchema,
  CarrierSelectSchema,
  ContainerByNumberSchema,
  ContainerInsertSchema,
  ContainerSelectSchema,
  CustomerByCodeSchema,
  CustomerInsertSchema,
  CustomerSelectSchema,
  ErrorResponseSchema,
  LimitQuerySchema,
  LocationByCodeSchema,
  LocationInsertSchema,
  LocationSelectSchema,
  LocationsListQuerySchema,
  VesselByImoSchema,
  VesselInsertSchema,
  VesselSelectSchema,
} from '@tracklane/types';
import { NotFoundError } from '../../lib/errors.js';
import { createCarrier, getCarrierByScac, listCarriers } from './services/carriers.js';
import { createContainer, getContainerByNumber, listContainers } from './services/containers.js';
import { createCustomer, getCustomerByCode, listCustomers } from './services/customers.js';
import { createLocation, getLocationByCode, listLocations } from './services/locations.js';
import { createVessel, getVesselByImo, listVessels } from './services/vessels.js';

const WriteErrors = { 400: ErrorResponseSchema, 409: ErrorResponseSchema, 422: ErrorResponseSchema };

export default async function catalogRoutes(app: FastifyInstance) {
  const r = app.withTypeProvider<ZodTypeProvider>();
  const read = app.requireApiKey(['tracking:read']);
  const write = app.requireApiKey(['tracking:write']);

  // ───────────────────────────────────────────────────────────────────────────
  // Locations
  // ───────────────────────────────────────────────────────────────────────────

  r.get(
    '/locations',
    {
      preHandler: read,
      schema: {
        tags: ['Catalogs'],
        querystring: LocationsListQuerySchema,
        response: { 200: z.object({ items: z.array(LocationSelectSchema) }) },
      },
    },
    async (req) => ({ items: await listLocations(req.query) })
  );

  r.get(
    '/locations/:unlocode',
    {
      preHandler: read,
      schema: {
        tags: ['Catalogs'],
        params: LocationByCodeSchema,
        response: { 200: LocationSelectSchema, 404: ErrorResponseSchema },
      },
    },
    async (req) => {
      const row = await getLocationByCode(req.params.unlocode);
      if (!row) throw new NotFoundError('location', req.params.unlocode);
      return row;
    }
  );

  r.post(
    '/locations',
    {
      preHandler: write,
      schema: {
        tags: ['Catalogs'],
        body: LocationInsertSchema,
        response: { 201: LocationSelectSchema, ...WriteErrors },
      },
    },
    async (req, reply) => reply.code(201).send(await createLocation(req.body))
  );

  // ───────────────────────────────────────────────────────────────────────────
  // Carriers
  // ───────────────────────────────────────────────────────────────────────────

  r.get(
    '/carriers',
    {
      preHandler: read,
      schema: {
        tags: ['Catalogs'],
        querystring: LimitQuerySchema,
        response: { 200: z.object({ items: z.array(CarrierSelectSchema) }) },
      },
    },
    async (req) => ({ items: await listCarriers(req.query.limit) })
  );

  r.get(
    '/carriers/:scac',
    {
      preHandler: read,
      schema: {
        tags: ['Catalogs'],
        params: CarrierByCodeSchema,
        response: { 200: CarrierSelectSchema, 404: ErrorResponseSchema },
      },
    },
    async (req) => {
      const row = await getCarrierByScac(req.params.scac);
      if (!row) throw new NotFoundError('carrier', req.params.scac);
      return row;
    }
  );

  r.post(
    '/carriers',
    {
      preHandler: write,
      schema: {
        tags: ['Catalogs'],
        body: CarrierInsertSchema,
        response: { 201: CarrierSelectSchema, ...WriteErrors },
      },
    },
    async (req, reply) => reply.code(201).send(await createCarrier(req.body))
  );

  // ───────────────────────────────────────────────────────────────────────────
  // Vessels
  // ───────────────────────────────────────────────────────────────────────────

  r.get(
    '/vessels',
    {
      preHandler: read,
      schema: {
        tags: ['Catalogs'],
        querystring: LimitQuerySchema.extend({ carrierId: z.string().uuid().optional() }),
        response: { 200: z.object({ items: z.array(VesselSelectSchema) }) },
      },
    },
    async (req) => ({ items: await listVessels(req.query) })
  );

  r.get(
    '/vessels/:imoNumber',
    {
      preHandler: read,
      schema: {
        tags: ['Catalogs'],
        params: VesselByImoSchema,
        response: { 200: VesselSelectSchema, 404: ErrorResponseSchema },
      },
    },
    async (req) => {
      const row = await getVesselByImo(req.params.imoNumber);
      if (!row) throw new NotFoundError('vessel', req.params.imoNumber);
      return row;
    }
  );

  r.post(
    '/vessels',
    {
      preHandler: write,
      schema: {
        tags: ['Catalogs'],
        body: VesselInsertSchema,
        response: { 201: VesselSelectSchema, ...WriteErrors },
      },
    },
    async (req, reply) => reply.code(201).send(await createVessel(req.body))
  );

  // ───────────────────────────────────────────────────────────────────────────
  // Containers
  // ───────────────────────────────────────────────────────────────────────────

  r.get(
    '/containers',
    {
      preHandler: read,
      schema: {
        tags: ['Catalogs'],
        querystring: LimitQuerySchema,
        response: { 200: z.object({ items: z.array(ContainerSelectSchema) }) },
      },
    },
    async (req) => ({ items: await listContainers(req.query.limit) })
  );

  r.get(
    '/containers/:containerNo',
    {
      preHandler: read,
      schema: {
        tags: ['Catalogs'],
        params: ContainerByNumberSchema,
        response: { 200: ContainerSelectSchema, 404: ErrorResponseSchema },
      },
    },
    async (req) => {
      const row = await getContainerByNumber(req.params.containerNo);
      if (!row) throw new NotFoundError('container', req.params.containerNo);
      return row;
    }
  );

  r.post(
    '/containers',
    {
      preHandler: write,
      schema: {
        tags: ['Catalogs'],
        body: ContainerInsertSchema,
        response: { 201: ContainerSelectSchema, ...WriteErrors },
      },
    },
    async (req, reply) => reply.code(201).send(await createContainer(req.body))
  );

  // ───────────────────────────────────────────────────────────────────────────
  // Customers
  // ───────────────────────────────────────────────────────────────────────────

  r.get(
    '/customers',
    {
      preHandler: read,
      schema: {
        tags: ['Catalogs'],
        querystring: LimitQuerySchema,
        response: { 200: z.object({ items: z.array(CustomerSelectSchema) }) },
      },
    },
    async (req) => ({ items: await listCustomers(req.query.limit) })
  );

  r.get(
    '/customers/:accountCode',
    {
      preHandler: read,
      schema: {
        tags: ['Catalogs'],
        params: CustomerByCodeSchema,
        response: { 200: CustomerSelectSchema, 404: ErrorResponseSchema },
      },
    },
    async (req) => {
      const row = await getCustomerByCode(req.params.accountCode);
      if (!row) throw new NotFoundError('customer', req.params.accountCode);
      return row;
    }
  );

  r.post(
    '/customers',
    {
      preHandler: write,
      schema: {
        tags: ['Catalogs'],
        body: CustomerInsertSchema,
        response: { 201: CustomerSelectSchema, ...WriteErrors },
      },
    },
    async (req, reply) => reply.code(201).send(await createCustomer(req.body))
  );
}
