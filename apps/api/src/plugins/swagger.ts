import swagger from '@fastify/swagger';
import swaggerUI from '@fastify/swagger-ui';
import { jsonSchemaTransform } from 'fastify-type-provider-zod';
import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';

// Not encapsulated: the onRoute hook has to see routes registered on the root instance.
const swaggerPlugin: FastifyPluginAsync = fp(
  async (app) => {
  await app.register(swagger, {
    openapi: {
      info: { title: 'Tracklane API', version: '1.0.0' },
      servers: [{ url: process.env.TRACKLANE_API_URL || 'http://localhost:3001' }],
      security: [{ ApiKeyHeader: [] }],
      components: {
        securitySchemes: {
          ApiKeyHeader: { type: 'apiKey', in: 'header', name: 'x-api-key' },
          BearerAuth: { type: 'http', scheme: 'bearer' },
        },
      },
      tags: [
        { name: 'Catalogs', description: 'Locations, carriers, vessels, containers, customers' },
        { name: 'Shipments', description: 'Shipments, legs and container links' },
        { name: 'Tracking', description: 'Event ingestion and derived state' },
        { name: 'Customs', description: 'Customs clearance and exceptions' },
        { name: 'Tasks', description: 'Scheduled maintenance triggers' },
      ],
    },
    transform: jsonSchemaTransform,
  });

  await app.register(swaggerUI, {
    routePrefix: '/docs',
    uiConfig: {
      deepLinking: true,
      persistAuthorization: true,
    },
  });

  app.get('/openapi.json', { schema: { hide: true } }, async () => app.swagger());
  },
  { name: 'swagger-docs' }
);

export default swaggerPlugin;
