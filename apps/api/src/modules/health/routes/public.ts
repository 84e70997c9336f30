import type { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { HealthSchema } from '@tracklane/types';
import { checkHealth } from '../services.js';

export type HealthRoutesOptions = { etaRiskMaxAgeMinutes: number };

export default async function healthPublicRoutes(app: FastifyInstance, opts: HealthRoutesOptions) {
  const r = app.withTypeProvider<ZodTypeProvider>();

  // HEAD variant (public); declared before GET so it replaces the implicit HEAD route
  r.head(
    '/healthz',
    { schema: { hide: true }, config: { rateLimit: { max: 1200, timeWindow: '1 minute' } } },
    async (_req, reply) => {
      const report = await checkHealth(opts);
      reply.header('cache-control', 'no-store');
      return reply.code(report.ok ? 200 : 503).send();
    }
  );

  // Simple liveness (public)
  r.get(
    '/healthz',
    {
      schema: { hide: true, response: { 200: HealthSchema, 503: HealthSchema } },
      config: { rateLimit: { max: 600, timeWindow: '1 minute' } },
    },
    async (_req, reply) => {
      const report = await checkHealth(opts);
      reply.header('cache-control', 'no-store');
      return reply.code(report.ok ? 200 : 503).send(report);
    }
  );

  // Readiness/details (public summary)
  r.get(
    '/health',
    {
      schema: { response: { 200: HealthSchema, 503: HealthSchema } },
      config: { rateLimit: { max: 300, timeWindow: '1 minute' } },
    },
    async (_req, reply) => {
      const report = await checkHealth(opts);
      reply.header('cache-control', 'no-store');
      return reply.code(report.ok ? 200 : 503).send(report);
    }
  );
}
