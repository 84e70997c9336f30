import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest } from 'fastify';
import { httpRequestDuration, httpRequestsTotal, registry } from '../../lib/metrics.js';

type EndTimer = (labels?: Partial<Record<'method' | 'route' | 'status_code', string>>) => number;

function routeLabel(req: FastifyRequest) {
  return req.routeOptions.url ?? 'unmatched';
}

export default fp(
  async (app: FastifyInstance) => {
    const timers = new WeakMap<FastifyRequest, EndTimer>();

    app.addHook('onRequest', async (req) => {
      timers.set(req, httpRequestDuration.startTimer());
    });

    app.addHook('onResponse', async (req, reply) => {
      const method = req.method;
      const route = routeLabel(req);
      const status_code = String(reply.statusCode);

      httpRequestsTotal.inc({ method, route, status_code });
      timers.get(req)?.({ method, route, status_code });
      timers.delete(req);
    });

    app.get('/metrics', { schema: { hide: true } }, async (_req, reply) => {
      reply.header('Content-Type', registry.contentType);
      return registry.metrics();
    });
  },
  { name: 'metrics-http' }
);
