import type { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import {
  EtaRiskListQuerySchema,
  EtaRiskListSchema,
  EtaRiskRefreshResultSchema,
} from '@tracklane/types';
import { listEtaRisk, refreshEtaRisk } from './services/eta-risk.js';

export default async function etaRiskRoutes(app: FastifyInstance) {
  const r = app.withTypeProvider<ZodTypeProvider>();

  // GET /v1/eta-risk?status=AT_RISK
  // Rows are as of `refreshedAt`; leg/shipment writes since then are not reflected.
  r.get(
    '/',
    {
      preHandler: app.requireApiKey(['tracking:read']),
      schema: {
        tags: ['Tracking'],
        querystring: EtaRiskListQuerySchema,
        response: { 200: EtaRiskListSchema },
      },
    },
    async (req) => listEtaRisk(req.query)
  );

  // POST /v1/eta-risk/refresh
  r.post(
    '/refresh',
    {
      preHandler: app.requireApiKey(['tasks:eta-risk']),
      schema: { tags: ['Tracking'], response: { 200: EtaRiskRefreshResultSchema } },
      config: { rateLimit: { max: 12, timeWindow: '1 minute' } },
    },
    async (req) => {
      const result = await refreshEtaRisk();
      req.log.info(result, 'eta_risk_refreshed');
      return result;
    }
  );
}
