import type { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { EtaRiskRefreshResultSchema } from '@tracklane/types';
import { refreshEtaRisk } from '../tracking/services/eta-risk.js';

export default function etaRiskTaskRoutes(app: FastifyInstance) {
  // ETA risk: refresh on the scheduler's interval (see ETA_RISK_MAX_AGE_MINUTES)
  app.withTypeProvider<ZodTypeProvider>().post(
    '/internal/cron/eta-risk/refresh',
    {
      preHandler: app.requireApiKey(['tasks:eta-risk']),
      schema: { tags: ['Tasks'], response: { 200: EtaRiskRefreshResultSchema } },
    },
    async (req, reply) => {
      const result = await refreshEtaRisk();
      req.log.info(result, 'eta_risk_refreshed');
      return reply.send(result);
    }
  );
}
