import type { FastifyInstance } from 'fastify';
import etaRiskTaskRoutes from './eta-risk-routes.js';

export default async function taskRoutes(app: FastifyInstance) {
  // Derived state
  etaRiskTaskRoutes(app);
}
