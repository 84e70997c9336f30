import Fastify from 'fastify';
import catalogRoutes from './modules/catalogs/routes.js';
import cors from '@fastify/cors';
import customsRoutes from './modules/customs/routes.js';
import errorHandler from './plugins/error-handler.js';
import etaRiskRoutes from './modules/tracking/routes.js';
import eventRoutes from './modules/events/routes.js';
import exceptionRoutes from './modules/exceptions/routes.js';
import healthPublicRoutes from './modules/health/routes/public.js';
import helmet from '@fastify/helmet';
import metricsHttp from './plugins/prometheus/metrics-http.js';
import rateLimit from '@fastify/rate-limit';
import sensible from '@fastify/sensible';
import shipmentRoutes from './modules/shipments/routes.js';
import swaggerPlugin from './plugins/swagger.js';
import tasksRoutes from './modules/tasks/index.js';
import { apiKeyAuthPlugin, parsePresentedToken } from './plugins/api-key-auth.js';
import { serializerCompiler, validatorCompiler, type ZodTypeProvider } from 'fastify-type-provider-zod';

export type BuildServerOptions = {
  logger?: boolean;
  logLevel?: string;
  trustProxy?: boolean;
  apiKeyPepper?: string;
  etaRiskMaxAgeMinutes?: number;
};

export async function buildServer(opts: BuildServerOptions = {}) {
  const app = Fastify({
    logger: opts.logger === false ? false : { level: opts.logLevel ?? 'info' },
    bodyLimit: 2 * 1024 * 1024,
    trustProxy: opts.trustProxy ?? false,
  }).withTypeProvider<ZodTypeProvider>();

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  await app.register(helmet, { contentSecurityPolicy: false });

  const ALLOWED_ORIGIN = process.env.WEB_ORIGIN; // e.g. https://ops.example.com
  await app.register(cors, {
    origin: ALLOWED_ORIGIN ? [ALLOWED_ORIGIN] : false,
    methods: ['GET', 'POST', 'PATCH', 'OPTIONS'],
    allowedHeaders: ['authorization', 'x-api-key', 'content-type'],
    maxAge: 600,
    credentials: false,
  });

  await app.register(sensible);
  await app.register(errorHandler);
  await app.register(swaggerPlugin);
  await app.register(apiKeyAuthPlugin, { pepper: opts.apiKeyPepper });

  // Global rate limit, keyed by the presented API key id (falls back to client IP)
  await app.register(rateLimit, {
    global: true,
    max: Number(process.env.RATE_LIMIT_MAX ?? 600),
    timeWindow: process.env.RATE_LIMIT_WINDOW ?? '1 minute',
    keyGenerator: (req) =>
      parsePresentedToken(req.headers.authorization ?? req.headers['x-api-key'])?.keyId ?? req.ip,
  });

  await app.register(metricsHttp);

  // -----------------------
  // Public / read API
  // -----------------------
  await app.register(healthPublicRoutes, {
    etaRiskMaxAgeMinutes: opts.etaRiskMaxAgeMinutes ?? 60,
  }); // /healthz, /health

  await app.register(catalogRoutes, { prefix: '/v1' });
  await app.register(shipmentRoutes, { prefix: '/v1/shipments' });
  await app.register(eventRoutes, { prefix: '/v1/events' });
  await app.register(etaRiskRoutes, { prefix: '/v1/eta-risk' });
  await app.register(customsRoutes, { prefix: '/v1/customs' });
  await app.register(exceptionRoutes, { prefix: '/v1/exceptions' });

  // --------------
  // Internal cron
  // --------------
  await app.register(tasksRoutes);

  return app;
}
