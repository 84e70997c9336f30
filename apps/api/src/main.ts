import 'dotenv/config';
import { closeDatabase } from '@tracklane/db';
import { validateApiRuntimeEnv } from './lib/env.js';
import { buildServer } from './server.js';

const env = validateApiRuntimeEnv();

if (env.nodeEnv === 'production' && !env.trustProxy) {
  console.warn('TRUST_PROXY not set; trustProxy is disabled in production.');
}

async function start() {
  const app = await buildServer({
    logLevel: env.logLevel,
    trustProxy: env.trustProxy,
    apiKeyPepper: process.env.API_KEY_PEPPER,
    etaRiskMaxAgeMinutes: env.etaRiskMaxAgeMinutes,
  });

  app.addHook('onClose', async () => {
    await closeDatabase();
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, 'shutting_down');
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ err }, 'shutdown_failed');
          process.exit(1);
        }
      );
    });
  }

  await app.listen({ port: env.port, host: env.host });
}

start().catch((err) => {
  console.error(err);
  process.exit(1);
});
