type ApiRuntimeEnv = {
  nodeEnv: string;
  host: string;
  port: number;
  logLevel: string;
  trustProxy: boolean;
  etaRiskMaxAgeMinutes: number;
};

const LOG_LEVELS = new Set(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

function parsePort(name: string, fallback: number): number {
  const raw = (process.env[name] ?? '').trim();
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0 || parsed > 65535) {
    throw new Error(`Invalid ${name}: expected integer port (1-65535), got "${raw}"`);
  }
  return parsed;
}

export function parsePositiveInt(name: string, fallback: number): number {
  const raw = (process.env[name] ?? '').trim();
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid ${name}: expected a positive integer, got "${raw}"`);
  }
  return parsed;
}

function parseLogLevel(): string {
  const raw = (process.env.LOG_LEVEL ?? '').trim().toLowerCase();
  if (!raw) return 'info';
  if (!LOG_LEVELS.has(raw)) {
    throw new Error(`Invalid LOG_LEVEL: expected one of ${[...LOG_LEVELS].join(', ')}`);
  }
  return raw;
}

export function validateApiRuntimeEnv(): ApiRuntimeEnv {
  const nodeEnv = (process.env.NODE_ENV ?? 'development').trim();
  const missing: string[] = [];

  if (!(process.env.DATABASE_URL ?? '').trim()) missing.push('DATABASE_URL');
  if (nodeEnv === 'production' && !(process.env.API_KEY_PEPPER ?? '').trim()) {
    missing.push('API_KEY_PEPPER');
  }

  if (missing.length > 0) {
    throw new Error(`Missing required API env vars: ${missing.join(', ')}`);
  }

  const trustProxyRaw = (process.env.TRUST_PROXY ?? '').trim().toLowerCase();

  return {
    nodeEnv,
    host: (process.env.HOST ?? '0.0.0.0').trim() || '0.0.0.0',
    port: parsePort('PORT', 3001),
    logLevel: parseLogLevel(),
    trustProxy: trustProxyRaw === '1' || trustProxyRaw === 'true',
    etaRiskMaxAgeMinutes: parsePositiveInt('ETA_RISK_MAX_AGE_MINUTES', 60),
  };
}
