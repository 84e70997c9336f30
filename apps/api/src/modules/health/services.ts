import { db } from '@tracklane/db';
import type { Health } from '@tracklane/types';
import { sql } from 'drizzle-orm';
import { getEtaRiskRefreshedAt } from '../tracking/services/eta-risk.js';

const SERVICE = 'tracklane-api';

async function probeDb(): Promise<{ ok: boolean; latencyMs: number | null }> {
  try {
    const t0 = Date.now();
    await db.execute(sql`select 1`);
    return { ok: true, latencyMs: Date.now() - t0 };
  } catch {
    return { ok: false, latencyMs: null };
  }
}

/**
 * Liveness plus staleness of the ETA-risk cache. A cache older than
 * `maxAgeMinutes` (or never refreshed) makes the report not ok.
 */
export async function checkHealth(opts: { etaRiskMaxAgeMinutes: number }): Promise<Health> {
  const startedAt = Date.now();
  const dbProbe = await probeDb();

  let riskOk: boolean | null = null;
  let refreshedAt: Date | null = null;
  let ageMinutes: number | null = null;
  if (dbProbe.ok) {
    refreshedAt = await getEtaRiskRefreshedAt();
    if (refreshedAt) {
      ageMinutes = Math.max(0, (Date.now() - refreshedAt.getTime()) / 60_000);
      riskOk = ageMinutes <= opts.etaRiskMaxAgeMinutes;
    } else {
      riskOk = false;
    }
  }

  return {
    ok: dbProbe.ok && riskOk !== false,
    service: SERVICE,
    time: {
      server: new Date().toISOString(),
      uptimeSec: Math.floor(process.uptime()),
      tz: Intl.DateTimeFormat().resolvedOptions().timeZone || 'UTC',
    },
    db: dbProbe,
    etaRiskCache: {
      ok: riskOk,
      refreshedAt: refreshedAt ? refreshedAt.toISOString() : null,
      ageMinutes: ageMinutes === null ? null : Math.round(ageMinutes * 10) / 10,
      maxAgeMinutes: opts.etaRiskMaxAgeMinutes,
    },
    version: {
      commit: process.env.GIT_COMMIT ?? null,
      env: process.env.NODE_ENV ?? 'development',
    },
    durationMs: Date.now() - startedAt,
  };
}
