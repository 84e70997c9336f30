import { and, asc, count, eq, sql } from 'drizzle-orm';
import {
  db,
  derivedRefreshesTable,
  ETA_RISK_VIEW_NAME,
  etaRiskView,
  type Executor,
} from '@tracklane/db';
import type { EtaRiskList, EtaRiskListQuery, EtaRiskRefreshResult } from '@tracklane/types';
import { etaRiskLastRefresh, startRefreshTimer } from '../../../lib/metrics.js';

async function isPopulated(exec: Executor): Promise<boolean> {
  const res = await exec.execute<{ ispopulated: boolean }>(
    sql`SELECT ispopulated FROM pg_matviews WHERE matviewname = ${ETA_RISK_VIEW_NAME}`
  );
  return res.rows[0]?.ispopulated ?? false;
}

/**
 * Recomputes mv_eta_risk without blocking readers or event writers.
 * CONCURRENTLY needs a populated view, so the first refresh of an
 * unpopulated one is a plain REFRESH. `refreshedAt` is taken before the
 * REFRESH runs: the snapshot reflects the tables as of its start.
 */
export async function refreshEtaRisk(
  exec: Executor = db,
  now: () => Date = () => new Date()
): Promise<EtaRiskRefreshResult> {
  const concurrent = await isPopulated(exec);
  const refreshedAt = now();
  const started = Date.now();
  const stop = startRefreshTimer(concurrent ? 'concurrent' : 'blocking');

  if (concurrent) {
    await exec.execute(sql.raw(`REFRESH MATERIALIZED VIEW CONCURRENTLY ${ETA_RISK_VIEW_NAME}`));
  } else {
    await exec.execute(sql.raw(`REFRESH MATERIALIZED VIEW ${ETA_RISK_VIEW_NAME}`));
  }

  const [counted] = await exec.select({ n: count() }).from(etaRiskView);
  const rowCount = counted?.n ?? 0;
  const durationMs = Date.now() - started;
  stop();

  await exec
    .insert(derivedRefreshesTable)
    .values({ viewName: ETA_RISK_VIEW_NAME, refreshedAt, rowCount, durationMs })
    .onConflictDoUpdate({
      target: derivedRefreshesTable.viewName,
      set: { refreshedAt, rowCount, durationMs },
    });

  etaRiskLastRefresh.set(Math.floor(refreshedAt.getTime() / 1000));
  return { refreshedAt, rowCount, durationMs, concurrent };
}

/** When mv_eta_risk was last refreshed; null if never since the schema was applied. */
export async function getEtaRiskRefreshedAt(exec: Executor = db): Promise<Date | null> {
  const rows = await exec
    .select({ refreshedAt: derivedRefreshesTable.refreshedAt })
    .from(derivedRefreshesTable)
    .where(eq(derivedRefreshesTable.viewName, ETA_RISK_VIEW_NAME))
    .limit(1);
  return rows[0]?.refreshedAt ?? null;
}

/**
 * Reads the materialized classification. Rows reflect legs and shipments as
 * of `refreshedAt`, not as of now.
 */
export async function listEtaRisk(q: EtaRiskListQuery = {}): Promise<EtaRiskList> {
  const where = and(
    ...(q.status ? [eq(etaRiskView.etaStatus, q.status)] : []),
    ...(q.customerId ? [eq(etaRiskView.customerId, q.customerId)] : [])
  );

  const [items, refreshedAt] = await Promise.all([
    db
      .select()
      .from(etaRiskView)
      .where(where)
      .orderBy(sql`${etaRiskView.eta} ASC NULLS LAST`, asc(etaRiskView.referenceNo))
      .limit(q.limit ?? 100),
    getEtaRiskRefreshedAt(),
  ]);

  return { refreshedAt, items };
}
