import type { Command } from '../runtime.js';
import { refreshEtaRisk } from '../../../modules/tracking/services/eta-risk.js';

export const riskRefresh: Command = async () => {
  const result = await refreshEtaRisk();
  console.log({
    ok: true,
    refreshedAt: result.refreshedAt.toISOString(),
    rowCount: result.rowCount,
    durationMs: result.durationMs,
    concurrent: result.concurrent,
  });
};
