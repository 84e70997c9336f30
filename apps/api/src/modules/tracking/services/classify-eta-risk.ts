import type { EtaRisk } from '@tracklane/db';

/** Same rule as mv_eta_risk: no leg ETA is UNKNOWN, a leg ETA past the final ETA is AT_RISK. */
export function classifyEtaRisk(legEta: Date | null, etaFinal: Date | null): EtaRisk {
  if (legEta === null) return 'UNKNOWN';
  if (etaFinal !== null && legEta.getTime() > etaFinal.getTime()) return 'AT_RISK';
  return 'ON_TRACK';
}
