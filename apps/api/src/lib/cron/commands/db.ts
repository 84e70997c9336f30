import { applySchema, db } from '@tracklane/db';
import type { Command } from '../runtime.js';
import { refreshEtaRisk } from '../../../modules/tracking/services/eta-risk.js';
import { flagStr, parseFlags } from '../utils.js';
import { loadDemoSeed, seedDemoData } from './seed.js';

export const dbSchema: Command = async () => {
  const statements = await applySchema(db);
  console.log({ ok: true, statements });
};

export const dbSeed: Command = async (args) => {
  const flags = parseFlags(args);
  const data = loadDemoSeed(flagStr(flags, 'file'));
  const summary = await seedDemoData(data);
  const risk = await refreshEtaRisk();
  console.log({ ok: true, ...summary, etaRiskRows: risk.rowCount });
};
