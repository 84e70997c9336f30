import type { Command } from './runtime.js';
import { dbSchema, dbSeed } from './commands/db.js';
import { riskRefresh } from './commands/eta-risk.js';
import { keysIssue } from './commands/keys.js';

export const commands: Record<string, Command> = {
  'db:schema': dbSchema,
  'db:seed': dbSeed,
  'keys:issue': keysIssue,
  'risk:refresh': riskRefresh,
};
