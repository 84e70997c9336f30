import type { Command } from '../runtime.js';
import { issueApiKey } from '../../../modules/api-keys/services/issue-api-key.js';
import { API_SCOPES, type ApiScope } from '../../../plugins/api-key-auth.js';
import { flagStr, parseFlags, positionals, splitCSV } from '../utils.js';

function isScope(s: string): s is ApiScope {
  return API_SCOPES.some((scope) => scope === s);
}

/** keys:issue <name> <scope,scope> [--prefix=test] [--expires=ISO] */
export const keysIssue: Command = async (args) => {
  const [name, scopesArg] = positionals(args);
  if (!name || !scopesArg) {
    throw new Error('Usage: keys:issue <name> <scope,scope> [--prefix=test] [--expires=ISO]');
  }

  const requested = splitCSV(scopesArg);
  const unknown = requested.filter((s) => !isScope(s));
  if (unknown.length) {
    throw new Error(`Unknown scope(s): ${unknown.join(', ')}. Known: ${API_SCOPES.join(', ')}`);
  }

  const flags = parseFlags(args);
  const expires = flagStr(flags, 'expires');
  const expiresAt = expires ? new Date(expires) : undefined;
  if (expiresAt && Number.isNaN(expiresAt.getTime())) {
    throw new Error(`Invalid --expires: ${expires}`);
  }

  const key = await issueApiKey({
    name,
    scopes: requested.filter(isScope),
    prefix: flagStr(flags, 'prefix') === 'test' ? 'test' : 'live',
    expiresAt,
  });

  // The token is shown once; only its digest is stored.
  console.log({ id: key.id, keyId: key.keyId, scopes: key.scopes, token: key.token });
};
