import { apiKeysTable, db } from '@tracklane/db';
import { type ApiScope, digest, generateApiKey } from '../../../plugins/api-key-auth.js';

/** Creates a key and returns the plaintext token once; only its salted digest is stored. */
export async function issueApiKey({
  name,
  scopes,
  prefix = 'live',
  expiresAt,
  pepper = process.env.API_KEY_PEPPER ?? '',
}: {
  name: string;
  scopes: ApiScope[];
  prefix?: 'live' | 'test';
  expiresAt?: Date;
  pepper?: string;
}) {
  const { token, keyId, secret, salt, prefix: pfx } = generateApiKey(prefix);

  const rows = await db
    .insert(apiKeysTable)
    .values({
      keyId,
      prefix: pfx,
      name,
      tokenHash: digest(secret, salt, pepper).toString('hex'),
      salt,
      scopes,
      isActive: true,
      expiresAt: expiresAt ?? null,
    })
    .returning({ id: apiKeysTable.id, createdAt: apiKeysTable.createdAt });

  const row = rows[0];
  if (!row) throw new Error('Failed to create API key');

  return {
    id: row.id,
    token,
    keyId,
    prefix: pfx,
    name,
    scopes,
    createdAt: row.createdAt,
  };
}
