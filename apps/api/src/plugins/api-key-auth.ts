import type {
  FastifyInstance,
  FastifyPluginAsync,
  FastifyReply,
  FastifyRequest,
  preHandlerHookHandler,
} from 'fastify';
import fp from 'fastify-plugin';
import { apiKeysTable, db } from '@tracklane/db';
import { and, eq } from 'drizzle-orm';
import { createHash, randomBytes, timingSafeEqual } from 'node:crypto';

// Token format:  tl_<prefix>_<keyId>.<secret>
const TOKEN_RE = /^tl_([a-z0-9-]+)_([A-Za-z0-9_-]{6,32})\.([A-Za-z0-9_-]{16,})$/i;

export const API_SCOPES = ['tracking:read', 'tracking:write', 'tasks:eta-risk', 'admin:all'] as const;
export type ApiScope = (typeof API_SCOPES)[number];

export function digest(secret: string, salt: string, pepper: string) {
  const joined = Buffer.from(`${salt}|${secret}|${pepper}`, 'utf8');
  return createHash('sha256').update(joined).digest();
}

export function generateApiKey(prefix: 'live' | 'test' = 'live') {
  const keyId = randomBytes(8).toString('base64url'); // public id
  const secret = randomBytes(24).toString('base64url'); // secret chunk
  const token = `tl_${prefix}_${keyId}.${secret}`;
  const salt = randomBytes(16).toString('base64url');
  return { token, keyId, secret, salt, prefix };
}

type ParsedToken = {
  prefix: string;
  keyId: string;
  secret: string;
};

export function parsePresentedToken(hdr?: string | string[] | null): ParsedToken | null {
  const raw = Array.isArray(hdr) ? hdr[0] : hdr;
  if (!raw) return null;
  const v = raw.startsWith('Bearer ') ? raw.slice(7).trim() : raw.trim();
  const m = TOKEN_RE.exec(v);
  if (!m) return null;
  const prefix = m[1] ?? '';
  const keyId = m[2] ?? '';
  const secret = m[3] ?? '';

  if (!prefix || !keyId || !secret) return null;

  return { prefix, keyId, secret };
}

declare module 'fastify' {
  interface FastifyRequest {
    apiKey?: { id: string; name: string; scopes: string[]; keyId: string; prefix: string };
  }
  interface FastifyInstance {
    requireApiKey: (requiredScopes?: ApiScope[], opts?: RequireApiKeyOptions) => preHandlerHookHandler;
  }
}

type RequireApiKeyOptions = {
  optional?: boolean;
};

export const apiKeyAuthPlugin: FastifyPluginAsync<{ pepper?: string }> = fp(
  async (app: FastifyInstance, opts: { pepper?: string }) => {
    const PEPPER = opts.pepper ?? process.env.API_KEY_PEPPER ?? '';

    app.decorate(
      'requireApiKey',
      (requiredScopes: ApiScope[] = [], opts: RequireApiKeyOptions = {}) => {
        return async (req: FastifyRequest, reply: FastifyReply) => {
          const presented = parsePresentedToken(req.headers.authorization ?? req.headers['x-api-key']);

          if (!presented) {
            if (opts.optional) return;
            return reply.unauthorized('Missing or malformed API key');
          }

          const rows = await db
            .select()
            .from(apiKeysTable)
            .where(and(eq(apiKeysTable.keyId, presented.keyId), eq(apiKeysTable.isActive, true)))
            .limit(1);

          const row = rows[0];
          if (!row || row.prefix !== presented.prefix) {
            return reply.unauthorized('Invalid API key');
          }
          if (row.expiresAt && row.expiresAt < new Date()) {
            return reply.unauthorized('API key expired');
          }
          if (row.revokedAt) {
            return reply.unauthorized('API key revoked');
          }

          const expectedDigest = digest(presented.secret, row.salt, PEPPER);
          const stored = Buffer.from(row.tokenHash, 'hex');
          if (stored.length !== expectedDigest.length || !timingSafeEqual(expectedDigest, stored)) {
            return reply.unauthorized('Invalid API key');
          }

          const scopes = row.scopes;
          if (requiredScopes.length) {
            const ok = requiredScopes.every(
              (s) => scopes.includes(s) || scopes.includes('admin:all')
            );
            if (!ok) return reply.forbidden('Missing required scope(s)');
          }

          req.apiKey = {
            id: row.id,
            name: row.name,
            scopes,
            keyId: row.keyId,
            prefix: row.prefix,
          };

          void db
            .update(apiKeysTable)
            .set({ lastUsedAt: new Date() })
            .where(eq(apiKeysTable.id, row.id))
            .catch((err: unknown) => req.log.warn({ err }, 'api_key_touch_failed'));
        };
      }
    );
  },
  { name: 'api-key-auth' }
);
