import { boolean, index, pgTable, text, timestamp, uniqueIndex, uuid } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { createTimestampColumn, defaultTimestampOptions } from '../utils.js';

export const apiKeysTable = pgTable(
  'api_keys',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    keyId: text('key_id').notNull(),
    prefix: text('prefix').notNull().default('live'),
    name: text('name').notNull(),
    // hex sha256 of salt|secret|pepper
    tokenHash: text('token_hash').notNull(),
    salt: text('salt').notNull(),
    scopes: text('scopes')
      .array()
      .notNull()
      .default(sql`'{}'::text[]`),
    isActive: boolean('is_active').notNull().default(true),
    expiresAt: timestamp('expires_at', defaultTimestampOptions),
    revokedAt: timestamp('revoked_at', defaultTimestampOptions),
    createdAt: createTimestampColumn('created_at'),
    lastUsedAt: createTimestampColumn('last_used_at', { nullable: true, defaultNow: false }),
  },
  (t) => [
    uniqueIndex('ux_api_keys_keyid').on(t.keyId),
    index('idx_api_keys_active').on(t.isActive),
  ]
);
