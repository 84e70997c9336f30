import { beforeEach, describe, expect, it, vi } from 'vitest';
import { digest, parsePresentedToken } from '../../../plugins/api-key-auth.js';
import { issueApiKey } from './issue-api-key.js';

type InsertedKey = {
  keyId: string;
  prefix: string;
  name: string;
  tokenHash: string;
  salt: string;
  scopes: string[];
  expiresAt: Date | null;
};

const { state } = vi.hoisted(() => ({
  state: {
    inserted: [] as InsertedKey[],
  },
}));

vi.mock('@tracklane/db', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@tracklane/db')>();
  return {
    ...actual,
    db: {
      insert: vi.fn(() => ({
        values: vi.fn((vals: InsertedKey) => {
          state.inserted.push(vals);
          return {
            returning: vi.fn(async () => [
              { id: 'row-1', createdAt: new Date('2025-02-03T00:00:00.000Z') },
            ]),
          };
        }),
      })),
    },
  };
});

describe('issueApiKey', () => {
  beforeEach(() => {
    state.inserted = [];
  });

  it('returns a parseable token and stores only its salted digest', async () => {
    const res = await issueApiKey({
      name: 'carrier feed',
      scopes: ['tracking:write'],
      prefix: 'test',
      pepper: 'test-pepper',
    });

    const parsed = parsePresentedToken(`Bearer ${res.token}`);
    const row = state.inserted[0];

    expect(res).toMatchObject({ id: 'row-1', prefix: 'test', name: 'carrier feed' });
    expect(parsed).toMatchObject({ prefix: 'test', keyId: res.keyId });
    expect(row).toMatchObject({ keyId: res.keyId, scopes: ['tracking:write'], expiresAt: null });
    const expected = digest(parsed?.secret ?? '', row?.salt ?? '', 'test-pepper').toString('hex');
    expect(row?.tokenHash).toBe(expected);
  });

  it('defaults to the live prefix', async () => {
    const res = await issueApiKey({
      name: 'portal',
      scopes: ['tracking:read'],
      pepper: 'test-pepper',
    });

    expect(res.token.startsWith('tl_live_')).toBe(true);
    expect(state.inserted[0]?.prefix).toBe('live');
  });
});
