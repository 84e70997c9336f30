import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { getEtaRiskRefreshedAt } from '../tracking/services/eta-risk.js';
import { checkHealth } from './services.js';

const { state } = vi.hoisted(() => ({
  state: {
    dbDown: false,
    refreshedAt: null as Date | null,
  },
}));

vi.mock('@tracklane/db', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@tracklane/db')>();
  return {
    ...actual,
    db: {
      execute: vi.fn(async () => {
        if (state.dbDown) throw new Error('connect ECONNREFUSED');
        return { rows: [{ '?column?': 1 }] };
      }),
    },
  };
});

vi.mock('../tracking/services/eta-risk.js', () => ({
  getEtaRiskRefreshedAt: vi.fn(async () => state.refreshedAt),
}));

describe('checkHealth', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-02-04T12:00:00.000Z'));
    state.dbDown = false;
    state.refreshedAt = null;
    vi.mocked(getEtaRiskRefreshedAt).mockClear();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('is ok when the risk view was refreshed within the window', async () => {
    state.refreshedAt = new Date('2026-02-04T11:45:00.000Z');

    const report = await checkHealth({ etaRiskMaxAgeMinutes: 60 });

    expect(report.ok).toBe(true);
    expect(report.service).toBe('tracklane-api');
    expect(report.db.ok).toBe(true);
    expect(report.etaRiskCache).toEqual({
      ok: true,
      refreshedAt: '2026-02-04T11:45:00.000Z',
      ageMinutes: 15,
      maxAgeMinutes: 60,
    });
  });

  it('flags a stale risk view', async () => {
    state.refreshedAt = new Date('2026-02-04T10:30:00.000Z');

    const report = await checkHealth({ etaRiskMaxAgeMinutes: 60 });

    expect(report.ok).toBe(false);
    expect(report.etaRiskCache).toMatchObject({ ok: false, ageMinutes: 90 });
  });

  it('treats a never-refreshed view as stale', async () => {
    const report = await checkHealth({ etaRiskMaxAgeMinutes: 60 });

    expect(report.ok).toBe(false);
    expect(report.etaRiskCache).toEqual({
      ok: false,
      refreshedAt: null,
      ageMinutes: null,
      maxAgeMinutes: 60,
    });
  });

  it('skips the cache check when the database is unreachable', async () => {
    state.dbDown = true;

    const report = await checkHealth({ etaRiskMaxAgeMinutes: 60 });

    expect(report.ok).toBe(false);
    expect(report.db).toEqual({ ok: false, latencyMs: null });
    expect(report.etaRiskCache.ok).toBeNull();
    expect(getEtaRiskRefreshedAt).not.toHaveBeenCalled();
  });
});
