import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('@tracklane/db', () => ({
  closeDatabase: vi.fn(async () => {}),
}));

import { closeDatabase } from '@tracklane/db';
import { withDatabase } from './runtime.js';

describe('withDatabase', () => {
  beforeEach(() => {
    vi.mocked(closeDatabase).mockClear();
  });

  it('returns the command result and closes the pool', async () => {
    const out = await withDatabase(async () => 42);

    expect(out).toBe(42);
    expect(closeDatabase).toHaveBeenCalledTimes(1);
  });

  it('closes the pool when the command throws', async () => {
    await expect(
      withDatabase(async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(closeDatabase).toHaveBeenCalledTimes(1);
  });
});
