import { beforeEach, describe, expect, it, vi } from 'vitest';
import { db } from '@tracklane/db';
import { resetDatabase } from '../../../../test/fixtures/test-db.js';
import { listOpenExceptions } from '../../../modules/exceptions/services.js';
import { findShipmentByRef } from '../../../modules/shipments/services/get-shipment.js';
import { listEtaRisk, refreshEtaRisk } from '../../../modules/tracking/services/eta-risk.js';
import { loadDemoSeed, seedDemoData } from './seed.js';

vi.mock('@tracklane/db', async (importOriginal) => {
  const { createTestDb } = await import('../../../../test/fixtures/test-db.js');
  return { ...(await importOriginal<typeof import('@tracklane/db')>()), db: await createTestDb() };
});

const NOW = new Date('2025-06-15T12:00:00.000Z');

beforeEach(async () => {
  await resetDatabase(db);
});

describe('seedDemoData', () => {
  it('loads every shipment and replays its events through ingestion', async () => {
    const summary = await seedDemoData(loadDemoSeed(), NOW);

    expect(summary).toEqual({ shipmentsCreated: 3, shipmentsSkipped: 0, events: 9 });
    expect((await findShipmentByRef('RETAIL-1001'))?.status).toBe('IN_TRANSIT');
    expect((await findShipmentByRef('ELEC-2001'))?.status).toBe('CUSTOMS_HOLD');
    expect((await findShipmentByRef('APPAREL-3001'))?.status).toBe('DELIVERED');
  });

  it('is safe to run twice', async () => {
    const data = loadDemoSeed();
    await seedDemoData(data, NOW);

    const again = await seedDemoData(data, NOW);

    expect(again).toEqual({ shipmentsCreated: 0, shipmentsSkipped: 3, events: 0 });
  });

  it('produces one at-risk shipment with an open customs exception', async () => {
    await seedDemoData(loadDemoSeed(), NOW);
    await refreshEtaRisk();

    const { items } = await listEtaRisk({ status: 'AT_RISK' });
    const elec = await findShipmentByRef('ELEC-2001');
    const open = await listOpenExceptions(elec?.id);

    expect(items.map((r) => r.referenceNo)).toEqual(['ELEC-2001']);
    expect(open).toHaveLength(1);
    expect(open[0]?.category).toBe('CUSTOMS');
  });
});
