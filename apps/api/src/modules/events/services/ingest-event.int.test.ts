import { count, eq, sql } from 'drizzle-orm';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  customsClearanceTable,
  db,
  exceptionsTable,
  shipmentsTable,
  trackingEventsTable,
} from '@tracklane/db';
import type { TrackingEventInput } from '@tracklane/types';
import { at, type Network, seedNetwork, seedShipment } from '../../../../test/fixtures/builders.js';
import { resetDatabase } from '../../../../test/fixtures/test-db.js';
import {
  DuplicateEventError,
  EventImmutableError,
  ReferenceViolationError,
} from '../../../lib/errors.js';
import { withPgErrors } from '../../../lib/pg-errors.js';
import { openException } from '../../exceptions/services.js';
import { addLeg } from '../../shipments/services/legs.js';
import type { ShipmentRow } from '../../shipments/services/get-shipment.js';
import { ingestTrackingEvent, ingestTrackingEvents } from './ingest-event.js';
import type { ReactionPolicy } from './reactions.js';

vi.mock('@tracklane/db', async (importOriginal) => {
  const { createTestDb } = await import('../../../../test/fixtures/test-db.js');
  return { ...(await importOriginal<typeof import('@tracklane/db')>()), db: await createTestDb() };
});

async function eventCount(): Promise<number> {
  const rows = await db.select({ n: count() }).from(trackingEventsTable);
  return rows[0]?.n ?? 0;
}

async function reload(id: string) {
  const rows = await db.select().from(shipmentsTable).where(eq(shipmentsTable.id, id));
  return rows[0];
}

let net: Network;
let shipment: ShipmentRow;

beforeEach(async () => {
  await resetDatabase(db);
  net = await seedNetwork();
  shipment = await seedShipment(net, 'ACME-1001');
});

describe('ingestTrackingEvent: deduplication', () => {
  it('stores an event once and answers a replay with the stored row', async () => {
    const input: TrackingEventInput = {
      shipmentId: shipment.id,
      occurredAt: at(1),
      event: 'DEPARTED_PORT',
      locationCode: 'CNSHA',
    };

    const first = await ingestTrackingEvent(input);
    const second = await ingestTrackingEvent({ ...input, details: { source: 'replay' } });

    expect(first.outcome).toBe('recorded');
    expect(second.outcome).toBe('duplicate');
    expect(second.event.id).toBe(first.event.id);
    expect(second.event.details).toBeNull();
    expect(await eventCount()).toBe(1);
  });

  it('raises DuplicateEventError when the caller asks for it', async () => {
    const input: TrackingEventInput = {
      shipmentId: shipment.id,
      occurredAt: at(1),
      event: 'BOOKED',
    };
    const first = await ingestTrackingEvent(input);

    const err = await ingestTrackingEvent(input, { onDuplicate: 'error' }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(DuplicateEventError);
    expect(err).toMatchObject({
      code: 'ERR_DUPLICATE_EVENT',
      statusCode: 409,
      existingEventId: first.event.id,
    });
    expect(await eventCount()).toBe(1);
  });

  it('keeps different kinds at the same instant apart', async () => {
    await ingestTrackingEvent({ shipmentId: shipment.id, occurredAt: at(5), event: 'ARRIVED_PORT' });
    await ingestTrackingEvent({ shipmentId: shipment.id, occurredAt: at(5), event: 'DISCHARGED' });

    expect(await eventCount()).toBe(2);
  });

  it('addresses the shipment by reference number', async () => {
    const res = await ingestTrackingEvent({
      shipmentRef: 'ACME-1001',
      occurredAt: at(0),
      event: 'BOOKED',
    });

    expect(res.event.shipmentId).toBe(shipment.id);
  });
});

describe('ingestTrackingEvent: references', () => {
  it('rejects an unknown shipment and stores nothing', async () => {
    const err = await ingestTrackingEvent({
      shipmentRef: 'NOPE-0001',
      occurredAt: at(0),
      event: 'BOOKED',
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ReferenceViolationError);
    expect(err).toMatchObject({ entity: 'shipment', message: 'Unknown shipment: NOPE-0001' });
    expect(await eventCount()).toBe(0);
  });

  it('rejects an unknown location code', async () => {
    const err = await ingestTrackingEvent({
      shipmentId: shipment.id,
      occurredAt: at(0),
      event: 'GATE_IN',
      locationCode: 'USXXX',
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ReferenceViolationError);
    expect(err).toMatchObject({ entity: 'location', statusCode: 422 });
    expect(await eventCount()).toBe(0);
  });

  it('rejects a leg that belongs to another shipment', async () => {
    const other = await seedShipment(net, 'ACME-1002');
    const leg = await addLeg(other.id, {
      sequenceNo: 1,
      mode: 'OCEAN',
      originId: net.sha.id,
      destinationId: net.lax.id,
    });

    const err = await ingestTrackingEvent({
      shipmentId: shipment.id,
      occurredAt: at(1),
      event: 'DEPARTED_PORT',
      legId: leg.id,
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ReferenceViolationError);
    expect(err).toMatchObject({ message: `Leg ${leg.id} belongs to another shipment` });
    expect(await eventCount()).toBe(0);
  });

  it('maps a foreign-key failure to ReferenceViolationError', async () => {
    const err = await ingestTrackingEvent({
      shipmentId: shipment.id,
      occurredAt: at(1),
      event: 'GATE_OUT',
      containerId: '00000000-0000-4000-8000-000000000001',
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ReferenceViolationError);
    expect(err).toMatchObject({ code: 'ERR_REFERENCE', entity: null });
    expect(await eventCount()).toBe(0);
  });
});

describe('tracking_events is append-only', () => {
  it('rejects UPDATE and DELETE of a stored event', async () => {
    const { event } = await ingestTrackingEvent({
      shipmentId: shipment.id,
      occurredAt: at(0),
      event: 'BOOKED',
    });

    const update = await withPgErrors(async () =>
      db.execute(sql`UPDATE tracking_events SET details = '{}'::jsonb WHERE id = ${event.id}`)
    ).catch((e: unknown) => e);
    const del = await withPgErrors(async () =>
      db.delete(trackingEventsTable).where(eq(trackingEventsTable.id, event.id))
    ).catch((e: unknown) => e);

    expect(update).toBeInstanceOf(EventImmutableError);
    expect(update).toMatchObject({ message: 'tracking_events is append-only: UPDATE rejected' });
    expect(del).toBeInstanceOf(EventImmutableError);
    expect(del).toMatchObject({ message: 'tracking_events is append-only: DELETE rejected' });
    expect(await eventCount()).toBe(1);
  });
});

describe('ingestTrackingEvent: derived shipment state', () => {
  it('walks the status forward and tracks the current location', async () => {
    await ingestTrackingEvent({ shipmentId: shipment.id, occurredAt: at(0), event: 'BOOKED' });
    const departed = await ingestTrackingEvent({
      shipmentId: shipment.id,
      occurredAt: at(1),
      event: 'DEPARTED_PORT',
      locationCode: 'CNSHA',
    });
    const arrived = await ingestTrackingEvent({
      shipmentId: shipment.id,
      occurredAt: at(300),
      event: 'ARRIVED_PORT',
      locationCode: 'USLAX',
    });

    expect(departed.outcome === 'recorded' && departed.decision).toEqual({
      kind: 'applied',
      from: 'BOOKED',
      to: 'IN_TRANSIT',
      reason: 'forward',
    });
    expect(arrived.shipment.status).toBe('AT_PORT');
    expect(arrived.shipment.currentLocationId).toBe(net.lax.id);
    expect(arrived.shipment.etdOrigin).toEqual(at(1));
  });

  it('stores a late event without moving status or location back', async () => {
    await ingestTrackingEvent({
      shipmentId: shipment.id,
      occurredAt: at(300),
      event: 'ARRIVED_PORT',
      locationCode: 'USLAX',
    });
    const late = await ingestTrackingEvent({
      shipmentId: shipment.id,
      occurredAt: at(1),
      event: 'DEPARTED_PORT',
      locationCode: 'CNSHA',
    });

    expect(late.outcome).toBe('recorded');
    if (late.outcome !== 'recorded') return;
    expect(late.decision).toMatchObject({ kind: 'ignored', reason: 'stale_event' });
    expect(late.locationUpdated).toBe(false);

    const row = await reload(shipment.id);
    expect(row?.status).toBe('AT_PORT');
    expect(row?.currentLocationId).toBe(net.lax.id);
    expect(await eventCount()).toBe(2);
  });

  it('never leaves DELIVERED', async () => {
    await ingestTrackingEvent({ shipmentId: shipment.id, occurredAt: at(400), event: 'DELIVERED' });
    const after = await ingestTrackingEvent({
      shipmentId: shipment.id,
      occurredAt: at(401),
      event: 'EXCEPTION_NOTE',
      statusHint: 'EXCEPTION',
      details: { summary: 'Pallet damaged at unloading' },
    });

    expect(after.outcome === 'recorded' && after.decision).toMatchObject({
      kind: 'ignored',
      reason: 'terminal',
    });
    expect(after.shipment.status).toBe('DELIVERED');
  });
});

describe('ingestTrackingEvent: reactions', () => {
  it('opens and releases a customs hold together with its events', async () => {
    await ingestTrackingEvent({
      shipmentId: shipment.id,
      occurredAt: at(300),
      event: 'ARRIVED_PORT',
      locationCode: 'USLAX',
    });
    const hold = await ingestTrackingEvent({
      shipmentId: shipment.id,
      occurredAt: at(306),
      event: 'CUSTOMS_HOLD',
      locationCode: 'USLAX',
      details: { reason: 'document review' },
    });

    expect(hold.shipment.status).toBe('CUSTOMS_HOLD');
    const held = await db.select().from(customsClearanceTable);
    expect(held).toHaveLength(1);
    expect(held[0]).toMatchObject({ status: 'HOLD', portId: net.lax.id, notes: 'document review' });
    const opened = await db.select().from(exceptionsTable);
    expect(opened).toHaveLength(1);
    expect(opened[0]).toMatchObject({
      category: 'CUSTOMS',
      severity: 'MEDIUM',
      summary: 'Customs hold: document review',
      closedAt: null,
    });

    const release = await ingestTrackingEvent({
      shipmentId: shipment.id,
      occurredAt: at(330),
      event: 'CUSTOMS_RELEASE',
      locationCode: 'USLAX',
    });

    expect(release.shipment.status).toBe('CUSTOMS_CLEARED');
    const released = await db.select().from(customsClearanceTable);
    expect(released).toHaveLength(1);
    expect(released[0]).toMatchObject({ id: held[0]?.id, status: 'RELEASED', updatedAt: at(330) });
    const closed = await db.select().from(exceptionsTable);
    expect(closed[0]?.closedAt).toEqual(at(330));
  });

  it('releases a hold recorded without a port when the release names one', async () => {
    await ingestTrackingEvent({
      shipmentId: shipment.id,
      occurredAt: at(306),
      event: 'CUSTOMS_HOLD',
    });
    const [held] = await db.select().from(customsClearanceTable);
    expect(held).toMatchObject({ status: 'HOLD', portId: null });

    await ingestTrackingEvent({
      shipmentId: shipment.id,
      occurredAt: at(330),
      event: 'CUSTOMS_RELEASE',
      locationCode: 'USLAX',
    });

    const clearances = await db.select().from(customsClearanceTable);
    expect(clearances).toHaveLength(1);
    expect(clearances[0]).toMatchObject({ id: held?.id, status: 'RELEASED', updatedAt: at(330) });
    const [exception] = await db.select().from(exceptionsTable);
    expect(exception?.closedAt).toEqual(at(330));
  });

  it('prefers a hold at the release port over a newer portless hold', async () => {
    await ingestTrackingEvent({
      shipmentId: shipment.id,
      occurredAt: at(306),
      event: 'CUSTOMS_HOLD',
      locationCode: 'USLAX',
    });
    await ingestTrackingEvent({
      shipmentId: shipment.id,
      occurredAt: at(310),
      event: 'CUSTOMS_HOLD',
    });

    await ingestTrackingEvent({
      shipmentId: shipment.id,
      occurredAt: at(330),
      event: 'CUSTOMS_RELEASE',
      locationCode: 'USLAX',
    });

    const clearances = await db.select().from(customsClearanceTable);
    expect(clearances).toHaveLength(2);
    expect(clearances.find((c) => c.portId === net.lax.id)?.status).toBe('RELEASED');
    expect(clearances.find((c) => c.portId === null)?.status).toBe('HOLD');
  });

  it('does not repeat side effects for a replayed event', async () => {
    const input: TrackingEventInput = {
      shipmentId: shipment.id,
      occurredAt: at(306),
      event: 'CUSTOMS_HOLD',
      locationCode: 'USLAX',
    };
    await ingestTrackingEvent(input);
    await ingestTrackingEvent(input);

    expect(await db.select().from(customsClearanceTable)).toHaveLength(1);
    expect(await db.select().from(exceptionsTable)).toHaveLength(1);
  });

  it('opens a delay exception with the reported severity', async () => {
    await ingestTrackingEvent({
      shipmentId: shipment.id,
      occurredAt: at(100),
      event: 'DELAY',
      details: { reason: 'port congestion', severity: 'high' },
    });

    const rows = await db.select().from(exceptionsTable);
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({
      category: 'DELAY',
      severity: 'HIGH',
      summary: 'Delay: port congestion',
      openedAt: at(100),
    });
  });

  it('rolls the event back when a reaction fails', async () => {
    const failing: ReactionPolicy = {
      DELAY: [
        async (tx, { shipment: s }) => {
          await openException(s.id, { severity: 'LOW', category: 'DELAY', summary: 'partial' }, tx);
          throw new Error('downstream unavailable');
        },
      ],
    };

    await expect(
      ingestTrackingEvent(
        { shipmentId: shipment.id, occurredAt: at(100), event: 'DELAY' },
        { reactions: failing }
      )
    ).rejects.toThrow('downstream unavailable');

    expect(await eventCount()).toBe(0);
    expect(await db.select().from(exceptionsTable)).toHaveLength(0);
  });
});

describe('ingestTrackingEvents', () => {
  it('keeps going past a rejected item', async () => {
    const out = await ingestTrackingEvents([
      { shipmentId: shipment.id, occurredAt: at(0), event: 'BOOKED' },
      { shipmentRef: 'NOPE-0001', occurredAt: at(0), event: 'BOOKED' },
      { shipmentId: shipment.id, occurredAt: at(0), event: 'BOOKED' },
    ]);

    expect(out.map((o) => o.ok)).toEqual([true, false, true]);
    const replay = out[2];
    expect(replay?.ok === true ? replay.outcome.outcome : null).toBe('duplicate');
    expect(await eventCount()).toBe(1);
  });
});
