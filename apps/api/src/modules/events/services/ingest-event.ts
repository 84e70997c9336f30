import { and, desc, eq, inArray, isNotNull, ne, or, type SQL } from 'drizzle-orm';
import {
  db,
  type Executor,
  locationsTable,
  shipmentLegsTable,
  shipmentsTable,
  trackingEventsTable,
} from '@tracklane/db';
import type { DuplicatePolicy, TrackingEventInput } from '@tracklane/types';
import { DuplicateEventError, ReferenceViolationError } from '../../../lib/errors.js';
import { eventsIngested, statusDecisions } from '../../../lib/metrics.js';
import { toTrackingError } from '../../../lib/pg-errors.js';
import {
  defaultReactions,
  type ReactionPolicy,
  runReactions,
  type ShipmentRow,
  type StoredEvent,
} from './reactions.js';
import {
  decideStatus,
  effectiveHint,
  type StatusDecision,
  STATUS_IMPLYING_EVENTS,
} from './status-machine.js';

export type IngestOptions = {
  /** 'ignore' (default) answers a replay with the stored event; 'error' throws DuplicateEventError. */
  onDuplicate?: DuplicatePolicy;
  reactions?: ReactionPolicy;
};

export type IngestOutcome =
  | {
      outcome: 'recorded';
      event: StoredEvent;
      shipment: ShipmentRow;
      decision: StatusDecision;
      locationUpdated: boolean;
    }
  | { outcome: 'duplicate'; event: StoredEvent; shipment: ShipmentRow };

// ───────────────────────────────────────────────────────────────────────────────
// Reference resolution (all inside the ingestion transaction)
// ───────────────────────────────────────────────────────────────────────────────

async function lockShipment(tx: Executor, input: TrackingEventInput): Promise<ShipmentRow> {
  const where = input.shipmentId
    ? eq(shipmentsTable.id, input.shipmentId)
    : eq(shipmentsTable.referenceNo, input.shipmentRef ?? '');

  const rows = await tx.select().from(shipmentsTable).where(where).limit(1).for('update');
  const row = rows[0];
  if (!row) {
    throw new ReferenceViolationError('shipment', input.shipmentId ?? input.shipmentRef ?? null);
  }
  return row;
}

async function resolveLocationId(tx: Executor, input: TrackingEventInput): Promise<string | null> {
  if (!input.locationCode) return input.locationId ?? null;
  const rows = await tx
    .select({ id: locationsTable.id })
    .from(locationsTable)
    .where(eq(locationsTable.unlocode, input.locationCode))
    .limit(1);
  const row = rows[0];
  if (!row) throw new ReferenceViolationError('location', input.locationCode);
  return row.id;
}

async function assertLegOfShipment(tx: Executor, legId: string, shipmentId: string) {
  const rows = await tx
    .select({ shipmentId: shipmentLegsTable.shipmentId })
    .from(shipmentLegsTable)
    .where(eq(shipmentLegsTable.id, legId))
    .limit(1);
  const row = rows[0];
  if (!row) throw new ReferenceViolationError('leg', legId);
  if (row.shipmentId !== shipmentId) {
    throw new ReferenceViolationError('leg', legId, `Leg ${legId} belongs to another shipment`);
  }
}

async function findByDedupeKey(
  tx: Executor,
  shipmentId: string,
  occurredAt: Date,
  event: StoredEvent['event']
): Promise<StoredEvent | undefined> {
  const rows = await tx
    .select()
    .from(trackingEventsTable)
    .where(
      and(
        eq(trackingEventsTable.shipmentId, shipmentId),
        eq(trackingEventsTable.occurredAt, occurredAt),
        eq(trackingEventsTable.event, event)
      )
    )
    .limit(1);
  return rows[0];
}

// ───────────────────────────────────────────────────────────────────────────────
// Derived shipment state
// ───────────────────────────────────────────────────────────────────────────────

/** occurred_at of the newest other event matching `filter`, via the (shipment_id, occurred_at) index. */
async function newestOtherEventAt(
  tx: Executor,
  event: StoredEvent,
  filter: SQL | undefined
): Promise<Date | null> {
  const rows = await tx
    .select({ occurredAt: trackingEventsTable.occurredAt })
    .from(trackingEventsTable)
    .where(
      and(
        eq(trackingEventsTable.shipmentId, event.shipmentId),
        ne(trackingEventsTable.id, event.id),
        filter
      )
    )
    .orderBy(desc(trackingEventsTable.occurredAt))
    .limit(1);
  return rows[0]?.occurredAt ?? null;
}

async function deriveShipmentState(tx: Executor, shipment: ShipmentRow, event: StoredEvent) {
  const hint = effectiveHint(event.event, event.statusHint);

  let newest = true;
  if (hint) {
    const newestHinted = await newestOtherEventAt(
      tx,
      event,
      or(
        isNotNull(trackingEventsTable.statusHint),
        inArray(trackingEventsTable.event, STATUS_IMPLYING_EVENTS)
      )
    );
    newest = newestHinted === null || event.occurredAt >= newestHinted;
  }
  const decision = decideStatus(shipment.status, hint, { newest });

  let locationUpdated = false;
  if (event.locationId && event.locationId !== shipment.currentLocationId) {
    const newestLocated = await newestOtherEventAt(
      tx,
      event,
      isNotNull(trackingEventsTable.locationId)
    );
    locationUpdated = newestLocated === null || event.occurredAt >= newestLocated;
  }

  // First departure from the origin port records the actual departure time.
  const departedOrigin =
    event.event === 'DEPARTED_PORT' &&
    shipment.etdOrigin === null &&
    event.locationId !== null &&
    event.locationId === shipment.originId;

  if (decision.kind === 'ignored' && !locationUpdated && !departedOrigin) {
    return { shipment, decision, locationUpdated };
  }

  const rows = await tx
    .update(shipmentsTable)
    .set({
      ...(decision.kind === 'applied' ? { status: decision.to } : {}),
      ...(locationUpdated ? { currentLocationId: event.locationId } : {}),
      ...(departedOrigin ? { etdOrigin: event.occurredAt } : {}),
    })
    .where(eq(shipmentsTable.id, shipment.id))
    .returning();

  return { shipment: rows[0] ?? shipment, decision, locationUpdated };
}

// ───────────────────────────────────────────────────────────────────────────────
// Ingestion
// ───────────────────────────────────────────────────────────────────────────────

/**
 * Appends one tracking event and applies its consequences in a single
 * transaction: the shipment row is locked, the event inserted (deduplicated
 * on shipment, occurred_at, event), status and current location derived,
 * and the reaction policy run. Replays never re-run side effects.
 */
export async function ingestTrackingEvent(
  input: TrackingEventInput,
  opts: IngestOptions = {}
): Promise<IngestOutcome> {
  const onDuplicate = opts.onDuplicate ?? 'ignore';
  const reactions = opts.reactions ?? defaultReactions;

  let result: IngestOutcome;
  try {
    result = await db.transaction(async (tx): Promise<IngestOutcome> => {
      const shipment = await lockShipment(tx, input);
      const locationId = await resolveLocationId(tx, input);
      if (input.legId) await assertLegOfShipment(tx, input.legId, shipment.id);

      const inserted = await tx
        .insert(trackingEventsTable)
        .values({
          shipmentId: shipment.id,
          occurredAt: input.occurredAt,
          event: input.event,
          legId: input.legId ?? null,
          containerId: input.containerId ?? null,
          vesselId: input.vesselId ?? null,
          locationId,
          statusHint: input.statusHint ?? null,
          details: input.details ?? null,
        })
        .onConflictDoNothing({
          target: [
            trackingEventsTable.shipmentId,
            trackingEventsTable.occurredAt,
            trackingEventsTable.event,
          ],
        })
        .returning();

      const event = inserted[0];
      if (!event) {
        const existing = await findByDedupeKey(tx, shipment.id, input.occurredAt, input.event);
        if (!existing) throw new Error('Dedupe conflict reported but no stored event found');
        if (onDuplicate === 'error') {
          throw new DuplicateEventError(existing.id, {
            shipmentId: shipment.id,
            occurredAt: input.occurredAt,
            event: input.event,
          });
        }
        return { outcome: 'duplicate', event: existing, shipment };
      }

      const derived = await deriveShipmentState(tx, shipment, event);
      await runReactions(tx, reactions, { event, shipment: derived.shipment });

      return {
        outcome: 'recorded',
        event,
        shipment: derived.shipment,
        decision: derived.decision,
        locationUpdated: derived.locationUpdated,
      };
    });
  } catch (err) {
    const mapped = toTrackingError(err);
    eventsIngested.inc({
      event: input.event,
      outcome: mapped instanceof DuplicateEventError ? 'duplicate' : 'rejected',
    });
    throw mapped;
  }

  eventsIngested.inc({ event: input.event, outcome: result.outcome });
  if (result.outcome === 'recorded') {
    statusDecisions.inc({ decision: result.decision.kind, reason: result.decision.reason });
  }
  return result;
}

export type BulkItemOutcome =
  | { ok: true; index: number; outcome: IngestOutcome }
  | { ok: false; index: number; error: unknown };

/** Ingests in submission order, one transaction per event; a rejected item does not stop the batch. */
export async function ingestTrackingEvents(
  inputs: readonly TrackingEventInput[],
  opts: IngestOptions = {}
): Promise<BulkItemOutcome[]> {
  const out: BulkItemOutcome[] = [];
  for (const [index, input] of inputs.entries()) {
    try {
      out.push({ ok: true, index, outcome: await ingestTrackingEvent(input, opts) });
    } catch (error) {
      out.push({ ok: false, index, error });
    }
  }
  return out;
}
