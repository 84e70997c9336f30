import {
  EXCEPTION_SEVERITIES,
  type EventKind,
  type ExceptionSeverity,
  type Executor,
  shipmentsTable,
  trackingEventsTable,
} from '@tracklane/db';
import { createCustomsClearance, releaseCustomsHold } from '../../customs/services.js';
import { closeOpenExceptions, openException } from '../../exceptions/services.js';

export type StoredEvent = typeof trackingEventsTable.$inferSelect;
export type ShipmentRow = typeof shipmentsTable.$inferSelect;

export type ReactionContext = {
  event: StoredEvent;
  shipment: ShipmentRow;
};

/** Runs inside the ingestion transaction; a throw rolls back the event too. */
export type EventReaction = (tx: Executor, ctx: ReactionContext) => Promise<void>;

export type ReactionPolicy = Partial<Record<EventKind, readonly EventReaction[]>>;

function detailString(details: StoredEvent['details'], key: string): string | null {
  const value = details?.[key];
  return typeof value === 'string' && value.trim() ? value.trim() : null;
}

function detailSeverity(details: StoredEvent['details'], fallback: ExceptionSeverity): ExceptionSeverity {
  const raw = detailString(details, 'severity')?.toUpperCase();
  return EXCEPTION_SEVERITIES.find((s) => s === raw) ?? fallback;
}

function reasonOf(event: StoredEvent): string | null {
  return detailString(event.details, 'reason') ?? detailString(event.details, 'note');
}

export const openCustomsHold: EventReaction = async (tx, { event, shipment }) => {
  const reason = reasonOf(event);
  await createCustomsClearance(
    shipment.id,
    { portId: event.locationId, status: 'HOLD', notes: reason, updatedAt: event.occurredAt },
    tx
  );
  await openException(
    shipment.id,
    {
      severity: 'MEDIUM',
      category: 'CUSTOMS',
      summary: reason ? `Customs hold: ${reason}` : 'Customs hold',
      openedAt: event.occurredAt,
      details: { eventId: event.id, ...(event.details ?? {}) },
    },
    tx
  );
};

export const releaseCustomsHoldReaction: EventReaction = async (tx, { event, shipment }) => {
  await releaseCustomsHold(tx, shipment.id, event.locationId, event.occurredAt, reasonOf(event));
  await closeOpenExceptions(tx, shipment.id, 'CUSTOMS', event.occurredAt);
};

export const openDelayException: EventReaction = async (tx, { event, shipment }) => {
  const reason = reasonOf(event);
  await openException(
    shipment.id,
    {
      severity: detailSeverity(event.details, 'MEDIUM'),
      category: 'DELAY',
      summary: reason ? `Delay: ${reason}` : 'Delay reported',
      openedAt: event.occurredAt,
      details: { eventId: event.id, ...(event.details ?? {}) },
    },
    tx
  );
};

export const openNotedException: EventReaction = async (tx, { event, shipment }) => {
  const category = detailString(event.details, 'category')?.toUpperCase() ?? 'OTHER';
  await openException(
    shipment.id,
    {
      severity: detailSeverity(event.details, 'LOW'),
      category,
      summary: reasonOf(event) ?? detailString(event.details, 'summary') ?? 'Exception noted',
      openedAt: event.occurredAt,
      details: { eventId: event.id, ...(event.details ?? {}) },
    },
    tx
  );
};

export const defaultReactions: ReactionPolicy = {
  CUSTOMS_HOLD: [openCustomsHold],
  CUSTOMS_RELEASE: [releaseCustomsHoldReaction],
  DELAY: [openDelayException],
  EXCEPTION_NOTE: [openNotedException],
};

export async function runReactions(
  tx: Executor,
  policy: ReactionPolicy,
  ctx: ReactionContext
): Promise<number> {
  const reactions = policy[ctx.event.event] ?? [];
  for (const reaction of reactions) {
    await reaction(tx, ctx);
  }
  return reactions.length;
}
