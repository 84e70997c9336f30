import { EVENT_KIND_VALUES, type EventKind, type ShipmentStatus } from '@tracklane/db';

/**
 * Shipment status is an explicit state machine fed by tracking events.
 *
 * The main line only moves forward. CANCELLED and EXCEPTION are side
 * branches reachable from any non-terminal status; DELIVERED and CANCELLED
 * are terminal. A multi-leg shipment re-enters IN_TRANSIT from AT_PORT or
 * CUSTOMS_CLEARED when the next leg departs.
 */
export const FORWARD_ORDER = [
  'CREATED',
  'BOOKED',
  'IN_TRANSIT',
  'AT_PORT',
  'CUSTOMS_HOLD',
  'CUSTOMS_CLEARED',
  'OUT_FOR_DELIVERY',
  'DELIVERED',
] as const satisfies readonly ShipmentStatus[];

const TERMINAL: ReadonlySet<ShipmentStatus> = new Set<ShipmentStatus>(['DELIVERED', 'CANCELLED']);
const SIDE_BRANCHES: ReadonlySet<ShipmentStatus> = new Set<ShipmentStatus>(['CANCELLED', 'EXCEPTION']);

const NEXT_LEG_REENTRY: Partial<Record<ShipmentStatus, readonly ShipmentStatus[]>> = {
  AT_PORT: ['IN_TRANSIT'],
  CUSTOMS_CLEARED: ['IN_TRANSIT'],
};

/** Status an event kind implies when the feed sends no explicit hint. */
const IMPLIED_BY_EVENT: Partial<Record<EventKind, ShipmentStatus>> = {
  BOOKED: 'BOOKED',
  DEPARTED_PORT: 'IN_TRANSIT',
  ARRIVED_PORT: 'AT_PORT',
  DISCHARGED: 'AT_PORT',
  CUSTOMS_HOLD: 'CUSTOMS_HOLD',
  CUSTOMS_RELEASE: 'CUSTOMS_CLEARED',
  OUT_FOR_DELIVERY: 'OUT_FOR_DELIVERY',
  DELIVERED: 'DELIVERED',
};

export const STATUS_IMPLYING_EVENTS: EventKind[] = EVENT_KIND_VALUES.filter(
  (kind) => IMPLIED_BY_EVENT[kind] !== undefined
);

export type AppliedReason = 'forward' | 'side_branch' | 'next_leg';
export type IgnoredReason =
  | 'no_hint'
  | 'unchanged'
  | 'terminal'
  | 'stale_event'
  | 'exception_open'
  | 'regression';

export type StatusDecision =
  | { kind: 'applied'; from: ShipmentStatus; to: ShipmentStatus; reason: AppliedReason }
  | { kind: 'ignored'; from: ShipmentStatus; to: ShipmentStatus; reason: IgnoredReason };

export function impliedStatus(event: EventKind): ShipmentStatus | null {
  return IMPLIED_BY_EVENT[event] ?? null;
}

/** Explicit hint wins; otherwise the kind's implied status (may be null). */
export function effectiveHint(
  event: EventKind,
  statusHint: ShipmentStatus | null | undefined
): ShipmentStatus | null {
  return statusHint ?? impliedStatus(event);
}

export function isTerminal(status: ShipmentStatus): boolean {
  return TERMINAL.has(status);
}

function rankOf(status: ShipmentStatus): number {
  return FORWARD_ORDER.findIndex((s) => s === status);
}

function ignored(from: ShipmentStatus, reason: IgnoredReason): StatusDecision {
  return { kind: 'ignored', from, to: from, reason };
}

function applied(from: ShipmentStatus, to: ShipmentStatus, reason: AppliedReason): StatusDecision {
  return { kind: 'applied', from, to, reason };
}

/**
 * @param opts.newest false when an already-stored event with a status hint is
 *   newer than this one (out-of-order delivery); such events never move status.
 */
export function decideStatus(
  current: ShipmentStatus,
  hint: ShipmentStatus | null,
  opts: { newest: boolean }
): StatusDecision {
  if (hint === null) return ignored(current, 'no_hint');
  if (hint === current) return ignored(current, 'unchanged');
  if (TERMINAL.has(current)) return ignored(current, 'terminal');
  if (!opts.newest) return ignored(current, 'stale_event');

  if (SIDE_BRANCHES.has(hint)) return applied(current, hint, 'side_branch');

  if (current === 'EXCEPTION') {
    return hint === 'DELIVERED'
      ? applied(current, hint, 'forward')
      : ignored(current, 'exception_open');
  }

  if (rankOf(hint) > rankOf(current)) return applied(current, hint, 'forward');
  if (NEXT_LEG_REENTRY[current]?.includes(hint)) return applied(current, hint, 'next_leg');

  return ignored(current, 'regression');
}
