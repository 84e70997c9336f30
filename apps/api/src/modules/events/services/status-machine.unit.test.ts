import { describe, expect, it } from 'vitest';
import {
  decideStatus,
  effectiveHint,
  impliedStatus,
  STATUS_IMPLYING_EVENTS,
} from './status-machine.js';

const newest = { newest: true };

describe('decideStatus', () => {
  it('moves forward along the main line', () => {
    expect(decideStatus('CREATED', 'BOOKED', newest)).toEqual({
      kind: 'applied',
      from: 'CREATED',
      to: 'BOOKED',
      reason: 'forward',
    });
    expect(decideStatus('BOOKED', 'DELIVERED', newest)).toMatchObject({
      kind: 'applied',
      to: 'DELIVERED',
    });
  });

  it('ignores a missing or repeated hint', () => {
    expect(decideStatus('IN_TRANSIT', null, newest)).toMatchObject({
      kind: 'ignored',
      to: 'IN_TRANSIT',
      reason: 'no_hint',
    });
    expect(decideStatus('IN_TRANSIT', 'IN_TRANSIT', newest)).toMatchObject({
      reason: 'unchanged',
    });
  });

  it('never regresses on the main line', () => {
    expect(decideStatus('CUSTOMS_CLEARED', 'CUSTOMS_HOLD', newest)).toEqual({
      kind: 'ignored',
      from: 'CUSTOMS_CLEARED',
      to: 'CUSTOMS_CLEARED',
      reason: 'regression',
    });
    expect(decideStatus('AT_PORT', 'BOOKED', newest)).toMatchObject({ reason: 'regression' });
  });

  it('re-enters IN_TRANSIT when the next leg departs', () => {
    expect(decideStatus('AT_PORT', 'IN_TRANSIT', newest)).toMatchObject({
      kind: 'applied',
      reason: 'next_leg',
    });
    expect(decideStatus('CUSTOMS_CLEARED', 'IN_TRANSIT', newest)).toMatchObject({
      kind: 'applied',
      reason: 'next_leg',
    });
    expect(decideStatus('OUT_FOR_DELIVERY', 'IN_TRANSIT', newest)).toMatchObject({
      kind: 'ignored',
      reason: 'regression',
    });
  });

  it('treats DELIVERED and CANCELLED as terminal', () => {
    expect(decideStatus('DELIVERED', 'EXCEPTION', newest)).toMatchObject({ reason: 'terminal' });
    expect(decideStatus('CANCELLED', 'BOOKED', newest)).toMatchObject({ reason: 'terminal' });
  });

  it('reaches the side branches from any non-terminal status', () => {
    expect(decideStatus('AT_PORT', 'EXCEPTION', newest)).toMatchObject({
      kind: 'applied',
      reason: 'side_branch',
    });
    expect(decideStatus('EXCEPTION', 'CANCELLED', newest)).toMatchObject({
      kind: 'applied',
      to: 'CANCELLED',
    });
  });

  it('only leaves EXCEPTION for a terminal status', () => {
    expect(decideStatus('EXCEPTION', 'IN_TRANSIT', newest)).toMatchObject({
      kind: 'ignored',
      reason: 'exception_open',
    });
    expect(decideStatus('EXCEPTION', 'DELIVERED', newest)).toMatchObject({
      kind: 'applied',
      reason: 'forward',
    });
  });

  it('ignores hints from events older than the newest hinted event', () => {
    expect(decideStatus('BOOKED', 'IN_TRANSIT', { newest: false })).toMatchObject({
      kind: 'ignored',
      reason: 'stale_event',
    });
  });
});

describe('effectiveHint', () => {
  it('prefers the explicit hint over the implied one', () => {
    expect(effectiveHint('ARRIVED_PORT', 'CUSTOMS_HOLD')).toBe('CUSTOMS_HOLD');
    expect(effectiveHint('ARRIVED_PORT', null)).toBe('AT_PORT');
    expect(effectiveHint('ETA_UPDATE', undefined)).toBeNull();
  });

  it('maps event kinds to implied statuses', () => {
    expect(impliedStatus('DEPARTED_PORT')).toBe('IN_TRANSIT');
    expect(impliedStatus('CUSTOMS_RELEASE')).toBe('CUSTOMS_CLEARED');
    expect(impliedStatus('GATE_IN')).toBeNull();
    expect(STATUS_IMPLYING_EVENTS).toEqual([
      'BOOKED',
      'DEPARTED_PORT',
      'ARRIVED_PORT',
      'DISCHARGED',
      'CUSTOMS_HOLD',
      'CUSTOMS_RELEASE',
      'OUT_FOR_DELIVERY',
      'DELIVERED',
    ]);
  });
});
