import { describe, expect, it } from 'vitest';
import { classifyEtaRisk } from './classify-eta-risk.js';

const d = (iso: string) => new Date(iso);

describe('classifyEtaRisk', () => {
  it('is UNKNOWN without a leg ETA', () => {
    expect(classifyEtaRisk(null, d('2025-03-10T00:00:00Z'))).toBe('UNKNOWN');
    expect(classifyEtaRisk(null, null)).toBe('UNKNOWN');
  });

  it('is AT_RISK when the leg arrives after the final ETA', () => {
    expect(classifyEtaRisk(d('2025-03-10T00:00:01Z'), d('2025-03-10T00:00:00Z'))).toBe('AT_RISK');
  });

  it('is ON_TRACK on or before the final ETA', () => {
    expect(classifyEtaRisk(d('2025-03-10T00:00:00Z'), d('2025-03-10T00:00:00Z'))).toBe('ON_TRACK');
    expect(classifyEtaRisk(d('2025-03-09T00:00:00Z'), d('2025-03-10T00:00:00Z'))).toBe('ON_TRACK');
  });

  it('is ON_TRACK when there is no final ETA to miss', () => {
    expect(classifyEtaRisk(d('2025-03-09T00:00:00Z'), null)).toBe('ON_TRACK');
  });
});
