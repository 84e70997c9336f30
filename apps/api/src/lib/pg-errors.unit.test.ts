import { describe, expect, it } from 'vitest';
import {
  ConflictError,
  ConstraintViolationError,
  InvalidEnumValueError,
  ReferenceViolationError,
} from './errors.js';
import { findPgError, toTrackingError, withPgErrors } from './pg-errors.js';

function pgError(fields: Record<string, string>) {
  return Object.assign(new Error(fields.message ?? 'db error'), fields);
}

describe('findPgError', () => {
  it('walks the cause chain to the driver error', () => {
    const driver = pgError({ code: '23505', constraint: 'ux_locations_unlocode' });
    const wrapped = new Error('Failed query: insert into "locations"', { cause: driver });

    expect(findPgError(wrapped)).toMatchObject({
      code: '23505',
      constraint: 'ux_locations_unlocode',
    });
  });

  it('ignores non-SQLSTATE codes such as node system errors', () => {
    expect(findPgError(pgError({ code: 'ECONNREFUSED' }))).toBeNull();
  });
});

describe('toTrackingError', () => {
  it('maps foreign key violations to reference errors', () => {
    const mapped = toTrackingError(
      pgError({
        code: '23503',
        detail: 'Key (location_id)=(00000000-0000-0000-0000-000000000000) is not present in table "locations".',
      })
    );
    expect(mapped).toBeInstanceOf(ReferenceViolationError);
    expect(mapped).toMatchObject({ statusCode: 422, code: 'ERR_REFERENCE' });
  });

  it('maps unique violations to conflicts', () => {
    expect(toTrackingError(pgError({ code: '23505', detail: 'Key (scac)=(MAEU) already exists.' }))).toBeInstanceOf(
      ConflictError
    );
  });

  it('maps enum cast failures to invalid enum errors', () => {
    const mapped = toTrackingError(
      pgError({ code: '22P02', message: 'invalid input value for enum event_type: "TELEPORTED"' })
    );
    expect(mapped).toBeInstanceOf(InvalidEnumValueError);
    expect(mapped).toMatchObject({ statusCode: 400, code: 'ERR_INVALID_ENUM_VALUE' });
  });

  it('maps other 22P02 failures and check constraints to validation errors', () => {
    expect(toTrackingError(pgError({ code: '22P02', message: 'invalid input syntax for type uuid' }))).toBeInstanceOf(
      ConstraintViolationError
    );
    expect(toTrackingError(pgError({ code: '23514', constraint: 'ck_containers_no' }))).toMatchObject({
      message: 'Check constraint failed: ck_containers_no',
    });
  });

  it('rejects writes to the append-only event table', () => {
    expect(
      toTrackingError(pgError({ code: 'TL001', message: 'tracking_events is append-only: UPDATE rejected' }))
    ).toMatchObject({ code: 'ERR_EVENT_IMMUTABLE', statusCode: 409 });
  });

  it('returns unrelated errors untouched', () => {
    const plain = new Error('boom');
    expect(toTrackingError(plain)).toBe(plain);
  });
});

describe('withPgErrors', () => {
  it('rethrows mapped errors', async () => {
    await expect(
      withPgErrors(async () => {
        throw pgError({ code: '23505' });
      })
    ).rejects.toBeInstanceOf(ConflictError);
  });
});
