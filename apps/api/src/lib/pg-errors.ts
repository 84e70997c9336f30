import {
  ConflictError,
  ConstraintViolationError,
  EventImmutableError,
  InvalidEnumValueError,
  ReferenceViolationError,
  TrackingError,
} from './errors.js';

type PgErrorFields = {
  code: string;
  message: string;
  detail?: string;
  constraint?: string;
  table?: string;
};

function readString(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Finds the Postgres error in a chain. Drizzle wraps driver errors
 * (DrizzleQueryError) with the original under `cause`; node-postgres and
 * PGlite both expose `code`, `detail` and `constraint`.
 */
export function findPgError(err: unknown): PgErrorFields | null {
  let current: unknown = err;
  for (let depth = 0; depth < 5 && current instanceof Object; depth++) {
    const code = readString(current, 'code');
    if (code && /^[0-9A-Z]{5}$/.test(code)) {
      return {
        code,
        message: readString(current, 'message') ?? '',
        detail: readString(current, 'detail'),
        constraint: readString(current, 'constraint'),
        table: readString(current, 'table'),
      };
    }
    current = Reflect.get(current, 'cause');
  }
  return null;
}

/** Maps constraint/enum failures to domain errors; anything else comes back unchanged. */
export function toTrackingError(err: unknown): unknown {
  if (err instanceof TrackingError) return err;
  const pg = findPgError(err);
  if (!pg) return err;

  const details = { constraint: pg.constraint ?? null, detail: pg.detail ?? null };
  switch (pg.code) {
    case '23503':
      return new ReferenceViolationError(null, null, pg.detail ?? 'Referenced row does not exist', err);
    case '23505':
      return new ConflictError(pg.detail ?? 'Duplicate key', details, err);
    case '22P02':
      if (/invalid input value for enum/i.test(pg.message)) {
        return new InvalidEnumValueError(pg.message, details, err);
      }
      return new ConstraintViolationError(pg.message, details, err);
    case '23514':
      return new ConstraintViolationError(`Check constraint failed: ${pg.constraint ?? 'unknown'}`, details, err);
    case 'TL001':
      return new EventImmutableError(pg.message, err);
    default:
      return err;
  }
}

export async function withPgErrors<T>(work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (err) {
    throw toTrackingError(err);
  }
}
