export type ErrorEnvelope = {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
};

const STATUS_CODE_MAP: Record<number, string> = {
  400: 'ERR_BAD_REQUEST',
  401: 'ERR_UNAUTHORIZED',
  403: 'ERR_FORBIDDEN',
  404: 'ERR_NOT_FOUND',
  409: 'ERR_CONFLICT',
  422: 'ERR_UNPROCESSABLE',
  429: 'ERR_RATE_LIMITED',
  500: 'ERR_INTERNAL',
  503: 'ERR_UNAVAILABLE',
};

export function errorResponse(
  message: string,
  code = 'ERR_REQUEST',
  details?: unknown
): ErrorEnvelope {
  return { error: { code, message, ...(details === undefined ? {} : { details }) } };
}

export function errorResponseForStatus(
  status: number,
  message: string,
  details?: unknown
): ErrorEnvelope {
  const code = STATUS_CODE_MAP[status] ?? 'ERR_REQUEST';
  return errorResponse(message, code, details);
}

// ───────────────────────────────────────────────────────────────────────────────
// Domain errors
// ───────────────────────────────────────────────────────────────────────────────

export class TrackingError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details?: unknown;

  constructor(
    message: string,
    opts: { statusCode: number; code: string; details?: unknown; cause?: unknown }
  ) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = new.target.name;
    this.statusCode = opts.statusCode;
    this.code = opts.code;
    this.details = opts.details;
  }
}

export type ReferenceEntity =
  | 'shipment'
  | 'leg'
  | 'container'
  | 'vessel'
  | 'location'
  | 'carrier'
  | 'customer'
  | 'customs_clearance'
  | 'exception';

/** A write pointed at a catalog or aggregate row that does not exist. */
export class ReferenceViolationError extends TrackingError {
  readonly entity: ReferenceEntity | null;

  constructor(entity: ReferenceEntity | null, key: string | null, message?: string, cause?: unknown) {
    super(message ?? (entity ? `Unknown ${entity}: ${key ?? '?'}` : 'Referenced row does not exist'), {
      statusCode: 422,
      code: 'ERR_REFERENCE',
      details: entity ? { entity, key } : undefined,
      cause,
    });
    this.entity = entity;
  }
}

/** Same (shipment, occurred_at, event) already stored; raised only when the caller opts in. */
export class DuplicateEventError extends TrackingError {
  readonly existingEventId: string;

  constructor(existingEventId: string, key: { shipmentId: string; occurredAt: Date; event: string }) {
    super(
      `Event ${key.event} at ${key.occurredAt.toISOString()} is already recorded for shipment ${key.shipmentId}`,
      { statusCode: 409, code: 'ERR_DUPLICATE_EVENT', details: { existingEventId } }
    );
    this.existingEventId = existingEventId;
  }
}

export class InvalidEnumValueError extends TrackingError {
  constructor(message: string, details?: unknown, cause?: unknown) {
    super(message, { statusCode: 400, code: 'ERR_INVALID_ENUM_VALUE', details, cause });
  }
}

/** A unique business key is taken, or a one-way transition was already made. */
export class ConflictError extends TrackingError {
  constructor(message: string, details?: unknown, cause?: unknown) {
    super(message, { statusCode: 409, code: 'ERR_CONFLICT', details, cause });
  }
}

export class NotFoundError extends TrackingError {
  constructor(entity: ReferenceEntity, key: string) {
    super(`${entity} not found: ${key}`, {
      statusCode: 404,
      code: 'ERR_NOT_FOUND',
      details: { entity, key },
    });
  }
}

export class ConstraintViolationError extends TrackingError {
  constructor(message: string, details?: unknown, cause?: unknown) {
    super(message, { statusCode: 400, code: 'ERR_VALIDATION', details, cause });
  }
}

export class EventImmutableError extends TrackingError {
  constructor(message: string, cause?: unknown) {
    super(message, { statusCode: 409, code: 'ERR_EVENT_IMMUTABLE', cause });
  }
}
