/**
 * Error taxonomy for the check-in core.
 *
 * Each error carries a stable machine-readable code and the HTTP status the
 * API layer answers with. Scan outcomes such as "duplicate" or "invalid" are
 * values, not errors, and never appear here.
 */

export type CheckInErrorCode =
  | 'DUPLICATE_REGISTRATION'
  | 'NOT_FOUND'
  | 'ALREADY_CHECKED_IN'
  | 'INVALID_STATE'
  | 'EVENT_FULL'
  | 'INVALID_FORMAT'
  | 'STORAGE_UNAVAILABLE'
  | 'VALIDATION_FAILED'
  | 'FORBIDDEN'
  | 'PAYLOAD_TOO_LARGE'
  | 'CONFIG_INVALID';

export class CheckInError extends Error {
  readonly code: CheckInErrorCode;
  readonly status: number;
  readonly details?: Record<string, unknown>;

  constructor(code: CheckInErrorCode, message: string, status: number, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
    this.details = details;
  }
}

export class DuplicateRegistrationError extends CheckInError {
  constructor(subjectId: string, eventId: string) {
    super('DUPLICATE_REGISTRATION', `Subject ${subjectId} is already registered for event ${eventId}`, 409, {
      subjectId,
      eventId,
    });
  }
}

export class NotFoundError extends CheckInError {
  constructor(what: string, id: string) {
    super('NOT_FOUND', `${what} ${id} not found`, 404, { id });
  }
}

export class AlreadyCheckedInError extends CheckInError {
  constructor(registrationId: string, checkedInAt?: number) {
    super('ALREADY_CHECKED_IN', `Registration ${registrationId} is already checked in`, 409, {
      registrationId,
      checkedInAt: checkedInAt ?? null,
    });
  }
}

export class InvalidStateError extends CheckInError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_STATE', message, 409, details);
  }
}

export class EventFullError extends CheckInError {
  constructor(eventId: string, capacity: number) {
    super('EVENT_FULL', `Event ${eventId} is full (capacity ${capacity})`, 409, { eventId, capacity });
  }
}

export class InvalidFormatError extends CheckInError {
  constructor(message: string) {
    super('INVALID_FORMAT', message, 400);
  }
}

export class StorageUnavailableError extends CheckInError {
  constructor(message: string, cause?: unknown) {
    super('STORAGE_UNAVAILABLE', message, 503);
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class ValidationError extends CheckInError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION_FAILED', message, 400, details);
  }
}

export class ForbiddenError extends CheckInError {
  constructor(message: string) {
    super('FORBIDDEN', message, 403);
  }
}

export class PayloadTooLargeError extends CheckInError {
  constructor(message: string) {
    super('PAYLOAD_TOO_LARGE', message, 413);
  }
}

export class ConfigError extends CheckInError {
  constructor(problems: string[]) {
    super('CONFIG_INVALID', `Invalid configuration: ${problems.join('; ')}`, 500, { problems });
  }
}

export function isCheckInError(err: unknown): err is CheckInError {
  return err instanceof CheckInError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
