export type BookingErrorKind =
  | 'ValidationError'
  | 'OfferUnavailable'
  | 'InvalidStateTransition'
  | 'ConcurrencyConflict'
  | 'StorageError'
  | 'ProjectionFailure'
  | 'ProviderError'
  | 'UnknownEventType'
  | 'InvalidEventSequence'
  | 'NotFound';

export type ErrorDetails = Record<string, unknown>;

/**
 * Base of every failure the booking core reports on purpose. `kind` is the
 * stable tag callers switch on; `retryable` tells them whether re-submitting
 * the same command against fresh state can succeed.
 */
export abstract class BookingError extends Error {
  abstract readonly kind: BookingErrorKind;
  abstract readonly retryable: boolean;

  constructor(
    message: string,
    readonly details: ErrorDetails = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class CommandValidationError extends BookingError {
  readonly kind = 'ValidationError' as const;
  readonly retryable = false;

  constructor(
    message: string,
    readonly violations: string[] = []
  ) {
    super(message, { violations });
  }
}

export class OfferUnavailableError extends BookingError {
  readonly kind = 'OfferUnavailable' as const;
  readonly retryable = false;
}

export class InvalidStateTransitionError extends BookingError {
  readonly kind = 'InvalidStateTransition' as const;
  readonly retryable = false;
}

export class ConcurrencyConflictError extends BookingError {
  readonly kind = 'ConcurrencyConflict' as const;
  readonly retryable = true;

  constructor(
    readonly aggregateId: string,
    readonly expectedVersion: number,
    readonly actualVersion: number
  ) {
    super(
      `aggregate ${aggregateId} is at version ${actualVersion}, expected ${expectedVersion}`,
      { aggregateId, expectedVersion, actualVersion }
    );
  }
}

/** Another attempt of the same command was appended first, possibly to another stream. */
export class DuplicateCommandError extends BookingError {
  readonly kind = 'ConcurrencyConflict' as const;
  readonly retryable = true;

  constructor(
    readonly commandId: string,
    readonly recordedAggregateId: string
  ) {
    super(`command ${commandId} was already appended to ${recordedAggregateId}`, {
      commandId,
      aggregateId: recordedAggregateId
    });
  }
}

export class StorageError extends BookingError {
  readonly kind = 'StorageError' as const;
  readonly retryable = true;
}

/** The event is durable but the read model row could not be brought up to date. */
export class ProjectionFailureError extends BookingError {
  readonly kind = 'ProjectionFailure' as const;
  readonly retryable = false;

  constructor(
    readonly eventId: string,
    readonly aggregateId: string,
    cause: unknown
  ) {
    super(
      `event ${eventId} is stored but projection of ${aggregateId} failed: ${describeError(cause)}`,
      { eventId, aggregateId },
      { cause }
    );
  }
}

export class ProviderError extends BookingError {
  readonly kind = 'ProviderError' as const;
  readonly retryable = true;
}

export class UnknownEventTypeError extends BookingError {
  readonly kind = 'UnknownEventType' as const;
  readonly retryable = false;

  constructor(
    readonly eventType: string,
    readonly eventId: string
  ) {
    super(`unknown event type ${eventType} (event ${eventId})`, { eventType, eventId });
  }
}

export class InvalidEventSequenceError extends BookingError {
  readonly kind = 'InvalidEventSequence' as const;
  readonly retryable = false;
}

export class NotFoundError extends BookingError {
  readonly kind = 'NotFound' as const;
  readonly retryable = false;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
