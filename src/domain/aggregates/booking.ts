import type { DomainEvent, EventDraft } from '../events';
import { InvalidEventSequenceError, InvalidStateTransitionError } from '../errors';

export type BookingType = 'flight' | 'hotel' | 'package';

export type BookingStatus = 'confirmed' | 'cancelled';

export type BookingAction = 'amend' | 'cancel';

export interface BookingConfirmedPayload extends Record<string, unknown> {
  bookingId: string;
  bookingType: BookingType;
  offerId: string;
  origin: string | null;
  destination: string;
  departDate: string;
  returnDate: string | null;
  hotelName: string | null;
  passengers: number;
  price: number;
  currency: string;
  userId: string | null;
  paymentMethod: string;
}

export type BookingConfirmedEvent = DomainEvent<'BookingConfirmed', BookingConfirmedPayload>;

// Absent keys leave the field untouched; returnDate: null clears it.
export interface BookingAmendedPayload extends Record<string, unknown> {
  departDate?: string;
  returnDate?: string | null;
  passengers?: number;
  price?: number;
  reason: string | null;
}

export type BookingAmendedEvent = DomainEvent<'BookingAmended', BookingAmendedPayload>;

export interface BookingCancelledPayload extends Record<string, unknown> {
  reason: string | null;
}

export type BookingCancelledEvent = DomainEvent<'BookingCancelled', BookingCancelledPayload>;

export type BookingEvent = BookingConfirmedEvent | BookingAmendedEvent | BookingCancelledEvent;

export type BookingEventType = BookingEvent['type'];

export type BookingEventDraft =
  | EventDraft<'BookingConfirmed', BookingConfirmedPayload>
  | EventDraft<'BookingAmended', BookingAmendedPayload>
  | EventDraft<'BookingCancelled', BookingCancelledPayload>;

export const BOOKING_EVENT_TYPES: readonly BookingEventType[] = [
  'BookingConfirmed',
  'BookingAmended',
  'BookingCancelled'
];

export interface BookingView {
  bookingId: string;
  aggregateId: string;
  bookingType: BookingType;
  offerId: string;
  userId: string | null;
  origin: string | null;
  destination: string;
  departDate: string;
  returnDate: string | null;
  hotelName: string | null;
  passengers: number;
  price: number;
  currency: string;
  paymentMethod: string;
  status: BookingStatus;
  cancellationReason: string | null;
  createdAt: string;
  updatedAt: string;
  lastEventId: string;
  lastVersion: number;
}

const ALLOWED_ACTIONS: Record<BookingStatus, readonly BookingAction[]> = {
  confirmed: ['amend', 'cancel'],
  cancelled: []
};

export const isBookingEvent = (event: DomainEvent): event is BookingEvent =>
  BOOKING_EVENT_TYPES.some((type) => type === event.type);

export const assertCanTransition = (view: BookingView, action: BookingAction): void => {
  if (!ALLOWED_ACTIONS[view.status].includes(action)) {
    throw new InvalidStateTransitionError(
      `cannot ${action} booking ${view.bookingId} in status ${view.status}`,
      { bookingId: view.bookingId, status: view.status, action }
    );
  }
};

/**
 * Folds one event onto the current row. Versions must follow on from the
 * row without gaps; the projection engine filters out already-applied events
 * before calling this.
 */
export const applyBookingEvent = (
  current: BookingView | null,
  event: BookingEvent
): BookingView => {
  const expectedVersion = (current?.lastVersion ?? 0) + 1;
  if (event.metadata.version !== expectedVersion) {
    throw new InvalidEventSequenceError(
      `event ${event.metadata.eventId} has version ${event.metadata.version}, expected ${expectedVersion}`,
      { aggregateId: event.metadata.aggregateId, eventId: event.metadata.eventId }
    );
  }

  switch (event.type) {
    case 'BookingConfirmed': {
      if (current) {
        throw new InvalidEventSequenceError(
          `booking ${current.bookingId} is already confirmed`,
          { aggregateId: event.metadata.aggregateId, eventId: event.metadata.eventId }
        );
      }

      const payload = event.payload;
      return {
        bookingId: payload.bookingId,
        aggregateId: event.metadata.aggregateId,
        bookingType: payload.bookingType,
        offerId: payload.offerId,
        userId: payload.userId,
        origin: payload.origin,
        destination: payload.destination,
        departDate: payload.departDate,
        returnDate: payload.returnDate,
        hotelName: payload.hotelName,
        passengers: payload.passengers,
        price: payload.price,
        currency: payload.currency,
        paymentMethod: payload.paymentMethod,
        status: 'confirmed',
        cancellationReason: null,
        createdAt: event.metadata.ts,
        updatedAt: event.metadata.ts,
        lastEventId: event.metadata.eventId,
        lastVersion: event.metadata.version
      };
    }
    case 'BookingAmended': {
      const row = requireRow(current, event);
      const payload = event.payload;
      return {
        ...row,
        departDate: payload.departDate ?? row.departDate,
        returnDate: payload.returnDate === undefined ? row.returnDate : payload.returnDate,
        passengers: payload.passengers ?? row.passengers,
        price: payload.price ?? row.price,
        updatedAt: event.metadata.ts,
        lastEventId: event.metadata.eventId,
        lastVersion: event.metadata.version
      };
    }
    case 'BookingCancelled': {
      const row = requireRow(current, event);
      return {
        ...row,
        status: 'cancelled',
        cancellationReason: event.payload.reason,
        updatedAt: event.metadata.ts,
        lastEventId: event.metadata.eventId,
        lastVersion: event.metadata.version
      };
    }
    default:
      return assertExhaustive(event);
  }
};

export const foldBookingEvents = (events: readonly BookingEvent[]): BookingView | null =>
  events.reduce<BookingView | null>((row, event) => applyBookingEvent(row, event), null);

function requireRow(current: BookingView | null, event: BookingEvent): BookingView {
  if (!current) {
    throw new InvalidEventSequenceError(
      `${event.type} ${event.metadata.eventId} has no booking to apply to`,
      { aggregateId: event.metadata.aggregateId, eventId: event.metadata.eventId }
    );
  }

  return current;
}

function assertExhaustive(event: never): never {
  throw new Error(`unhandled booking event: ${JSON.stringify(event)}`);
}
