import {
  BookingAction,
  BookingView,
  assertCanTransition
} from '../../domain/aggregates/booking';
import { ConcurrencyConflictError, InvalidStateTransitionError } from '../../domain/errors';
import { recordStaleCommand } from '../../infrastructure/metrics/prom';
import type { BookingReadModelStore } from '../../infrastructure/projections/booking-read-model';

interface ChangeTarget {
  bookingId: string;
  expectedVersion?: number;
}

/**
 * Resolves the row a change command targets and checks it against what the
 * caller believed: the version they last saw, then the status rules.
 */
export function loadBookingForChange(
  store: BookingReadModelStore,
  target: ChangeTarget,
  action: BookingAction
): BookingView {
  const booking = store.getById(target.bookingId);
  if (!booking) {
    throw new InvalidStateTransitionError(
      `cannot ${action} booking ${target.bookingId}: no such booking`,
      { bookingId: target.bookingId, action }
    );
  }

  if (target.expectedVersion !== undefined && target.expectedVersion !== booking.lastVersion) {
    recordStaleCommand();
    throw new ConcurrencyConflictError(booking.aggregateId, target.expectedVersion, booking.lastVersion);
  }

  assertCanTransition(booking, action);
  return booking;
}
