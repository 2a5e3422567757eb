import { Injectable, Logger } from '@nestjs/common';
import {
  BookingEvent,
  BookingView,
  applyBookingEvent,
  foldBookingEvents,
  isBookingEvent
} from '../../domain/aggregates/booking';
import {
  BookingError,
  BookingErrorKind,
  NotFoundError,
  UnknownEventTypeError
} from '../../domain/errors';
import type { StoredEvent } from '../../domain/events';
import { SqliteEventLog } from '../eventstore/sqlite-event-log';
import { BookingReadModelStore } from './booking-read-model';

export interface RebuildFailure {
  aggregateId: string;
  kind: BookingErrorKind;
  message: string;
}

export interface RebuildReport {
  rebuilt: string[];
  failed: RebuildFailure[];
}

export const toBookingEvent = (event: StoredEvent): BookingEvent => {
  if (!isBookingEvent(event)) {
    throw new UnknownEventTypeError(event.type, event.metadata.eventId);
  }

  return event;
};

@Injectable()
export class BookingProjectionEngine {
  private readonly logger = new Logger(BookingProjectionEngine.name);

  constructor(
    private readonly eventLog: SqliteEventLog,
    private readonly store: BookingReadModelStore
  ) {}

  /**
   * Folds one stored event into its booking row. An event at or below the
   * row's lastVersion has already been applied and leaves the row as it is.
   */
  apply(event: StoredEvent): BookingView {
    const bookingEvent = toBookingEvent(event);
    const current = this.store.getByAggregateId(event.metadata.aggregateId);
    if (current && event.metadata.version <= current.lastVersion) {
      return current;
    }

    const next = applyBookingEvent(current, bookingEvent);
    this.store.save(next);
    return next;
  }

  /**
   * Replaces the aggregate's row with a fold of its whole stream. When the
   * fold fails the existing row is left untouched.
   */
  async rebuild(aggregateId: string): Promise<BookingView> {
    const events = await this.eventLog.read(aggregateId);
    const view = foldBookingEvents(events.map(toBookingEvent));
    if (!view) {
      throw new NotFoundError(`no events recorded for aggregate ${aggregateId}`, { aggregateId });
    }

    this.store.replace(aggregateId, view);
    this.logger.log(`Rebuilt ${aggregateId} at version ${view.lastVersion}`);
    return view;
  }

  async rebuildAll(): Promise<RebuildReport> {
    const aggregateIds = new Set<string>();
    for await (const event of this.eventLog.stream(0)) {
      aggregateIds.add(event.metadata.aggregateId);
    }

    const report: RebuildReport = { rebuilt: [], failed: [] };
    for (const aggregateId of aggregateIds) {
      try {
        await this.rebuild(aggregateId);
        report.rebuilt.push(aggregateId);
      } catch (error: unknown) {
        if (!(error instanceof BookingError)) {
          throw error;
        }

        this.logger.error(`Rebuild of ${aggregateId} halted: ${error.message}`);
        report.failed.push({ aggregateId, kind: error.kind, message: error.message });
      }
    }

    return report;
  }
}
