import { Injectable, Logger } from '@nestjs/common';
import type {
  BookingEventDraft,
  BookingEventType,
  BookingView
} from '../../domain/aggregates/booking';
import {
  CommandValidationError,
  ConcurrencyConflictError,
  DuplicateCommandError,
  ProjectionFailureError
} from '../../domain/errors';
import type { StoredEvent } from '../../domain/events';
import { SqliteEventLog } from '../../infrastructure/eventstore/sqlite-event-log';
import {
  recordAppendConflict,
  recordAppended,
  recordProjectionFailure
} from '../../infrastructure/metrics/prom';
import { BookingReadModelStore } from '../../infrastructure/projections/booking-read-model';
import { BookingProjectionEngine } from '../../infrastructure/projections/projection-engine';

interface CommandResultBase {
  bookingId: string;
  aggregateId: string;
  eventId: string;
  version: number;
  // true when the command had already been applied and nothing new was appended
  duplicate: boolean;
}

export interface CommittedResult extends CommandResultBase {
  outcome: 'committed';
  booking: BookingView;
}

/** The event is durable; the row stays behind until a retry or rebuild. */
export interface ProjectionFailedResult extends CommandResultBase {
  outcome: 'projection-failed';
  error: ProjectionFailureError;
}

export type CommandResult = CommittedResult | ProjectionFailedResult;

/** What a re-submission must match for its command id to count as the same command. */
export interface CommandIdentity {
  commandId: string | null;
  eventType: BookingEventType;
  // unset for creates, whose booking id is minted per attempt
  bookingId?: string;
}

export interface CommitRequest {
  aggregateId: string;
  bookingId: string;
  expectedVersion: number;
  drafts: readonly BookingEventDraft[];
  command: CommandIdentity;
}

/**
 * Steps shared by every booking command once its events are drafted: append
 * at the expected version, then fold the new events into the read model
 * before returning.
 */
@Injectable()
export class BookingCommitter {
  private readonly logger = new Logger(BookingCommitter.name);

  constructor(
    private readonly eventLog: SqliteEventLog,
    private readonly engine: BookingProjectionEngine,
    private readonly store: BookingReadModelStore
  ) {}

  async commit(request: CommitRequest): Promise<CommandResult> {
    let appended: StoredEvent[];
    try {
      appended = await this.eventLog.append(request.aggregateId, request.expectedVersion, request.drafts, {
        commandId: request.command.commandId
      });
    } catch (error: unknown) {
      if (error instanceof ConcurrencyConflictError || error instanceof DuplicateCommandError) {
        recordAppendConflict();
        const prior = await this.findPrior(request.command);
        if (prior) {
          this.logger.log(`Command ${request.command.commandId} already applied to ${prior.aggregateId}`);
          return prior;
        }

        this.logger.warn(`Append conflict on ${request.aggregateId}: ${error.message}`);
      }
      throw error;
    }

    for (const event of appended) {
      recordAppended(event.type);
    }
    this.logger.debug(
      `Appended ${appended.map((event) => event.type).join(', ')} to ${request.aggregateId}`
    );

    return this.project(request.bookingId, appended, false);
  }

  /**
   * Looks up the events a command id already produced. A hit means the
   * command is a re-submission and resolves to what it recorded the first time.
   * A hit recorded by a different kind of command, or against another booking,
   * is a reused id and is rejected.
   */
  async findPrior(command: CommandIdentity): Promise<CommandResult | null> {
    const { commandId } = command;
    if (!commandId) {
      return null;
    }

    const events = await this.eventLog.findByCommandId(commandId);
    if (events.length === 0) {
      return null;
    }

    const last = events[events.length - 1];
    const booking = this.store.getByAggregateId(last.metadata.aggregateId);
    const recordedBookingId =
      booking?.bookingId ?? (await this.recordedBookingId(last.metadata.aggregateId));
    if (
      events[0].type !== command.eventType ||
      (command.bookingId !== undefined && command.bookingId !== recordedBookingId)
    ) {
      throw new CommandValidationError(`commandId ${commandId} was already used for another command`, [
        `commandId ${commandId} recorded ${events[0].type} on booking ${recordedBookingId}`
      ]);
    }

    if (booking && booking.lastVersion >= last.metadata.version) {
      return {
        outcome: 'committed',
        bookingId: booking.bookingId,
        aggregateId: booking.aggregateId,
        eventId: last.metadata.eventId,
        version: last.metadata.version,
        booking,
        duplicate: true
      };
    }

    // The first attempt left the row behind; finish its projection now.
    return this.project(recordedBookingId, events, true);
  }

  private async recordedBookingId(aggregateId: string): Promise<string> {
    return bookingIdOf(await this.eventLog.read(aggregateId));
  }

  private project(bookingId: string, events: StoredEvent[], duplicate: boolean): CommandResult {
    const last = events[events.length - 1];
    const base = {
      bookingId,
      aggregateId: last.metadata.aggregateId,
      eventId: last.metadata.eventId,
      version: last.metadata.version,
      duplicate
    };

    try {
      const views = events.map((event) => this.engine.apply(event));
      return { ...base, outcome: 'committed', booking: views[views.length - 1] };
    } catch (error: unknown) {
      const failure = new ProjectionFailureError(last.metadata.eventId, last.metadata.aggregateId, error);
      this.logger.error(failure.message, error instanceof Error ? error.stack : undefined);
      recordProjectionFailure(last.type);
      return { ...base, outcome: 'projection-failed', error: failure };
    }
  }
}

function bookingIdOf(events: readonly StoredEvent[]): string {
  for (const event of events) {
    const bookingId = event.payload.bookingId;
    if (event.type === 'BookingConfirmed' && typeof bookingId === 'string') {
      return bookingId;
    }
  }

  return '';
}
