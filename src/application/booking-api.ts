import { Injectable, Logger } from '@nestjs/common';
import type { BookingStatus, BookingView } from '../domain/aggregates/booking';
import { AmendBookingCommand } from '../domain/commands/amend-booking';
import { CancelBookingCommand } from '../domain/commands/cancel-booking';
import { CreateBookingCommand } from '../domain/commands/create-booking';
import {
  BookingError,
  BookingErrorKind,
  CommandValidationError,
  ErrorDetails,
  NotFoundError
} from '../domain/errors';
import type { StoredEvent } from '../domain/events';
import type { Offer } from '../domain/offers';
import { ListBookingsQuery } from '../domain/queries/list-bookings';
import { OfferSearchCriteria } from '../domain/queries/search-offers';
import { SqliteEventLog } from '../infrastructure/eventstore/sqlite-event-log';
import { recordCommand } from '../infrastructure/metrics/prom';
import { BookingReadModelStore } from '../infrastructure/projections/booking-read-model';
import { BookingProjectionEngine, RebuildReport } from '../infrastructure/projections/projection-engine';
import { AmendBookingHandler } from './handlers/amend-booking.handler';
import type { CommandResult } from './handlers/booking-committer';
import { CancelBookingHandler } from './handlers/cancel-booking.handler';
import { CreateBookingHandler } from './handlers/create-booking.handler';
import { OfferGateway } from './offer-gateway';
import { parseDto } from './validation';

export type CommandKind = 'create' | 'amend' | 'cancel';

export interface ErrorBody {
  kind: BookingErrorKind;
  message: string;
  retryable: boolean;
  details: ErrorDetails;
}

export type CommandResponse =
  | {
      outcome: 'committed';
      bookingId: string;
      eventId: string;
      version: number;
      status: BookingStatus;
      booking: BookingView;
      duplicate: boolean;
    }
  | {
      outcome: 'projection-failed';
      bookingId: string;
      eventId: string;
      version: number;
      error: ErrorBody;
      duplicate: boolean;
    }
  | {
      outcome: 'rejected';
      error: ErrorBody;
    };

export type RebuildTarget = { aggregateId: string } | 'all';

export interface EventExport {
  events: StoredEvent[];
  nextOffset: number;
}

/**
 * Entry point for whatever transport sits in front of the booking core.
 * Commands never throw for domain failures: they come back as `rejected`,
 * and a stored-but-unprojected event comes back as `projection-failed`.
 */
@Injectable()
export class BookingApi {
  private readonly logger = new Logger(BookingApi.name);

  constructor(
    private readonly createHandler: CreateBookingHandler,
    private readonly amendHandler: AmendBookingHandler,
    private readonly cancelHandler: CancelBookingHandler,
    private readonly store: BookingReadModelStore,
    private readonly engine: BookingProjectionEngine,
    private readonly eventLog: SqliteEventLog,
    private readonly offers: OfferGateway
  ) {}

  async submitCommand(kind: CommandKind, payload: unknown): Promise<CommandResponse> {
    try {
      const response = toResponse(await this.dispatch(kind, payload));
      recordCommand(kind, response.outcome);
      return response;
    } catch (error: unknown) {
      if (!(error instanceof BookingError)) {
        recordCommand(kind, 'error');
        throw error;
      }

      this.logger.warn(`${kind} rejected (${error.kind}): ${error.message}`);
      recordCommand(kind, 'rejected');
      return { outcome: 'rejected', error: toErrorBody(error) };
    }
  }

  async getBooking(bookingId: string): Promise<BookingView> {
    const booking = this.store.getById(bookingId);
    if (!booking) {
      throw new NotFoundError(`booking ${bookingId} not found`, { bookingId });
    }

    return booking;
  }

  async listBookings(query: unknown = {}): Promise<BookingView[]> {
    const filter = await parseDto(ListBookingsQuery, query);
    return this.store.list({ userId: filter.userId, status: filter.status });
  }

  async searchOffers(criteria: unknown): Promise<Offer[]> {
    return this.offers.searchOffers(await parseDto(OfferSearchCriteria, criteria));
  }

  async rebuildReadModel(target: RebuildTarget): Promise<RebuildReport> {
    if (target === 'all') {
      return this.engine.rebuildAll();
    }

    try {
      await this.engine.rebuild(target.aggregateId);
      return { rebuilt: [target.aggregateId], failed: [] };
    } catch (error: unknown) {
      if (!(error instanceof BookingError)) {
        throw error;
      }

      return {
        rebuilt: [],
        failed: [{ aggregateId: target.aggregateId, kind: error.kind, message: error.message }]
      };
    }
  }

  async exportEvents(fromOffset = 0, limit?: number): Promise<EventExport> {
    if (!Number.isInteger(fromOffset) || fromOffset < 0) {
      throw new CommandValidationError('fromOffset must be a non-negative integer');
    }
    if (limit !== undefined && (!Number.isInteger(limit) || limit <= 0)) {
      throw new CommandValidationError('limit must be a positive integer');
    }

    const events = await this.eventLog.readAll(fromOffset, limit);
    const nextOffset = events.length > 0 ? events[events.length - 1].offset + 1 : fromOffset;
    return { events, nextOffset };
  }

  private async dispatch(kind: CommandKind, payload: unknown): Promise<CommandResult> {
    switch (kind) {
      case 'create':
        return this.createHandler.execute(await parseDto(CreateBookingCommand, payload));
      case 'amend':
        return this.amendHandler.execute(await parseDto(AmendBookingCommand, payload));
      case 'cancel':
        return this.cancelHandler.execute(await parseDto(CancelBookingCommand, payload));
      default: {
        const unknownKind: never = kind;
        throw new CommandValidationError(`unknown command kind ${String(unknownKind)}`);
      }
    }
  }
}

function toResponse(result: CommandResult): CommandResponse {
  const base = {
    bookingId: result.bookingId,
    eventId: result.eventId,
    version: result.version,
    duplicate: result.duplicate
  };

  if (result.outcome === 'projection-failed') {
    return { ...base, outcome: 'projection-failed', error: toErrorBody(result.error) };
  }

  return { ...base, outcome: 'committed', status: result.booking.status, booking: result.booking };
}

function toErrorBody(error: BookingError): ErrorBody {
  return {
    kind: error.kind,
    message: error.message,
    retryable: error.retryable,
    details: error.details
  };
}
