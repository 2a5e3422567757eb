import { Inject, Injectable } from '@nestjs/common';
import { CLOCK, Clock } from '../../common/clock';
import type { BookingAmendedPayload } from '../../domain/aggregates/booking';
import { AmendBookingCommand } from '../../domain/commands/amend-booking';
import { CommandValidationError } from '../../domain/errors';
import { assertTravelDates } from '../../domain/travel-dates';
import { BookingReadModelStore } from '../../infrastructure/projections/booking-read-model';
import { BookingCommitter, CommandIdentity, CommandResult } from './booking-committer';
import { loadBookingForChange } from './existing-booking';

@Injectable()
export class AmendBookingHandler {
  constructor(
    private readonly committer: BookingCommitter,
    private readonly store: BookingReadModelStore,
    @Inject(CLOCK) private readonly clock: Clock
  ) {}

  async execute(command: AmendBookingCommand): Promise<CommandResult> {
    const payload = toAmendedPayload(command);

    const identity: CommandIdentity = {
      commandId: command.commandId ?? null,
      eventType: 'BookingAmended',
      bookingId: command.bookingId
    };
    const prior = await this.committer.findPrior(identity);
    if (prior) {
      return prior;
    }

    const booking = loadBookingForChange(this.store, command, 'amend');
    assertTravelDates(
      payload.departDate ?? booking.departDate,
      payload.returnDate === undefined ? booking.returnDate : payload.returnDate,
      this.clock.now()
    );

    return this.committer.commit({
      aggregateId: booking.aggregateId,
      bookingId: booking.bookingId,
      expectedVersion: command.expectedVersion ?? booking.lastVersion,
      drafts: [{ type: 'BookingAmended', payload }],
      command: identity
    });
  }
}

const toAmendedPayload = (command: AmendBookingCommand): BookingAmendedPayload => {
  const payload: BookingAmendedPayload = { reason: command.reason ?? null };

  if (command.departDate !== undefined) {
    payload.departDate = command.departDate;
  }
  if (command.returnDate !== undefined) {
    payload.returnDate = command.returnDate;
  }
  if (command.passengers !== undefined) {
    payload.passengers = command.passengers;
  }
  if (command.price !== undefined) {
    payload.price = command.price;
  }

  if (Object.keys(payload).length === 1) {
    throw new CommandValidationError(`amendment of ${command.bookingId} changes nothing`);
  }

  return payload;
};
