import { Injectable } from '@nestjs/common';
import { CancelBookingCommand } from '../../domain/commands/cancel-booking';
import { BookingReadModelStore } from '../../infrastructure/projections/booking-read-model';
import { BookingCommitter, CommandIdentity, CommandResult } from './booking-committer';
import { loadBookingForChange } from './existing-booking';

@Injectable()
export class CancelBookingHandler {
  constructor(
    private readonly committer: BookingCommitter,
    private readonly store: BookingReadModelStore
  ) {}

  async execute(command: CancelBookingCommand): Promise<CommandResult> {
    const identity: CommandIdentity = {
      commandId: command.commandId ?? null,
      eventType: 'BookingCancelled',
      bookingId: command.bookingId
    };
    const prior = await this.committer.findPrior(identity);
    if (prior) {
      return prior;
    }

    const booking = loadBookingForChange(this.store, command, 'cancel');

    return this.committer.commit({
      aggregateId: booking.aggregateId,
      bookingId: booking.bookingId,
      expectedVersion: command.expectedVersion ?? booking.lastVersion,
      drafts: [{ type: 'BookingCancelled', payload: { reason: command.reason ?? null } }],
      command: identity
    });
  }
}
