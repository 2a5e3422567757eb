import { Inject, Injectable } from '@nestjs/common';
import { CLOCK, Clock } from '../../common/clock';
import { generateId } from '../../common/id';
import type { BookingConfirmedPayload } from '../../domain/aggregates/booking';
import { CreateBookingCommand } from '../../domain/commands/create-booking';
import { OfferUnavailableError } from '../../domain/errors';
import type { OfferValidation } from '../../domain/offers';
import { assertTravelDates } from '../../domain/travel-dates';
import { OfferGateway } from '../offer-gateway';
import { BookingCommitter, CommandIdentity, CommandResult } from './booking-committer';

const PRICE_TOLERANCE = 1e-6;

@Injectable()
export class CreateBookingHandler {
  constructor(
    private readonly offers: OfferGateway,
    private readonly committer: BookingCommitter,
    @Inject(CLOCK) private readonly clock: Clock
  ) {}

  async execute(command: CreateBookingCommand): Promise<CommandResult> {
    const identity: CommandIdentity = {
      commandId: command.commandId ?? null,
      eventType: 'BookingConfirmed'
    };
    const prior = await this.committer.findPrior(identity);
    if (prior) {
      return prior;
    }

    assertTravelDates(command.departDate, command.returnDate ?? null, this.clock.now());

    const offer = await this.offers.validateOffer(command.offerId);
    assertOfferBookable(command, offer);

    const aggregateId = generateId();
    const bookingId = generateId();
    const payload: BookingConfirmedPayload = {
      bookingId,
      bookingType: command.bookingType,
      offerId: command.offerId,
      origin: command.bookingType === 'hotel' ? null : command.origin ?? null,
      destination: command.destination,
      departDate: command.departDate,
      returnDate: command.returnDate ?? null,
      hotelName: command.bookingType === 'flight' ? null : command.hotelName ?? null,
      passengers: command.passengers,
      price: offer.price,
      currency: offer.currency,
      userId: command.userId ?? null,
      paymentMethod: command.paymentMethod
    };

    return this.committer.commit({
      aggregateId,
      bookingId,
      expectedVersion: 0,
      drafts: [{ type: 'BookingConfirmed', payload }],
      command: identity
    });
  }
}

const assertOfferBookable = (command: CreateBookingCommand, offer: OfferValidation): void => {
  const details = { offerId: command.offerId };

  if (!offer.valid) {
    throw new OfferUnavailableError(`offer ${command.offerId} is no longer available`, details);
  }

  if (offer.capacity < command.passengers) {
    throw new OfferUnavailableError(
      `offer ${command.offerId} has ${offer.capacity} seat(s) left, ${command.passengers} requested`,
      { ...details, capacity: offer.capacity }
    );
  }

  if (command.currency !== undefined && command.currency !== offer.currency) {
    throw new OfferUnavailableError(
      `offer ${command.offerId} is priced in ${offer.currency}, not ${command.currency}`,
      { ...details, currency: offer.currency }
    );
  }

  if (command.price !== undefined && Math.abs(command.price - offer.price) > PRICE_TOLERANCE) {
    throw new OfferUnavailableError(
      `offer ${command.offerId} now costs ${offer.price}, not ${command.price}`,
      { ...details, price: offer.price }
    );
  }
};
