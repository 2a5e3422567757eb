import { Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Matches,
  Min,
  validateSync
} from 'class-validator';
import { existsSync, readFileSync } from 'fs';
import type { BookingType } from '../../domain/aggregates/booking';
import { BOOKING_TYPES } from '../../domain/commands/create-booking';
import { CURRENCY_CODE, ISO_DATE } from '../../domain/commands/formats';
import type { Offer, OfferProvider, OfferValidation } from '../../domain/offers';
import type { OfferSearchCriteria } from '../../domain/queries/search-offers';

class CatalogOffer {
  @IsString()
  @IsNotEmpty()
  offerId!: string;

  @IsIn(BOOKING_TYPES)
  bookingType: BookingType = 'flight';

  @IsOptional()
  @IsString()
  origin?: string;

  @IsString()
  @IsNotEmpty()
  destination!: string;

  @Matches(ISO_DATE)
  departDate!: string;

  @IsOptional()
  @Matches(ISO_DATE)
  returnDate?: string;

  @IsOptional()
  @IsString()
  hotelName?: string;

  @IsNumber()
  @Min(0)
  price!: number;

  @Matches(CURRENCY_CODE)
  currency: string = 'EUR';

  @IsInt()
  @Min(0)
  capacity!: number;
}

const UNKNOWN_OFFER: OfferValidation = { valid: false, price: 0, currency: 'EUR', capacity: 0 };

/**
 * Offer catalog held in memory, for running without a live provider account.
 */
export class StaticOfferProvider implements OfferProvider {
  private static readonly logger = new Logger(StaticOfferProvider.name);
  private readonly offers: Map<string, Offer>;

  constructor(offers: readonly Offer[]) {
    this.offers = new Map(offers.map((offer) => [offer.offerId, offer]));
  }

  static fromFile(path: string): StaticOfferProvider {
    if (!existsSync(path)) {
      StaticOfferProvider.logger.warn(`Offer catalog ${path} not found; no offers will validate`);
      return new StaticOfferProvider([]);
    }

    const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
    if (!Array.isArray(raw)) {
      throw new Error(`offer catalog ${path} must be a JSON array`);
    }

    const offers = raw.map((entry: unknown, index) => parseCatalogEntry(entry, `${path}[${index}]`));
    StaticOfferProvider.logger.log(`Loaded ${offers.length} offer(s) from ${path}`);
    return new StaticOfferProvider(offers);
  }

  async validateOffer(offerId: string, signal: AbortSignal): Promise<OfferValidation> {
    signal.throwIfAborted();
    const offer = this.offers.get(offerId);
    if (!offer) {
      return UNKNOWN_OFFER;
    }

    return { valid: true, price: offer.price, currency: offer.currency, capacity: offer.capacity };
  }

  async searchOffers(criteria: OfferSearchCriteria, signal: AbortSignal): Promise<Offer[]> {
    signal.throwIfAborted();
    return [...this.offers.values()]
      .filter((offer) => matches(offer, criteria))
      .sort((a, b) => a.price - b.price || a.offerId.localeCompare(b.offerId));
  }
}

function matches(offer: Offer, criteria: OfferSearchCriteria): boolean {
  if (!sameText(offer.destination, criteria.destination) || offer.departDate !== criteria.departDate) {
    return false;
  }
  if (criteria.origin !== undefined && (offer.origin === null || !sameText(offer.origin, criteria.origin))) {
    return false;
  }
  if (criteria.bookingType !== undefined && offer.bookingType !== criteria.bookingType) {
    return false;
  }
  if (criteria.maxPrice !== undefined && offer.price > criteria.maxPrice) {
    return false;
  }

  return offer.capacity >= criteria.passengers;
}

const sameText = (a: string, b: string): boolean => a.toLowerCase() === b.toLowerCase();

function parseCatalogEntry(entry: unknown, location: string): Offer {
  if (typeof entry !== 'object' || entry === null) {
    throw new Error(`${location} is not an object`);
  }

  const record = plainToInstance(CatalogOffer, entry);
  const errors = validateSync(record);
  if (errors.length > 0) {
    const messages = errors.flatMap((error) => Object.values(error.constraints ?? {}));
    throw new Error(`${location} is not a valid offer: ${messages.join('; ')}`);
  }

  return {
    offerId: record.offerId,
    bookingType: record.bookingType,
    origin: record.origin ?? null,
    destination: record.destination,
    departDate: record.departDate,
    returnDate: record.returnDate ?? null,
    hotelName: record.hotelName ?? null,
    price: record.price,
    currency: record.currency,
    capacity: record.capacity
  };
}
