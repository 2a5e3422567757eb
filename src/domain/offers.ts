import type { BookingType } from './aggregates/booking';
import type { OfferSearchCriteria } from './queries/search-offers';

export const OFFER_PROVIDER = Symbol('OFFER_PROVIDER');

export interface Offer {
  offerId: string;
  bookingType: BookingType;
  origin: string | null;
  destination: string;
  departDate: string;
  returnDate: string | null;
  hotelName: string | null;
  price: number;
  currency: string;
  capacity: number;
}

export interface OfferValidation {
  valid: boolean;
  price: number;
  currency: string;
  capacity: number;
}

/**
 * Outbound port to the flight/hotel data provider. Implementations should
 * stop work when `signal` aborts; the gateway gives up on them either way.
 */
export interface OfferProvider {
  validateOffer(offerId: string, signal: AbortSignal): Promise<OfferValidation>;
  searchOffers(criteria: OfferSearchCriteria, signal: AbortSignal): Promise<Offer[]>;
}
