import type { Clock } from '../../src/common/clock';
import type { AppConfig } from '../../src/config/app-config';
import type {
  BookingConfirmedPayload,
  BookingEventDraft
} from '../../src/domain/aggregates/booking';
import type { Offer, OfferProvider, OfferValidation } from '../../src/domain/offers';
import type { OfferSearchCriteria } from '../../src/domain/queries/search-offers';
import { SqliteConnection } from '../../src/infrastructure/database/sqlite-connection';

export const TEST_NOW = '2030-01-01T00:00:00.000Z';

export const TEST_CONFIG: AppConfig = {
  port: 0,
  databasePath: ':memory:',
  providerTimeoutMs: 20,
  offersFile: 'offers.test.json',
  projectionCatchUp: false,
  logLevels: []
};

export class FixedClock implements Clock {
  constructor(private current: string = TEST_NOW) {}

  now(): string {
    return this.current;
  }

  set(iso: string): void {
    this.current = iso;
  }
}

export const openMemoryDatabase = (): SqliteConnection => new SqliteConnection(TEST_CONFIG);

export const confirmedPayload = (
  overrides: Partial<BookingConfirmedPayload> = {}
): BookingConfirmedPayload => ({
  bookingId: 'bkg-1',
  bookingType: 'flight',
  offerId: 'OFR-1',
  origin: 'PAR',
  destination: 'LIS',
  departDate: '2031-06-01',
  returnDate: null,
  hotelName: null,
  passengers: 2,
  price: 250,
  currency: 'EUR',
  userId: 'user-1',
  paymentMethod: 'credit_card',
  ...overrides
});

export const confirmedDraft = (overrides: Partial<BookingConfirmedPayload> = {}): BookingEventDraft => ({
  type: 'BookingConfirmed',
  payload: confirmedPayload(overrides)
});

export const cancelledDraft = (reason: string | null = 'plans changed'): BookingEventDraft => ({
  type: 'BookingCancelled',
  payload: { reason }
});

/**
 * Provider stand-in. `OFR-SLOW` never answers on its own and only settles
 * when the caller aborts.
 */
export class FakeOfferProvider implements OfferProvider {
  readonly offers = new Map<string, OfferValidation>([
    ['OFR-1', { valid: true, price: 250, currency: 'EUR', capacity: 2 }],
    ['OFR-GONE', { valid: false, price: 0, currency: 'EUR', capacity: 0 }]
  ]);

  validateOffer(offerId: string, signal: AbortSignal): Promise<OfferValidation> {
    if (offerId === 'OFR-SLOW') {
      return new Promise<OfferValidation>((_, reject) => {
        signal.addEventListener('abort', () => reject(new Error('aborted by caller')));
      });
    }

    return Promise.resolve(
      this.offers.get(offerId) ?? { valid: false, price: 0, currency: 'EUR', capacity: 0 }
    );
  }

  searchOffers(_criteria: OfferSearchCriteria, _signal: AbortSignal): Promise<Offer[]> {
    return Promise.resolve([]);
  }
}
