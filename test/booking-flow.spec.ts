import { ConsoleLogger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { AppModule } from '../src/app.module';
import { BookingApi, CommandResponse } from '../src/application/booking-api';
import { CLOCK } from '../src/common/clock';
import { APP_CONFIG } from '../src/config/app-config';
import type { BookingView } from '../src/domain/aggregates/booking';
import { NotFoundError } from '../src/domain/errors';
import { OFFER_PROVIDER } from '../src/domain/offers';
import { HealthController } from '../src/health/health.controller';
import { SqliteEventLog } from '../src/infrastructure/eventstore/sqlite-event-log';
import { getRegistry } from '../src/infrastructure/metrics/prom';
import { BookingProjectionEngine } from '../src/infrastructure/projections/projection-engine';
import { FakeOfferProvider, FixedClock, TEST_CONFIG } from './support/fixtures';

const newFlight = {
  offerId: 'OFR-1',
  origin: 'PAR',
  destination: 'LIS',
  departDate: '2031-06-01',
  passengers: 2,
  userId: 'user-1'
};

async function counterValue(name: string): Promise<number> {
  const metric = getRegistry().getSingleMetric(name);
  const values = metric ? (await metric.get()).values : [];
  return values.reduce((sum, sample) => sum + sample.value, 0);
}

function committed(response: CommandResponse): BookingView {
  if (response.outcome !== 'committed') {
    throw new Error(`expected a committed command, got ${JSON.stringify(response)}`);
  }
  return response.booking;
}

describe('booking write path', () => {
  let moduleRef: TestingModule;
  let api: BookingApi;
  let eventLog: SqliteEventLog;
  let clock: FixedClock;

  beforeEach(async () => {
    clock = new FixedClock();
    moduleRef = await Test.createTestingModule({ imports: [AppModule] })
      .overrideProvider(APP_CONFIG)
      .useValue(TEST_CONFIG)
      .overrideProvider(CLOCK)
      .useValue(clock)
      .overrideProvider(OFFER_PROVIDER)
      .useValue(new FakeOfferProvider())
      .setLogger(new ConsoleLogger('test', { logLevels: [] }))
      .compile();
    await moduleRef.init();

    api = moduleRef.get(BookingApi);
    eventLog = moduleRef.get(SqliteEventLog);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  const create = async (overrides: Record<string, unknown> = {}) =>
    committed(await api.submitCommand('create', { ...newFlight, ...overrides }));

  describe('create', () => {
    it('should confirm a booking at the provider price', async () => {
      const response = await api.submitCommand('create', newFlight);

      expect(response).toMatchObject({
        outcome: 'committed',
        version: 1,
        status: 'confirmed',
        duplicate: false,
        booking: { price: 250, currency: 'EUR', passengers: 2, lastVersion: 1 }
      });

      const booking = committed(response);
      const events = await eventLog.readAll();
      expect(events.map((event) => event.type)).toEqual(['BookingConfirmed']);
      expect(events[0].payload.bookingId).toBe(booking.bookingId);
      await expect(api.getBooking(booking.bookingId)).resolves.toEqual(booking);
    });

    it('should append nothing when the offer is no longer available', async () => {
      const response = await api.submitCommand('create', { ...newFlight, offerId: 'OFR-GONE' });

      expect(response).toEqual({
        outcome: 'rejected',
        error: {
          kind: 'OfferUnavailable',
          message: 'offer OFR-GONE is no longer available',
          retryable: false,
          details: { offerId: 'OFR-GONE' }
        }
      });
      expect(await eventLog.readAll()).toEqual([]);
    });

    it('should refuse more passengers than the offer has seats', async () => {
      const response = await api.submitCommand('create', { ...newFlight, passengers: 3 });

      expect(response).toMatchObject({
        outcome: 'rejected',
        error: { kind: 'OfferUnavailable', message: 'offer OFR-1 has 2 seat(s) left, 3 requested' }
      });
    });

    it('should refuse a quoted price the provider no longer honours', async () => {
      const response = await api.submitCommand('create', { ...newFlight, price: 199 });

      expect(response).toMatchObject({
        outcome: 'rejected',
        error: { kind: 'OfferUnavailable', message: 'offer OFR-1 now costs 250, not 199' }
      });
    });

    it('should report a provider timeout as retryable and append nothing', async () => {
      const response = await api.submitCommand('create', { ...newFlight, offerId: 'OFR-SLOW' });

      expect(response).toMatchObject({
        outcome: 'rejected',
        error: {
          kind: 'ProviderError',
          message: 'validateOffer(OFR-SLOW) timed out after 20ms',
          retryable: true
        }
      });
      expect(await eventLog.readAll()).toEqual([]);
    });

    it('should reject a departure in the past', async () => {
      const response = await api.submitCommand('create', { ...newFlight, departDate: '2029-06-01' });

      expect(response).toEqual({
        outcome: 'rejected',
        error: {
          kind: 'ValidationError',
          message: 'invalid travel dates',
          retryable: false,
          details: { violations: ['departDate 2029-06-01 is in the past'] }
        }
      });
    });

    it('should reject a malformed payload before calling the provider', async () => {
      const response = await api.submitCommand('create', { ...newFlight, passengers: 12 });

      expect(response).toMatchObject({
        outcome: 'rejected',
        error: {
          kind: 'ValidationError',
          details: { violations: ['passengers must not be greater than 9'] }
        }
      });
    });

    it('should resolve a re-submitted command to the booking it already made', async () => {
      const commandId = '1b4e28ba-2fa1-41d2-883f-0016d3cca427';
      const first = await api.submitCommand('create', { ...newFlight, commandId });
      const second = await api.submitCommand('create', { ...newFlight, commandId });

      expect(second).toMatchObject({ outcome: 'committed', duplicate: true });
      expect(committed(second)).toEqual(committed(first));
      expect(await eventLog.readAll()).toHaveLength(1);
    });

    it('should make one booking from two concurrent submissions of the same command', async () => {
      const command = { ...newFlight, commandId: '6f1c1c0e-8a55-4f53-9d3a-2b8f0c7e4d21' };

      const responses = await Promise.all([
        api.submitCommand('create', command),
        api.submitCommand('create', command)
      ]);

      const bookings = responses.map(committed);
      expect(bookings[1].bookingId).toBe(bookings[0].bookingId);
      expect(responses.map((response) => response.outcome === 'committed' && response.duplicate).sort()).toEqual([
        false,
        true
      ]);
      expect(await eventLog.readAll()).toHaveLength(1);
    });

    it('should resolve a re-submission after the departure date has passed', async () => {
      const commandId = '0d6f4a52-3c1e-4b7a-9f2e-5a8c6b1d7e93';
      const first = await api.submitCommand('create', { ...newFlight, commandId });
      clock.set('2031-07-01T00:00:00.000Z');

      const second = await api.submitCommand('create', { ...newFlight, commandId });

      expect(second).toMatchObject({ outcome: 'committed', duplicate: true });
      expect(committed(second).bookingId).toBe(committed(first).bookingId);
    });

    it('should reject a command id reused by a command of another kind', async () => {
      const commandId = '9a7b3c2d-1e4f-4a5b-8c6d-7e8f9a0b1c2d';
      await create({ commandId });
      const other = await create({ userId: 'user-2' });

      const response = await api.submitCommand('cancel', { bookingId: other.bookingId, commandId });

      expect(response).toMatchObject({
        outcome: 'rejected',
        error: {
          kind: 'ValidationError',
          message: `commandId ${commandId} was already used for another command`
        }
      });
      await expect(api.getBooking(other.bookingId)).resolves.toMatchObject({ status: 'confirmed' });
      expect(await eventLog.readAll()).toHaveLength(2);
    });
  });

  describe('amend and cancel', () => {
    it('should add a return leg', async () => {
      const booking = await create();

      const response = await api.submitCommand('amend', {
        bookingId: booking.bookingId,
        expectedVersion: 1,
        returnDate: '2031-06-08',
        reason: 'staying longer'
      });

      expect(response).toMatchObject({
        outcome: 'committed',
        version: 2,
        booking: { returnDate: '2031-06-08', passengers: 2, lastVersion: 2 }
      });
    });

    it('should reject an amendment that changes nothing', async () => {
      const booking = await create();

      const response = await api.submitCommand('amend', { bookingId: booking.bookingId, reason: 'just checking' });

      expect(response).toMatchObject({
        outcome: 'rejected',
        error: { kind: 'ValidationError', message: `amendment of ${booking.bookingId} changes nothing` }
      });
    });

    it('should cancel a confirmed booking', async () => {
      const booking = await create();

      const response = await api.submitCommand('cancel', {
        bookingId: booking.bookingId,
        expectedVersion: 1,
        reason: 'plans changed'
      });

      expect(response).toMatchObject({
        outcome: 'committed',
        version: 2,
        status: 'cancelled',
        booking: { status: 'cancelled', cancellationReason: 'plans changed', lastVersion: 2 }
      });
      expect((await eventLog.readAll()).map((event) => event.type)).toEqual([
        'BookingConfirmed',
        'BookingCancelled'
      ]);
    });

    it('should refuse to cancel a booking twice', async () => {
      const booking = await create();
      await api.submitCommand('cancel', { bookingId: booking.bookingId });

      const response = await api.submitCommand('cancel', { bookingId: booking.bookingId });

      expect(response).toMatchObject({
        outcome: 'rejected',
        error: {
          kind: 'InvalidStateTransition',
          message: `cannot cancel booking ${booking.bookingId} in status cancelled`
        }
      });
    });

    it('should let exactly one of two concurrent cancels win', async () => {
      const booking = await create();
      const cancel = { bookingId: booking.bookingId, expectedVersion: 1 };

      const responses = await Promise.all([
        api.submitCommand('cancel', cancel),
        api.submitCommand('cancel', cancel)
      ]);

      expect(responses.map((response) => response.outcome).sort()).toEqual(['committed', 'rejected']);
      expect(responses.find((response) => response.outcome === 'rejected')).toMatchObject({
        error: { kind: 'ConcurrencyConflict', retryable: true }
      });
      expect(await eventLog.readAll()).toHaveLength(2);
    });

    it('should reject a change made against a stale version', async () => {
      const booking = await create();
      await api.submitCommand('amend', { bookingId: booking.bookingId, passengers: 1 });
      const conflictsBefore = await counterValue('booking_append_conflicts_total');
      const staleBefore = await counterValue('booking_stale_commands_total');

      const response = await api.submitCommand('cancel', { bookingId: booking.bookingId, expectedVersion: 1 });

      expect(response).toMatchObject({
        outcome: 'rejected',
        error: {
          kind: 'ConcurrencyConflict',
          details: { aggregateId: booking.aggregateId, expectedVersion: 1, actualVersion: 2 }
        }
      });
      expect(await eventLog.readAll()).toHaveLength(2);
      expect(await counterValue('booking_stale_commands_total')).toBe(staleBefore + 1);
      expect(await counterValue('booking_append_conflicts_total')).toBe(conflictsBefore);
    });

    it('should refuse to cancel a booking that does not exist', async () => {
      const response = await api.submitCommand('cancel', { bookingId: 'bkg-missing' });

      expect(response).toEqual({
        outcome: 'rejected',
        error: {
          kind: 'InvalidStateTransition',
          message: 'cannot cancel booking bkg-missing: no such booking',
          retryable: false,
          details: { bookingId: 'bkg-missing', action: 'cancel' }
        }
      });
    });

    it('should reject an explicit null expected version', async () => {
      const booking = await create();

      const response = await api.submitCommand('cancel', { bookingId: booking.bookingId, expectedVersion: null });

      expect(response).toMatchObject({ outcome: 'rejected', error: { kind: 'ValidationError' } });
      if (response.outcome === 'rejected') {
        expect(response.error.details.violations).toContain('expectedVersion must be an integer number');
      }
      expect(await eventLog.readAll()).toHaveLength(1);
    });

    it('should reject an amendment that sets passengers to null', async () => {
      const booking = await create();

      const response = await api.submitCommand('amend', { bookingId: booking.bookingId, passengers: null });

      expect(response).toMatchObject({ outcome: 'rejected', error: { kind: 'ValidationError' } });
      if (response.outcome === 'rejected') {
        expect(response.error.details.violations).toContain('passengers must be an integer number');
      }
      expect(await eventLog.readAll()).toHaveLength(1);
    });
  });

  describe('projection', () => {
    it('should keep the event when projection fails and recover it on rebuild', async () => {
      const engine = moduleRef.get(BookingProjectionEngine);
      jest.spyOn(engine, 'apply').mockImplementationOnce(() => {
        throw new Error('disk full');
      });

      const response = await api.submitCommand('create', newFlight);

      expect(response).toMatchObject({
        outcome: 'projection-failed',
        version: 1,
        error: { kind: 'ProjectionFailure', retryable: false }
      });
      if (response.outcome !== 'projection-failed') {
        return;
      }

      const [event] = await eventLog.readAll();
      expect(event.metadata.eventId).toBe(response.eventId);
      await expect(api.getBooking(response.bookingId)).rejects.toBeInstanceOf(NotFoundError);

      const report = await api.rebuildReadModel({ aggregateId: event.metadata.aggregateId });

      expect(report).toEqual({ rebuilt: [event.metadata.aggregateId], failed: [] });
      await expect(api.getBooking(response.bookingId)).resolves.toMatchObject({
        status: 'confirmed',
        lastVersion: 1
      });
    });

    it('should rebuild a row identical to the one projected incrementally', async () => {
      const booking = await create();
      await api.submitCommand('amend', { bookingId: booking.bookingId, passengers: 1 });
      await api.submitCommand('cancel', { bookingId: booking.bookingId, reason: 'plans changed' });
      const incremental = await api.getBooking(booking.bookingId);

      const report = await api.rebuildReadModel('all');

      expect(report).toEqual({ rebuilt: [booking.aggregateId], failed: [] });
      await expect(api.getBooking(booking.bookingId)).resolves.toEqual(incremental);
    });

    it('should report a rebuild of an aggregate with no events', async () => {
      await expect(api.rebuildReadModel({ aggregateId: 'agg-missing' })).resolves.toEqual({
        rebuilt: [],
        failed: [
          {
            aggregateId: 'agg-missing',
            kind: 'NotFound',
            message: 'no events recorded for aggregate agg-missing'
          }
        ]
      });
    });
  });

  describe('queries', () => {
    it('should list bookings filtered by status', async () => {
      const kept = await create();
      const dropped = await create({ userId: 'user-2' });
      await api.submitCommand('cancel', { bookingId: dropped.bookingId });

      const confirmed = await api.listBookings({ status: 'confirmed' });
      const forUser = await api.listBookings({ userId: 'user-2' });

      expect(confirmed.map((booking) => booking.bookingId)).toEqual([kept.bookingId]);
      expect(forUser.map((booking) => booking.status)).toEqual(['cancelled']);
    });

    it('should page through the log in append order', async () => {
      const booking = await create();
      await api.submitCommand('cancel', { bookingId: booking.bookingId });

      const firstPage = await api.exportEvents(0, 1);
      const secondPage = await api.exportEvents(firstPage.nextOffset);

      expect(firstPage.events.map((event) => event.type)).toEqual(['BookingConfirmed']);
      expect(firstPage.nextOffset).toBe(2);
      expect(secondPage.events.map((event) => event.type)).toEqual(['BookingCancelled']);
      expect(secondPage.nextOffset).toBe(3);
    });

    it('should pass validated search criteria to the provider', async () => {
      const provider = moduleRef.get<FakeOfferProvider>(OFFER_PROVIDER);
      const spy = jest.spyOn(provider, 'searchOffers');

      await expect(api.searchOffers({ destination: 'LIS', departDate: '2031-06-01' })).resolves.toEqual([]);
      expect(spy.mock.calls[0][0]).toMatchObject({ destination: 'LIS', departDate: '2031-06-01', passengers: 1 });
    });

    it('should reject a search without a destination', async () => {
      await expect(api.searchOffers({ departDate: '2031-06-01' })).rejects.toMatchObject({
        kind: 'ValidationError'
      });
    });

    it('should report an unknown booking id', async () => {
      await expect(api.getBooking('bkg-missing')).rejects.toThrow('booking bkg-missing not found');
    });
  });

  it('should report the database as healthy while the module runs', () => {
    expect(moduleRef.get(HealthController).healthz()).toEqual({
      ok: true,
      service: 'booking-ledger',
      database: 'open',
      ts: '2030-01-01T00:00:00.000Z'
    });
  });
});
