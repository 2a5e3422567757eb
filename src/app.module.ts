import 'reflect-metadata';
import { Module } from '@nestjs/common';
import { BookingApi } from './application/booking-api';
import { AmendBookingHandler } from './application/handlers/amend-booking.handler';
import { BookingCommitter } from './application/handlers/booking-committer';
import { CancelBookingHandler } from './application/handlers/cancel-booking.handler';
import { CreateBookingHandler } from './application/handlers/create-booking.handler';
import { OfferGateway } from './application/offer-gateway';
import { CLOCK, systemClock } from './common/clock';
import { APP_CONFIG, AppConfig, loadAppConfig } from './config/app-config';
import { OFFER_PROVIDER } from './domain/offers';
import { HealthController } from './health/health.controller';
import { SqliteConnection } from './infrastructure/database/sqlite-connection';
import { SqliteEventLog } from './infrastructure/eventstore/sqlite-event-log';
import { MetricsController } from './infrastructure/metrics/metrics.controller';
import { BookingReadModelStore } from './infrastructure/projections/booking-read-model';
import { CheckpointStore } from './infrastructure/projections/checkpoint-store';
import { BookingProjectionEngine } from './infrastructure/projections/projection-engine';
import { BookingProjector } from './infrastructure/projections/projector';
import { StaticOfferProvider } from './infrastructure/provider/static-offer-provider';

@Module({
  controllers: [HealthController, MetricsController],
  providers: [
    { provide: APP_CONFIG, useFactory: () => loadAppConfig() },
    { provide: CLOCK, useValue: systemClock },
    {
      provide: OFFER_PROVIDER,
      useFactory: (config: AppConfig) => StaticOfferProvider.fromFile(config.offersFile),
      inject: [APP_CONFIG]
    },
    SqliteConnection,
    SqliteEventLog,
    BookingReadModelStore,
    CheckpointStore,
    BookingProjectionEngine,
    BookingProjector,
    OfferGateway,
    BookingCommitter,
    CreateBookingHandler,
    AmendBookingHandler,
    CancelBookingHandler,
    BookingApi
  ],
  exports: [BookingApi]
})
export class AppModule {}
