import { Controller, Get, Inject } from '@nestjs/common';
import { CLOCK, Clock } from '../common/clock';
import { SqliteConnection } from '../infrastructure/database/sqlite-connection';

@Controller()
export class HealthController {
  constructor(
    private readonly database: SqliteConnection,
    @Inject(CLOCK) private readonly clock: Clock
  ) {}

  @Get('/healthz')
  healthz() {
    return {
      ok: this.database.isOpen,
      service: 'booking-ledger',
      database: this.database.isOpen ? 'open' : 'closed',
      ts: this.clock.now()
    };
  }
}
