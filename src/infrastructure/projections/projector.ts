import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { CLOCK, Clock } from '../../common/clock';
import { APP_CONFIG, AppConfig } from '../../config/app-config';
import { BookingError } from '../../domain/errors';
import type { StoredEvent } from '../../domain/events';
import { SqliteEventLog } from '../eventstore/sqlite-event-log';
import { recordProjectionFailure, setProjectorLag } from '../metrics/prom';
import { CheckpointStore } from './checkpoint-store';
import { BookingProjectionEngine } from './projection-engine';

const PROJECTOR_NAME = 'booking-read-model';

export interface CatchUpReport {
  fromOffset: number;
  processed: number;
  halted: string[];
}

/**
 * Re-applies whatever the log holds past the checkpoint. Commands project
 * synchronously, so in normal operation every event here is a no-op; after a
 * crash between append and projection this is what brings rows up to date.
 */
@Injectable()
export class BookingProjector implements OnModuleInit {
  private readonly logger = new Logger(BookingProjector.name);

  constructor(
    private readonly eventLog: SqliteEventLog,
    private readonly engine: BookingProjectionEngine,
    private readonly checkpointStore: CheckpointStore,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(CLOCK) private readonly clock: Clock
  ) {}

  async onModuleInit(): Promise<void> {
    if (!this.config.projectionCatchUp) {
      return;
    }

    const report = await this.catchUp();
    this.logger.log(
      `Caught up ${report.processed} event(s) from offset ${report.fromOffset}` +
        (report.halted.length > 0 ? `; halted: ${report.halted.join(', ')}` : '')
    );
  }

  async catchUp(): Promise<CatchUpReport> {
    const lastOffset = await this.checkpointStore.getLastOffset(PROJECTOR_NAME);
    const fromOffset = lastOffset === null ? 0 : lastOffset + 1;
    const halted = new Set<string>();
    let processed = 0;

    for await (const event of this.eventLog.stream(fromOffset)) {
      const aggregateId = event.metadata.aggregateId;
      if (halted.has(aggregateId)) {
        continue;
      }

      if (!this.handleEvent(event)) {
        halted.add(aggregateId);
        continue;
      }

      processed += 1;
      // The checkpoint stops at the first failure so the next start retries it.
      if (halted.size === 0) {
        await this.checkpointStore.saveLastOffset(PROJECTOR_NAME, event.offset);
      }
      this.updateLagMetric(event);
    }

    return { fromOffset, processed, halted: [...halted] };
  }

  private handleEvent(event: StoredEvent): boolean {
    try {
      this.engine.apply(event);
      return true;
    } catch (error: unknown) {
      if (!(error instanceof BookingError)) {
        throw error;
      }

      this.logger.error(
        `Failed to project event ${event.type}#${event.metadata.eventId}: ${error.message}`,
        error.stack
      );
      recordProjectionFailure(event.type);
      return false;
    }
  }

  private updateLagMetric(event: StoredEvent): void {
    const eventTimestamp = Date.parse(event.metadata.ts);
    const now = Date.parse(this.clock.now());
    if (Number.isNaN(eventTimestamp) || Number.isNaN(now)) {
      return;
    }

    setProjectorLag(PROJECTOR_NAME, Math.max(0, (now - eventTimestamp) / 1000));
  }
}
