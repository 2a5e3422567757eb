import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import type { Database as BetterSqlite3Database } from 'better-sqlite3';
import DatabaseConstructor = require('better-sqlite3');
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { APP_CONFIG, AppConfig } from '../../config/app-config';

const IN_MEMORY = ':memory:';

/**
 * The one database handle of the process. The event log and the read model
 * each create and own their tables on it; nothing else shares schema.
 */
@Injectable()
export class SqliteConnection implements OnModuleDestroy {
  private readonly logger = new Logger(SqliteConnection.name);
  private readonly db: BetterSqlite3Database;

  constructor(@Inject(APP_CONFIG) config: AppConfig) {
    const path = config.databasePath;
    if (path !== IN_MEMORY) {
      mkdirSync(dirname(path), { recursive: true });
    }

    this.db = new DatabaseConstructor(path);
    if (path !== IN_MEMORY) {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('synchronous = FULL');
    this.logger.log(`Opened database ${path}`);
  }

  get connection(): BetterSqlite3Database {
    return this.db;
  }

  get isOpen(): boolean {
    return this.db.open;
  }

  onModuleDestroy(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
