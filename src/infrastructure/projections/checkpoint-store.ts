import { Inject, Injectable } from '@nestjs/common';
import type { Statement } from 'better-sqlite3';
import { CLOCK, Clock } from '../../common/clock';
import { SqliteConnection } from '../database/sqlite-connection';

type CheckpointRow = {
  last_offset: number;
};

type UpsertParams = {
  projector_name: string;
  last_offset: number;
  updated_at: string;
};

@Injectable()
export class CheckpointStore {
  private readonly getStmt: Statement<[{ projector_name: string }], CheckpointRow>;
  private readonly upsertStmt: Statement<[UpsertParams]>;

  constructor(
    private readonly database: SqliteConnection,
    @Inject(CLOCK) private readonly clock: Clock
  ) {
    const db = this.database.connection;
    db.exec(`
      CREATE TABLE IF NOT EXISTS projection_checkpoints (
        projector_name TEXT PRIMARY KEY,
        last_offset INTEGER NOT NULL,
        updated_at TEXT NOT NULL
      );
    `);

    this.getStmt = db.prepare<{ projector_name: string }, CheckpointRow>(`
      SELECT last_offset
      FROM projection_checkpoints
      WHERE projector_name = @projector_name
    `);

    this.upsertStmt = db.prepare<UpsertParams>(`
      INSERT INTO projection_checkpoints (
        projector_name,
        last_offset,
        updated_at
      ) VALUES (
        @projector_name,
        @last_offset,
        @updated_at
      )
      ON CONFLICT(projector_name) DO UPDATE SET
        last_offset = excluded.last_offset,
        updated_at = excluded.updated_at;
    `);
  }

  async getLastOffset(projectorName: string): Promise<number | null> {
    const row = this.getStmt.get({ projector_name: projectorName });
    if (!row) {
      return null;
    }

    return row.last_offset;
  }

  async saveLastOffset(projectorName: string, offset: number): Promise<void> {
    this.upsertStmt.run({
      projector_name: projectorName,
      last_offset: offset,
      updated_at: this.clock.now()
    });
  }
}
