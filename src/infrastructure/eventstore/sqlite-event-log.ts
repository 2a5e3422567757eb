import { Inject, Injectable, Logger } from '@nestjs/common';
import type { Database as BetterSqlite3Database, Statement, Transaction } from 'better-sqlite3';
import { CLOCK, Clock } from '../../common/clock';
import { generateId } from '../../common/id';
import {
  BookingError,
  CommandValidationError,
  ConcurrencyConflictError,
  DuplicateCommandError,
  StorageError,
  describeError
} from '../../domain/errors';
import {
  CURRENT_SCHEMA_VERSION,
  EventDraft,
  EventMetadata,
  StoredEvent
} from '../../domain/events';
import { SqliteConnection } from '../database/sqlite-connection';

const STREAM_BATCH_SIZE = 500;

interface EventRow {
  global_offset: number;
  event_id: string;
  aggregate_id: string;
  version: number;
  event_type: string;
  schema_version: number;
  command_id: string | null;
  payload_json: string;
  created_at: string;
}

interface StreamHeadRow {
  version: number;
  created_at: string;
}

interface CommandRow {
  aggregate_id: string;
}

interface InsertCommandParams {
  command_id: string;
  aggregate_id: string;
  created_at: string;
}

interface InsertEventParams {
  event_id: string;
  aggregate_id: string;
  version: number;
  event_type: string;
  schema_version: number;
  command_id: string | null;
  payload_json: string;
  created_at: string;
}

export interface AppendOptions {
  commandId?: string | null;
}

type AppendBatch = (
  aggregateId: string,
  expectedVersion: number,
  drafts: readonly EventDraft[],
  commandId: string | null
) => StoredEvent[];

/**
 * Append-only event log. Each append is one SQLite transaction: the version
 * check and every insert of the batch commit together or not at all.
 */
@Injectable()
export class SqliteEventLog {
  private readonly logger = new Logger(SqliteEventLog.name);
  private readonly db: BetterSqlite3Database;
  private readonly insertStmt: Statement<[InsertEventParams]>;
  private readonly headStmt: Statement<[{ aggregate_id: string }], StreamHeadRow>;
  private readonly streamStmt: Statement<[{ aggregate_id: string; from_version: number }], EventRow>;
  private readonly allStmt: Statement<[{ from_offset: number; limit: number }], EventRow>;
  private readonly byCommandStmt: Statement<[{ command_id: string }], EventRow>;
  private readonly commandStmt: Statement<[{ command_id: string }], CommandRow>;
  private readonly insertCommandStmt: Statement<[InsertCommandParams]>;
  private readonly appendBatch: Transaction<AppendBatch>;

  constructor(
    private readonly database: SqliteConnection,
    @Inject(CLOCK) private readonly clock: Clock
  ) {
    this.db = this.database.connection;
    this.initialize();

    this.insertStmt = this.db.prepare<InsertEventParams>(`
      INSERT INTO events (
        event_id,
        aggregate_id,
        version,
        event_type,
        schema_version,
        command_id,
        payload_json,
        created_at
      ) VALUES (
        @event_id,
        @aggregate_id,
        @version,
        @event_type,
        @schema_version,
        @command_id,
        @payload_json,
        @created_at
      );
    `);

    this.headStmt = this.db.prepare<{ aggregate_id: string }, StreamHeadRow>(`
      SELECT version, created_at
      FROM events
      WHERE aggregate_id = @aggregate_id
      ORDER BY version DESC
      LIMIT 1
    `);

    this.streamStmt = this.db.prepare<{ aggregate_id: string; from_version: number }, EventRow>(`
      SELECT *
      FROM events
      WHERE aggregate_id = @aggregate_id AND version >= @from_version
      ORDER BY version ASC
    `);

    this.allStmt = this.db.prepare<{ from_offset: number; limit: number }, EventRow>(`
      SELECT *
      FROM events
      WHERE global_offset >= @from_offset
      ORDER BY global_offset ASC
      LIMIT @limit
    `);

    this.byCommandStmt = this.db.prepare<{ command_id: string }, EventRow>(`
      SELECT *
      FROM events
      WHERE command_id = @command_id
      ORDER BY global_offset ASC
    `);

    this.commandStmt = this.db.prepare<{ command_id: string }, CommandRow>(`
      SELECT aggregate_id FROM commands WHERE command_id = @command_id
    `);

    this.insertCommandStmt = this.db.prepare<InsertCommandParams>(`
      INSERT INTO commands (command_id, aggregate_id, created_at)
      VALUES (@command_id, @aggregate_id, @created_at);
    `);

    this.appendBatch = this.db.transaction<AppendBatch>((aggregateId, expectedVersion, drafts, commandId) =>
      this.writeBatch(aggregateId, expectedVersion, drafts, commandId)
    );
  }

  async append(
    aggregateId: string,
    expectedVersion: number,
    drafts: readonly EventDraft[],
    options: AppendOptions = {}
  ): Promise<StoredEvent[]> {
    if (drafts.length === 0) {
      throw new CommandValidationError(`append to ${aggregateId} needs at least one event`);
    }
    if (!Number.isInteger(expectedVersion) || expectedVersion < 0) {
      throw new CommandValidationError(`expected version must be a non-negative integer`, [
        `expectedVersion ${expectedVersion}`
      ]);
    }

    const commandId = options.commandId ?? null;
    try {
      return this.appendBatch(aggregateId, expectedVersion, drafts, commandId);
    } catch (error: unknown) {
      if (error instanceof BookingError) {
        throw error;
      }

      if (isUniqueViolation(error)) {
        const recorded = commandId === null ? undefined : this.commandStmt.get({ command_id: commandId });
        if (commandId !== null && recorded) {
          throw new DuplicateCommandError(commandId, recorded.aggregate_id);
        }
        throw new ConcurrencyConflictError(aggregateId, expectedVersion, this.currentVersion(aggregateId));
      }

      this.logger.error(
        `Append of ${drafts.length} event(s) to ${aggregateId} failed: ${describeError(error)}`,
        error instanceof Error ? error.stack : undefined
      );
      throw new StorageError(
        `could not append to ${aggregateId}: ${describeError(error)}`,
        { aggregateId, expectedVersion },
        { cause: error }
      );
    }
  }

  async read(aggregateId: string, fromVersion = 1): Promise<StoredEvent[]> {
    return this.guardRead(() =>
      this.streamStmt
        .all({ aggregate_id: aggregateId, from_version: fromVersion })
        .map(toStoredEvent)
    );
  }

  /** Events in global append order, starting at `fromOffset` inclusive. */
  async readAll(fromOffset = 0, limit?: number): Promise<StoredEvent[]> {
    return this.guardRead(() =>
      this.allStmt.all({ from_offset: fromOffset, limit: limit ?? -1 }).map(toStoredEvent)
    );
  }

  async *stream(fromOffset = 0): AsyncGenerator<StoredEvent> {
    let next = fromOffset;
    for (;;) {
      const batch = await this.readAll(next, STREAM_BATCH_SIZE);
      for (const event of batch) {
        yield event;
      }

      if (batch.length < STREAM_BATCH_SIZE) {
        return;
      }
      next = batch[batch.length - 1].offset + 1;
    }
  }

  async findByCommandId(commandId: string): Promise<StoredEvent[]> {
    return this.guardRead(() => this.byCommandStmt.all({ command_id: commandId }).map(toStoredEvent));
  }

  currentVersion(aggregateId: string): number {
    return this.headStmt.get({ aggregate_id: aggregateId })?.version ?? 0;
  }

  private writeBatch(
    aggregateId: string,
    expectedVersion: number,
    drafts: readonly EventDraft[],
    commandId: string | null
  ): StoredEvent[] {
    const head = this.headStmt.get({ aggregate_id: aggregateId });
    const currentVersion = head?.version ?? 0;
    if (currentVersion !== expectedVersion) {
      throw new ConcurrencyConflictError(aggregateId, expectedVersion, currentVersion);
    }

    // Timestamps never run backwards within a stream, whatever the wall clock does.
    const ts = laterOf(this.clock.now(), head?.created_at);

    // A command id claims at most one batch, whichever stream it lands in.
    if (commandId !== null) {
      const recorded = this.commandStmt.get({ command_id: commandId });
      if (recorded) {
        throw new DuplicateCommandError(commandId, recorded.aggregate_id);
      }
      this.insertCommandStmt.run({ command_id: commandId, aggregate_id: aggregateId, created_at: ts });
    }

    return drafts.map((draft, index) => {
      const payloadJson = JSON.stringify(draft.payload);
      const metadata: EventMetadata = {
        eventId: generateId(),
        aggregateId,
        version: expectedVersion + index + 1,
        ts,
        schemaVersion: draft.schemaVersion ?? CURRENT_SCHEMA_VERSION,
        commandId
      };

      const result = this.insertStmt.run({
        event_id: metadata.eventId,
        aggregate_id: aggregateId,
        version: metadata.version,
        event_type: draft.type,
        schema_version: metadata.schemaVersion,
        command_id: commandId,
        payload_json: payloadJson,
        created_at: ts
      });

      return {
        type: draft.type,
        payload: parsePayload(payloadJson, metadata.eventId),
        metadata,
        offset: Number(result.lastInsertRowid)
      };
    });
  }

  private guardRead<T>(read: () => T): T {
    try {
      return read();
    } catch (error: unknown) {
      if (error instanceof BookingError) {
        throw error;
      }

      throw new StorageError(`could not read events: ${describeError(error)}`, {}, { cause: error });
    }
  }

  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS events (
        global_offset INTEGER PRIMARY KEY AUTOINCREMENT,
        event_id TEXT NOT NULL UNIQUE,
        aggregate_id TEXT NOT NULL,
        version INTEGER NOT NULL CHECK (version >= 1),
        event_type TEXT NOT NULL,
        schema_version INTEGER NOT NULL,
        command_id TEXT,
        payload_json TEXT NOT NULL,
        created_at TEXT NOT NULL,
        UNIQUE (aggregate_id, version)
      );

      CREATE INDEX IF NOT EXISTS idx_events_command_id
        ON events(command_id)
        WHERE command_id IS NOT NULL;

      CREATE TABLE IF NOT EXISTS commands (
        command_id TEXT PRIMARY KEY,
        aggregate_id TEXT NOT NULL,
        created_at TEXT NOT NULL
      );

      INSERT OR IGNORE INTO commands (command_id, aggregate_id, created_at)
        SELECT command_id, aggregate_id, MIN(created_at)
        FROM events
        WHERE command_id IS NOT NULL
        GROUP BY command_id;

      CREATE TRIGGER IF NOT EXISTS events_no_update
        BEFORE UPDATE ON events
        BEGIN
          SELECT RAISE(ABORT, 'events are append-only');
        END;

      CREATE TRIGGER IF NOT EXISTS events_no_delete
        BEFORE DELETE ON events
        BEGIN
          SELECT RAISE(ABORT, 'events are append-only');
        END;
    `);
  }
}

function toStoredEvent(row: EventRow): StoredEvent {
  return {
    type: row.event_type,
    payload: parsePayload(row.payload_json, row.event_id),
    metadata: {
      eventId: row.event_id,
      aggregateId: row.aggregate_id,
      version: row.version,
      ts: row.created_at,
      schemaVersion: row.schema_version,
      commandId: row.command_id
    },
    offset: row.global_offset
  };
}

function parsePayload(json: string, eventId: string): Record<string, unknown> {
  const value: unknown = JSON.parse(json);
  if (!isRecord(value)) {
    throw new StorageError(`payload of event ${eventId} is not an object`, { eventId });
  }

  return value;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function laterOf(candidate: string, previous: string | undefined): string {
  if (previous === undefined) {
    return candidate;
  }

  return Date.parse(previous) > Date.parse(candidate) ? previous : candidate;
}

function isUniqueViolation(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('SQLITE_CONSTRAINT')
  );
}
