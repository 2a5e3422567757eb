import { Injectable } from '@nestjs/common';
import type { Database as BetterSqlite3Database, Statement, Transaction } from 'better-sqlite3';
import type {
  BookingStatus,
  BookingType,
  BookingView
} from '../../domain/aggregates/booking';
import { SqliteConnection } from '../database/sqlite-connection';

interface BookingRow {
  booking_id: string;
  aggregate_id: string;
  booking_type: BookingType;
  offer_id: string;
  user_id: string | null;
  origin: string | null;
  destination: string;
  depart_date: string;
  return_date: string | null;
  hotel_name: string | null;
  passengers: number;
  price: number;
  currency: string;
  payment_method: string;
  status: BookingStatus;
  cancellation_reason: string | null;
  created_at: string;
  updated_at: string;
  last_event_id: string;
  last_version: number;
}

export interface BookingFilter {
  userId?: string;
  status?: BookingStatus;
}

interface ListParams {
  user_id: string | null;
  status: BookingStatus | null;
}

/**
 * Materialised bookings. Only the projection engine writes here; commands
 * and queries read.
 */
@Injectable()
export class BookingReadModelStore {
  private readonly db: BetterSqlite3Database;
  private readonly upsertStmt: Statement<[BookingRow]>;
  private readonly byIdStmt: Statement<[{ booking_id: string }], BookingRow>;
  private readonly byAggregateStmt: Statement<[{ aggregate_id: string }], BookingRow>;
  private readonly listStmt: Statement<[ListParams], BookingRow>;
  private readonly deleteByAggregateStmt: Statement<[{ aggregate_id: string }]>;
  private readonly replaceTx: Transaction<(aggregateId: string, view: BookingView) => void>;

  constructor(private readonly database: SqliteConnection) {
    this.db = this.database.connection;
    this.initialize();

    this.upsertStmt = this.db.prepare<BookingRow>(`
      INSERT INTO bookings (
        booking_id,
        aggregate_id,
        booking_type,
        offer_id,
        user_id,
        origin,
        destination,
        depart_date,
        return_date,
        hotel_name,
        passengers,
        price,
        currency,
        payment_method,
        status,
        cancellation_reason,
        created_at,
        updated_at,
        last_event_id,
        last_version
      ) VALUES (
        @booking_id,
        @aggregate_id,
        @booking_type,
        @offer_id,
        @user_id,
        @origin,
        @destination,
        @depart_date,
        @return_date,
        @hotel_name,
        @passengers,
        @price,
        @currency,
        @payment_method,
        @status,
        @cancellation_reason,
        @created_at,
        @updated_at,
        @last_event_id,
        @last_version
      )
      ON CONFLICT(booking_id) DO UPDATE SET
        aggregate_id = excluded.aggregate_id,
        booking_type = excluded.booking_type,
        offer_id = excluded.offer_id,
        user_id = excluded.user_id,
        origin = excluded.origin,
        destination = excluded.destination,
        depart_date = excluded.depart_date,
        return_date = excluded.return_date,
        hotel_name = excluded.hotel_name,
        passengers = excluded.passengers,
        price = excluded.price,
        currency = excluded.currency,
        payment_method = excluded.payment_method,
        status = excluded.status,
        cancellation_reason = excluded.cancellation_reason,
        created_at = excluded.created_at,
        updated_at = excluded.updated_at,
        last_event_id = excluded.last_event_id,
        last_version = excluded.last_version;
    `);

    this.byIdStmt = this.db.prepare<{ booking_id: string }, BookingRow>(`
      SELECT * FROM bookings WHERE booking_id = @booking_id
    `);

    this.byAggregateStmt = this.db.prepare<{ aggregate_id: string }, BookingRow>(`
      SELECT * FROM bookings WHERE aggregate_id = @aggregate_id
    `);

    this.listStmt = this.db.prepare<ListParams, BookingRow>(`
      SELECT *
      FROM bookings
      WHERE (@user_id IS NULL OR user_id = @user_id)
        AND (@status IS NULL OR status = @status)
      ORDER BY created_at ASC, booking_id ASC
    `);

    this.deleteByAggregateStmt = this.db.prepare<{ aggregate_id: string }>(`
      DELETE FROM bookings WHERE aggregate_id = @aggregate_id
    `);

    this.replaceTx = this.db.transaction((aggregateId: string, view: BookingView) => {
      this.deleteByAggregateStmt.run({ aggregate_id: aggregateId });
      this.upsertStmt.run(toRow(view));
    });
  }

  save(view: BookingView): void {
    this.upsertStmt.run(toRow(view));
  }

  /** Drops whatever row the aggregate has and writes `view` in its place. */
  replace(aggregateId: string, view: BookingView): void {
    this.replaceTx(aggregateId, view);
  }

  getById(bookingId: string): BookingView | null {
    const row = this.byIdStmt.get({ booking_id: bookingId });
    return row ? toView(row) : null;
  }

  getByAggregateId(aggregateId: string): BookingView | null {
    const row = this.byAggregateStmt.get({ aggregate_id: aggregateId });
    return row ? toView(row) : null;
  }

  list(filter: BookingFilter = {}): BookingView[] {
    return this.listStmt
      .all({ user_id: filter.userId ?? null, status: filter.status ?? null })
      .map(toView);
  }

  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS bookings (
        booking_id TEXT PRIMARY KEY,
        aggregate_id TEXT NOT NULL,
        booking_type TEXT NOT NULL,
        offer_id TEXT NOT NULL,
        user_id TEXT,
        origin TEXT,
        destination TEXT NOT NULL,
        depart_date TEXT NOT NULL,
        return_date TEXT,
        hotel_name TEXT,
        passengers INTEGER NOT NULL,
        price REAL NOT NULL,
        currency TEXT NOT NULL,
        payment_method TEXT NOT NULL,
        status TEXT NOT NULL,
        cancellation_reason TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        last_event_id TEXT NOT NULL,
        last_version INTEGER NOT NULL
      );

      CREATE UNIQUE INDEX IF NOT EXISTS idx_bookings_aggregate_id
        ON bookings(aggregate_id);

      CREATE INDEX IF NOT EXISTS idx_bookings_user_id
        ON bookings(user_id);
    `);
  }
}

function toRow(view: BookingView): BookingRow {
  return {
    booking_id: view.bookingId,
    aggregate_id: view.aggregateId,
    booking_type: view.bookingType,
    offer_id: view.offerId,
    user_id: view.userId,
    origin: view.origin,
    destination: view.destination,
    depart_date: view.departDate,
    return_date: view.returnDate,
    hotel_name: view.hotelName,
    passengers: view.passengers,
    price: view.price,
    currency: view.currency,
    payment_method: view.paymentMethod,
    status: view.status,
    cancellation_reason: view.cancellationReason,
    created_at: view.createdAt,
    updated_at: view.updatedAt,
    last_event_id: view.lastEventId,
    last_version: view.lastVersion
  };
}

function toView(row: BookingRow): BookingView {
  return {
    bookingId: row.booking_id,
    aggregateId: row.aggregate_id,
    bookingType: row.booking_type,
    offerId: row.offer_id,
    userId: row.user_id,
    origin: row.origin,
    destination: row.destination,
    departDate: row.depart_date,
    returnDate: row.return_date,
    hotelName: row.hotel_name,
    passengers: row.passengers,
    price: row.price,
    currency: row.currency,
    paymentMethod: row.payment_method,
    status: row.status,
    cancellationReason: row.cancellation_reason,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    lastEventId: row.last_event_id,
    lastVersion: row.last_version
  };
}
