import { IsIn, IsNotEmpty, IsOptional, IsString } from 'class-validator';
import type { BookingStatus } from '../aggregates/booking';

export const BOOKING_STATUSES: readonly BookingStatus[] = ['confirmed', 'cancelled'];

export class ListBookingsQuery {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  userId?: string;

  @IsOptional()
  @IsIn(BOOKING_STATUSES)
  status?: BookingStatus;
}
