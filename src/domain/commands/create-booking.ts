import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  IsUUID,
  Matches,
  Max,
  MinLength,
  Min,
  ValidateIf
} from 'class-validator';
import type { BookingType } from '../aggregates/booking';
import { CURRENCY_CODE, ISO_DATE, IsOmittable } from './formats';

export const BOOKING_TYPES: readonly BookingType[] = ['flight', 'hotel', 'package'];

export class CreateBookingCommand {
  @IsOmittable()
  @IsUUID()
  commandId?: string;

  @IsIn(BOOKING_TYPES)
  bookingType: BookingType = 'flight';

  @IsString()
  @IsNotEmpty()
  offerId!: string;

  @ValidateIf((command: CreateBookingCommand) => command.bookingType !== 'hotel')
  @IsString()
  @MinLength(2)
  origin?: string;

  @IsString()
  @MinLength(2)
  destination!: string;

  @Matches(ISO_DATE)
  departDate!: string;

  @IsOptional()
  @Matches(ISO_DATE)
  returnDate?: string;

  @ValidateIf((command: CreateBookingCommand) => command.bookingType !== 'flight')
  @IsString()
  @MinLength(2)
  hotelName?: string;

  @IsInt()
  @Min(1)
  @Max(9)
  passengers: number = 1;

  @IsOmittable()
  @IsNumber()
  @IsPositive()
  price?: number;

  @IsOmittable()
  @Matches(CURRENCY_CODE)
  currency?: string;

  @IsOmittable()
  @IsString()
  @IsNotEmpty()
  userId?: string;

  @IsString()
  @IsNotEmpty()
  paymentMethod: string = 'credit_card';
}
