import {
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Matches,
  Max,
  Min,
  MinLength
} from 'class-validator';
import type { BookingType } from '../aggregates/booking';
import { BOOKING_TYPES } from '../commands/create-booking';
import { ISO_DATE } from '../commands/formats';

export class OfferSearchCriteria {
  @IsOptional()
  @IsIn(BOOKING_TYPES)
  bookingType?: BookingType;

  @IsOptional()
  @IsString()
  @MinLength(2)
  origin?: string;

  @IsString()
  @MinLength(2)
  destination!: string;

  @Matches(ISO_DATE)
  departDate!: string;

  @IsInt()
  @Min(1)
  @Max(9)
  passengers: number = 1;

  @IsOptional()
  @IsNumber()
  @IsPositive()
  maxPrice?: number;
}
