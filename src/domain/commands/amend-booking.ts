import {
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  IsUUID,
  Matches,
  Max,
  MaxLength,
  Min
} from 'class-validator';
import { ISO_DATE, IsOmittable } from './formats';

export class AmendBookingCommand {
  @IsOmittable()
  @IsUUID()
  commandId?: string;

  @IsString()
  @IsNotEmpty()
  bookingId!: string;

  @IsOmittable()
  @IsInt()
  @Min(1)
  expectedVersion?: number;

  @IsOmittable()
  @Matches(ISO_DATE)
  departDate?: string;

  // null removes the return leg
  @IsOptional()
  @Matches(ISO_DATE)
  returnDate?: string | null;

  @IsOmittable()
  @IsInt()
  @Min(1)
  @Max(9)
  passengers?: number;

  @IsOmittable()
  @IsNumber()
  @IsPositive()
  price?: number;

  @IsOmittable()
  @IsString()
  @MaxLength(500)
  reason?: string;
}
