import { IsInt, IsNotEmpty, IsString, IsUUID, MaxLength, Min } from 'class-validator';
import { IsOmittable } from './formats';

export class CancelBookingCommand {
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
  @IsString()
  @MaxLength(500)
  reason?: string;
}
