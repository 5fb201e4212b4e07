import {
  IsString,
  IsNotEmpty,
  IsArray,
  ArrayMinSize,
  ArrayMaxSize,
  ArrayUnique,
  Matches,
  IsMongoId,
  IsEnum,
  IsOptional,
} from 'class-validator';
import { SeatType } from '../../showtime/showtime.schema';

/**
 * Seat selection for a showtime
 *
 * @example
 * ```json
 * {
 *   "showtime_id": "64a7b8c9d0e1f2a3b4c5d6e7",
 *   "seats": ["A1", "A2"],
 *   "price_tier": "standard"
 * }
 * ```
 */
export class HoldSeatsDto {
  @IsMongoId({ message: 'showtime_id must be a valid ObjectId' })
  @IsNotEmpty()
  showtime_id!: string;

  /**
   * 1 to 10 distinct seats, row letter(s) followed by the seat number
   */
  @IsArray()
  @ArrayMinSize(1, { message: 'Select at least 1 seat' })
  @ArrayMaxSize(10, { message: 'At most 10 seats per booking' })
  @ArrayUnique({ message: 'Seats must be distinct' })
  @IsString({ each: true })
  @Matches(/^[A-Z]{1,2}[0-9]{1,3}$/, {
    each: true,
    message: 'Invalid seat id. Expected format: A1, B12, AA3...',
  })
  seats!: string[];

  @IsOptional()
  @IsEnum(SeatType)
  price_tier?: SeatType;
}
