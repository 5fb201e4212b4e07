import { SeatType } from '../../showtime/showtime.schema';
import { BookingStatus, ClosureReason } from '../booking.types';

export interface BookingSeatResponse {
  seat_id: string;
  seat_type: SeatType;
  price: number;
}

/**
 * Booking as returned over HTTP. Amounts are minor currency units.
 */
export interface BookingResponse {
  booking_id: string;
  booking_code: string;
  showtime_id: string;
  seats: BookingSeatResponse[];
  status: BookingStatus;
  base_amount: number;
  fee_amount: number;
  tax_amount: number;
  total_amount: number;
  currency: string;
  external_order_id: string | null;
  expires_at: string;
  created_at: string;
  confirmed_at: string | null;
  closed_at: string | null;
  closure_reason: ClosureReason | null;
}
