import { SeatType } from '../showtime/showtime.schema';

/**
 * Booking status
 * - pending: seats are held, waiting for payment
 * - confirmed: payment verified, seats belong to the booking
 * - failed: payment arrived but could not confirm (late, conflicting, declined)
 * - expired: hold window passed without payment
 * - cancelled: released by the user or superseded by a newer selection
 */
export enum BookingStatus {
  PENDING = 'pending',
  CONFIRMED = 'confirmed',
  FAILED = 'failed',
  EXPIRED = 'expired',
  CANCELLED = 'cancelled',
}

export enum ClosureReason {
  LATE_PAYMENT = 'late_payment',
  SEAT_CONFLICT = 'seat_conflict',
  PAYMENT_FAILED = 'payment_failed',
  HOLD_EXPIRED = 'hold_expired',
  SUPERSEDED = 'superseded',
  USER_CANCELLED = 'user_cancelled',
}

export interface BookingSeat {
  seatId: string;
  seatType: SeatType;
  /** Minor currency units */
  price: number;
}

export interface PriceBreakdown {
  baseAmount: number;
  feeAmount: number;
  taxAmount: number;
  totalAmount: number;
  currency: string;
}

/**
 * A booking as the services see it, independent of the store
 */
export interface BookingRecord extends PriceBreakdown {
  id: string;
  bookingCode: string;
  userId: string;
  showtimeId: string;
  seats: BookingSeat[];
  status: BookingStatus;
  externalOrderId: string | null;
  externalPaymentId: string | null;
  paymentReceivedAt: Date | null;
  readonly expiresAt: Date;
  createdAt: Date;
  confirmedAt: Date | null;
  closedAt: Date | null;
  closureReason: ClosureReason | null;
}

/**
 * Everything needed to persist a new PENDING booking
 */
export interface NewBooking extends PriceBreakdown {
  id: string;
  bookingCode: string;
  userId: string;
  showtimeId: string;
  seats: BookingSeat[];
  expiresAt: Date;
  createdAt: Date;
}

/**
 * Fields a status transition may write. There is no `expiresAt`: it is
 * fixed when the booking is created.
 */
export interface BookingTransitionFields {
  externalPaymentId?: string;
  paymentReceivedAt?: Date;
  confirmedAt?: Date;
  closedAt?: Date;
  closureReason?: ClosureReason;
}

export function seatIdsOf(booking: Pick<BookingRecord, 'seats'>): string[] {
  return booking.seats.map((seat) => seat.seatId);
}
