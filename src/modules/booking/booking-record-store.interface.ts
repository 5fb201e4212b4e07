import {
  BookingRecord,
  BookingStatus,
  BookingTransitionFields,
  NewBooking,
} from './booking.types';

export const BOOKING_RECORD_STORE = 'BOOKING_RECORD_STORE';

/**
 * Durable booking storage. Every status change is a conditional write on
 * the expected current status; a write whose condition no longer holds
 * resolves to null and changes nothing.
 */
export interface BookingRecordStore {
  /** Allocate an id before the booking exists, so holds can name it */
  nextId(): string;

  create(booking: NewBooking): Promise<BookingRecord>;

  findById(bookingId: string): Promise<BookingRecord | null>;

  findByExternalOrderId(externalOrderId: string): Promise<BookingRecord | null>;

  findPendingByUserAndShowtime(
    userId: string,
    showtimeId: string,
  ): Promise<BookingRecord[]>;

  /**
   * Seat ids that belong to CONFIRMED bookings of the showtime, limited to
   * `seatIds` when given
   */
  findConfirmedSeatIds(showtimeId: string, seatIds?: string[]): Promise<string[]>;

  /** PENDING bookings whose expires_at is before `now`, oldest first */
  findExpiredPending(now: Date, limit: number): Promise<BookingRecord[]>;

  /**
   * Move the booking from `from` to `to` if it is still in `from`
   */
  transition(
    bookingId: string,
    from: BookingStatus,
    to: BookingStatus,
    fields: BookingTransitionFields,
  ): Promise<BookingRecord | null>;

  /**
   * Attach the provider order id if the booking is PENDING and has none yet
   */
  setExternalOrderId(
    bookingId: string,
    externalOrderId: string,
  ): Promise<BookingRecord | null>;

  /**
   * Record a payment against a booking that is already closed. Applies only
   * while no payment is on record; the status is left unchanged.
   */
  recordPaymentOnClosed(
    bookingId: string,
    externalPaymentId: string,
    receivedAt: Date,
  ): Promise<BookingRecord | null>;
}
