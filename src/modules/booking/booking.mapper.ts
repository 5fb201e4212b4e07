import { Booking, BookingDocument } from './booking.schema';
import { BookingRecord, BookingTransitionFields } from './booking.types';

/**
 * Document -> domain record
 */
export function toBookingRecord(doc: BookingDocument): BookingRecord {
  return {
    id: doc._id.toString(),
    bookingCode: doc.booking_code,
    userId: doc.user_id,
    showtimeId: doc.showtime_id.toString(),
    seats: doc.seats.map((seat) => ({
      seatId: seat.seat_id,
      seatType: seat.seat_type,
      price: seat.price,
    })),
    status: doc.status,
    baseAmount: doc.base_amount,
    feeAmount: doc.fee_amount,
    taxAmount: doc.tax_amount,
    totalAmount: doc.total_amount,
    currency: doc.currency,
    externalOrderId: doc.external_order_id ?? null,
    externalPaymentId: doc.external_payment_id ?? null,
    paymentReceivedAt: doc.payment_received_at ?? null,
    expiresAt: doc.expires_at,
    createdAt: doc.created_at,
    confirmedAt: doc.confirmed_at ?? null,
    closedAt: doc.closed_at ?? null,
    closureReason: doc.closure_reason ?? null,
  };
}

export type BookingTransitionSet = Partial<
  Pick<
    Booking,
    | 'status'
    | 'external_payment_id'
    | 'payment_received_at'
    | 'confirmed_at'
    | 'closed_at'
    | 'closure_reason'
  >
>;

/**
 * Transition fields -> `$set` document. Only named fields are written.
 */
export function toTransitionSet(
  fields: BookingTransitionFields,
): BookingTransitionSet {
  const set: BookingTransitionSet = {};

  if (fields.externalPaymentId !== undefined) {
    set.external_payment_id = fields.externalPaymentId;
  }
  if (fields.paymentReceivedAt !== undefined) {
    set.payment_received_at = fields.paymentReceivedAt;
  }
  if (fields.confirmedAt !== undefined) {
    set.confirmed_at = fields.confirmedAt;
  }
  if (fields.closedAt !== undefined) {
    set.closed_at = fields.closedAt;
  }
  if (fields.closureReason !== undefined) {
    set.closure_reason = fields.closureReason;
  }

  return set;
}
