import { BookingRecord } from './booking.types';
import { BookingResponse } from './interfaces/booking-response.interface';

export function toBookingResponse(booking: BookingRecord): BookingResponse {
  return {
    booking_id: booking.id,
    booking_code: booking.bookingCode,
    showtime_id: booking.showtimeId,
    seats: booking.seats.map((seat) => ({
      seat_id: seat.seatId,
      seat_type: seat.seatType,
      price: seat.price,
    })),
    status: booking.status,
    base_amount: booking.baseAmount,
    fee_amount: booking.feeAmount,
    tax_amount: booking.taxAmount,
    total_amount: booking.totalAmount,
    currency: booking.currency,
    external_order_id: booking.externalOrderId,
    expires_at: booking.expiresAt.toISOString(),
    created_at: booking.createdAt.toISOString(),
    confirmed_at: booking.confirmedAt?.toISOString() ?? null,
    closed_at: booking.closedAt?.toISOString() ?? null,
    closure_reason: booking.closureReason,
  };
}
