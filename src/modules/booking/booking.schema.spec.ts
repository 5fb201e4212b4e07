import { Types, model } from 'mongoose';
import { SeatType } from '../showtime/showtime.schema';
import { toBookingRecord, toTransitionSet } from './booking.mapper';
import { Booking, BookingSchema } from './booking.schema';
import { BookingStatus, ClosureReason } from './booking.types';

const BookingModel = model<Booking>('BookingSchemaSpec', BookingSchema);

const bookingId = new Types.ObjectId('65f1a2b3c4d5e6f708192b01');
const showtimeId = new Types.ObjectId('65f1a2b3c4d5e6f708192a3b');
const expiresAt = new Date('2029-12-31T10:12:00.000Z');

function newBooking(seatIds: string[] = ['A1', 'A2']) {
  return new BookingModel({
    _id: bookingId,
    booking_code: 'BK-TEST0001',
    user_id: 'user-1',
    showtime_id: showtimeId,
    seats: seatIds.map((seat_id) => ({
      seat_id,
      seat_type: SeatType.STANDARD,
      price: 10000,
    })),
    base_amount: 10000 * seatIds.length,
    fee_amount: 3000,
    tax_amount: 4140,
    total_amount: 27140,
    currency: 'INR',
    expires_at: expiresAt,
    created_at: new Date('2029-12-31T10:00:00.000Z'),
  });
}

describe('BookingSchema', () => {
  it('should default to PENDING with no payment on record', () => {
    const doc = newBooking();

    expect(doc.status).toBe(BookingStatus.PENDING);
    expect(doc.payment_received_at).toBeNull();
    expect(doc.external_order_id).toBeNull();
    expect(doc.validateSync()).toBeFalsy();
  });

  it('should keep expires_at once the booking has been stored', () => {
    const doc = newBooking();
    doc.isNew = false;

    doc.expires_at = new Date('2030-06-01T00:00:00.000Z');

    expect(doc.expires_at).toEqual(expiresAt);
  });

  it('should reject more than ten seats', () => {
    const seatIds = Array.from({ length: 11 }, (_, i) => `A${i + 1}`);

    const error = newBooking(seatIds).validateSync();

    expect(error?.errors.seats?.message).toBe(
      'Booking must have between 1 and 10 distinct seats',
    );
  });

  it('should reject repeated seats', () => {
    const error = newBooking(['A1', 'A1']).validateSync();

    expect(error?.errors.seats).toBeDefined();
  });
});

describe('booking mapper', () => {
  it('should map a document to a booking record', () => {
    const record = toBookingRecord(newBooking());

    expect(record).toEqual({
      id: '65f1a2b3c4d5e6f708192b01',
      bookingCode: 'BK-TEST0001',
      userId: 'user-1',
      showtimeId: '65f1a2b3c4d5e6f708192a3b',
      seats: [
        { seatId: 'A1', seatType: SeatType.STANDARD, price: 10000 },
        { seatId: 'A2', seatType: SeatType.STANDARD, price: 10000 },
      ],
      status: BookingStatus.PENDING,
      baseAmount: 20000,
      feeAmount: 3000,
      taxAmount: 4140,
      totalAmount: 27140,
      currency: 'INR',
      externalOrderId: null,
      externalPaymentId: null,
      paymentReceivedAt: null,
      expiresAt,
      createdAt: new Date('2029-12-31T10:00:00.000Z'),
      confirmedAt: null,
      closedAt: null,
      closureReason: null,
    });
  });

  it('should only set the transition fields that were given', () => {
    const closedAt = new Date('2029-12-31T10:13:00.000Z');

    expect(
      toTransitionSet({ closedAt, closureReason: ClosureReason.HOLD_EXPIRED }),
    ).toEqual({
      closed_at: closedAt,
      closure_reason: ClosureReason.HOLD_EXPIRED,
    });
  });
});
