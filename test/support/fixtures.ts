import { ConfigService } from '@nestjs/config';
import { createHmac } from 'crypto';
import {
  BookingRecord,
  BookingStatus,
} from '../../src/modules/booking/booking.types';
import { SeatType } from '../../src/modules/showtime/showtime.schema';
import { SHOWTIME_ID } from './fake-showtime.catalog';

export const TEST_KEY_SECRET = 'test-secret';
export const TEST_WEBHOOK_SECRET = 'test-webhook-secret';

export const T0 = new Date('2029-12-31T10:00:00.000Z');

export function at(offsetMs: number): Date {
  return new Date(T0.getTime() + offsetMs);
}

export function createConfigService(
  overrides: Record<string, unknown> = {},
): ConfigService {
  return new ConfigService({
    HOLD_WINDOW_SECONDS: 720,
    BOOKING_FEE_MINOR: 3000,
    TAX_RATE: 0.18,
    CURRENCY: 'INR',
    PAYMENT_KEY_ID: 'test-key-id',
    PAYMENT_KEY_SECRET: TEST_KEY_SECRET,
    PAYMENT_WEBHOOK_SECRET: TEST_WEBHOOK_SECRET,
    PAYMENT_GATEWAY_MAX_RETRIES: 2,
    PAYMENT_GATEWAY_RETRY_DELAY_MS: 0,
    RECONCILER_BATCH_SIZE: 100,
    ...overrides,
  });
}

export function hmacHex(secret: string, data: string | Buffer): string {
  return createHmac('sha256', secret).update(data).digest('hex');
}

export function signPayment(orderId: string, paymentId: string): string {
  return hmacHex(TEST_KEY_SECRET, `${orderId}|${paymentId}`);
}

/**
 * A PENDING booking for A1 and A2 created at T0 with the default window
 */
export function buildBooking(
  overrides: Partial<BookingRecord> = {},
): BookingRecord {
  return {
    id: 'booking-seeded',
    bookingCode: 'BK-SEEDED01',
    userId: 'user-1',
    showtimeId: SHOWTIME_ID,
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
    expiresAt: at(720_000),
    createdAt: T0,
    confirmedAt: null,
    closedAt: null,
    closureReason: null,
    ...overrides,
  };
}
