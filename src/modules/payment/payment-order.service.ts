import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ExpiredError,
  ForbiddenError,
  GatewayError,
  NotFoundError,
  ValidationError,
} from '../../common/errors';
import {
  BOOKING_RECORD_STORE,
  BookingRecordStore,
} from '../booking/booking-record-store.interface';
import { BookingRecord, BookingStatus } from '../booking/booking.types';
import {
  PAYMENT_GATEWAY,
  PaymentGatewayAdapter,
} from './gateway/payment-gateway.interface';
import { PaymentOrder } from './interfaces/payment-order.interface';

const DEFAULT_MAX_RETRIES = 2;
const DEFAULT_RETRY_DELAY_MS = 200;

/**
 * PaymentOrderService opens a provider order for a PENDING booking.
 *
 * - One order per booking: a booking that already has an order id gets it
 *   back without another gateway call
 * - Retryable gateway failures are retried with exponential backoff and
 *   jitter; the last error is rethrown
 * - The order id is attached with a conditional write, so two concurrent
 *   requests end up returning the same id
 *
 * No lock is held while the gateway call is in flight.
 */
@Injectable()
export class PaymentOrderService {
  private readonly logger = new Logger(PaymentOrderService.name);
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly keyId: string;

  constructor(
    @Inject(BOOKING_RECORD_STORE)
    private readonly bookingStore: BookingRecordStore,
    @Inject(PAYMENT_GATEWAY)
    private readonly gateway: PaymentGatewayAdapter,
    configService: ConfigService,
  ) {
    this.maxRetries =
      configService.get<number>('PAYMENT_GATEWAY_MAX_RETRIES') ??
      DEFAULT_MAX_RETRIES;
    this.retryDelayMs =
      configService.get<number>('PAYMENT_GATEWAY_RETRY_DELAY_MS') ??
      DEFAULT_RETRY_DELAY_MS;
    this.keyId = configService.get<string>('PAYMENT_KEY_ID') ?? '';
  }

  /**
   * @throws NotFoundError / ForbiddenError for unknown or foreign bookings
   * @throws ValidationError BOOKING_NOT_PENDING once the booking is closed
   * @throws ExpiredError when the hold window has passed
   * @throws GatewayError when the provider keeps failing
   */
  async createOrder(
    bookingId: string,
    userId: string,
    now: Date = new Date(),
  ): Promise<PaymentOrder> {
    const booking = await this.bookingStore.findById(bookingId);

    if (!booking) {
      throw new NotFoundError('BOOKING', bookingId);
    }
    if (booking.userId !== userId) {
      throw new ForbiddenError();
    }
    if (booking.status !== BookingStatus.PENDING) {
      throw new ValidationError(
        'BOOKING_NOT_PENDING',
        `Booking is ${booking.status} and cannot be paid`,
        { status: booking.status },
      );
    }
    if (booking.expiresAt.getTime() <= now.getTime()) {
      throw new ExpiredError(booking.id);
    }

    if (booking.externalOrderId) {
      this.logger.debug(
        `Reusing order - bookingId: ${booking.id}, orderId: ${booking.externalOrderId}`,
      );
      return this.toPaymentOrder(booking, booking.externalOrderId, true);
    }

    const { externalOrderId } = await this.createWithRetry(booking);

    const updated = await this.bookingStore.setExternalOrderId(
      booking.id,
      externalOrderId,
    );
    if (updated) {
      this.logger.log(
        `Payment order created - bookingId: ${booking.id}, orderId: ${externalOrderId}`,
      );
      return this.toPaymentOrder(updated, externalOrderId, false);
    }

    // Another request attached its order first, or the booking closed
    const current = await this.bookingStore.findById(booking.id);
    if (current?.status === BookingStatus.PENDING && current.externalOrderId) {
      this.logger.debug(
        `Order race lost - bookingId: ${booking.id}, discarded: ${externalOrderId}, kept: ${current.externalOrderId}`,
      );
      return this.toPaymentOrder(current, current.externalOrderId, true);
    }

    const status = current?.status ?? booking.status;
    throw new ValidationError(
      'BOOKING_NOT_PENDING',
      `Booking is ${status} and cannot be paid`,
      { status },
    );
  }

  private async createWithRetry(
    booking: BookingRecord,
  ): Promise<{ externalOrderId: string }> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.gateway.createOrder({
          amount: booking.totalAmount,
          currency: booking.currency,
          receipt: booking.bookingCode,
          notes: { booking_id: booking.id },
        });
      } catch (error) {
        const retryable = error instanceof GatewayError && error.retryable;

        if (!retryable || attempt >= this.maxRetries) {
          this.logger.error(
            `Gateway order failed - bookingId: ${booking.id}, attempts: ${attempt + 1}, error: ${error instanceof Error ? error.message : 'Unknown error'}`,
          );
          throw error;
        }

        const backoffDelay = this.calculateBackoff(this.retryDelayMs, attempt);
        this.logger.warn(
          `Gateway order failed for ${booking.id}, retrying in ${backoffDelay}ms (attempt ${attempt + 1}/${this.maxRetries})`,
        );
        await this.sleep(backoffDelay);
      }
    }
  }

  private toPaymentOrder(
    booking: BookingRecord,
    externalOrderId: string,
    reused: boolean,
  ): PaymentOrder {
    return {
      bookingId: booking.id,
      externalOrderId,
      amount: booking.totalAmount,
      currency: booking.currency,
      keyId: this.keyId,
      expiresAt: booking.expiresAt,
      reused,
    };
  }

  /**
   * Calculate exponential backoff delay
   * Formula: baseDelay * 2^attempt with 0-50% jitter
   */
  private calculateBackoff(baseDelay: number, attempt: number): number {
    const exponentialDelay = baseDelay * Math.pow(2, attempt);
    const jitter = Math.random() * exponentialDelay * 0.5;
    return Math.floor(exponentialDelay + jitter);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
