import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  NotFoundError,
  SignatureInvalidError,
  ValidationError,
} from '../../common/errors';
import { PaymentSignatureService } from '../../common/services/payment-signature.service';
import {
  BOOKING_RECORD_STORE,
  BookingRecordStore,
} from '../booking/booking-record-store.interface';
import {
  BookingRecord,
  BookingStatus,
  ClosureReason,
  seatIdsOf,
} from '../booking/booking.types';
import { HOLD_STORE, HoldStore } from '../hold/hold-store.interface';
import {
  NOTIFICATION_DISPATCHER,
  NotificationDispatcher,
  NotificationKind,
} from '../notification/notification-dispatcher.interface';
import {
  PaymentConfirmation,
  PaymentOutcome,
  VerificationResult,
} from './interfaces/payment-outcome.interface';
import {
  ProviderEvent,
  ProviderEventType,
  parseProviderEvent,
} from './webhook-event.parser';

/**
 * PaymentVerifier settles payments against PENDING bookings.
 *
 * Two entry points reach the same settlement routine: the client redirect
 * (`confirm`) and the provider webhook (`handleNotification`). They may
 * deliver the same payment concurrently. `payment_received_at` is the
 * idempotency guard and every status change is a conditional write from
 * PENDING, so whichever arrives first settles the booking and the other
 * becomes a `duplicate`.
 *
 * Settlement order for a captured payment:
 * 1. Already recorded -> duplicate
 * 2. Booking already closed -> record the payment, queue a refund
 * 3. Received after expires_at -> FAILED (late_payment), queue a refund
 * 4. Seats confirmed by another booking -> FAILED (seat_conflict), queue a refund
 * 5. Otherwise CONFIRMED, hold released, confirmation queued
 *
 * A late payment never confirms, however the two entry points interleave.
 */
@Injectable()
export class PaymentVerifier {
  private readonly logger = new Logger(PaymentVerifier.name);

  constructor(
    @Inject(BOOKING_RECORD_STORE)
    private readonly bookingStore: BookingRecordStore,
    @Inject(HOLD_STORE)
    private readonly holdStore: HoldStore,
    @Inject(NOTIFICATION_DISPATCHER)
    private readonly notificationDispatcher: NotificationDispatcher,
    private readonly signatureService: PaymentSignatureService,
  ) {}

  /**
   * Synchronous confirmation from the checkout redirect
   *
   * @throws SignatureInvalidError without touching the booking or its hold
   * @throws NotFoundError when no booking carries the order id
   */
  async confirm(
    confirmation: PaymentConfirmation,
    receivedAt: Date = new Date(),
  ): Promise<VerificationResult> {
    const { externalOrderId, externalPaymentId, signature } = confirmation;

    if (
      !this.signatureService.verifyPaymentSignature(
        externalOrderId,
        externalPaymentId,
        signature,
      )
    ) {
      throw new SignatureInvalidError();
    }

    const booking = await this.bookingStore.findByExternalOrderId(
      externalOrderId,
    );
    if (!booking) {
      throw new NotFoundError('BOOKING', externalOrderId);
    }

    return this.settleCapture(booking, externalPaymentId, receivedAt);
  }

  /**
   * Asynchronous provider notification. The signature covers the raw body
   * exactly as received.
   *
   * @throws SignatureInvalidError for an unsigned or forged body
   * @throws ValidationError when a signed body is not a notification
   */
  async handleNotification(
    rawBody: Buffer,
    signatureHeader: string | undefined,
    receivedAt: Date = new Date(),
  ): Promise<VerificationResult> {
    if (!this.signatureService.verifyWebhookSignature(rawBody, signatureHeader)) {
      throw new SignatureInvalidError();
    }

    let body: unknown;
    try {
      body = JSON.parse(rawBody.toString('utf8'));
    } catch {
      throw new ValidationError(
        'INVALID_WEBHOOK_PAYLOAD',
        'Webhook body is not valid JSON',
      );
    }

    const event = parseProviderEvent(body);
    if (!event) {
      throw new ValidationError(
        'INVALID_WEBHOOK_PAYLOAD',
        'Webhook body has no event',
      );
    }

    switch (event.event) {
      case ProviderEventType.PAYMENT_CAPTURED:
        return this.onCaptured(event, receivedAt);
      case ProviderEventType.PAYMENT_FAILED:
        return this.onFailed(event, receivedAt);
      default:
        this.logger.debug(`Webhook event acknowledged: ${event.event}`);
        return { outcome: PaymentOutcome.IGNORED, booking: null };
    }
  }

  private async onCaptured(
    event: ProviderEvent,
    receivedAt: Date,
  ): Promise<VerificationResult> {
    const booking = await this.findForEvent(event);
    if (!booking || !event.externalPaymentId) {
      return { outcome: PaymentOutcome.IGNORED, booking };
    }

    return this.settleCapture(booking, event.externalPaymentId, receivedAt);
  }

  private async onFailed(
    event: ProviderEvent,
    receivedAt: Date,
  ): Promise<VerificationResult> {
    const booking = await this.findForEvent(event);
    if (!booking) {
      return { outcome: PaymentOutcome.IGNORED, booking: null };
    }

    if (booking.paymentReceivedAt || booking.status !== BookingStatus.PENDING) {
      this.logger.debug(
        `payment.failed no-op - bookingId: ${booking.id}, status: ${booking.status}`,
      );
      return { outcome: PaymentOutcome.IGNORED, booking };
    }

    const failed = await this.bookingStore.transition(
      booking.id,
      BookingStatus.PENDING,
      BookingStatus.FAILED,
      {
        closedAt: receivedAt,
        closureReason: ClosureReason.PAYMENT_FAILED,
        ...(event.externalPaymentId
          ? { externalPaymentId: event.externalPaymentId }
          : {}),
      },
    );

    if (!failed) {
      const current = await this.bookingStore.findById(booking.id);
      return { outcome: PaymentOutcome.IGNORED, booking: current ?? booking };
    }

    this.logger.log(
      `Payment failed - bookingId: ${failed.id}, reason: ${event.errorDescription ?? 'not given'}`,
    );
    await this.releaseHold(failed);
    this.notificationDispatcher.enqueue(NotificationKind.PAYMENT_FAILED, failed.id);

    return { outcome: PaymentOutcome.PAYMENT_FAILED, booking: failed };
  }

  private async findForEvent(
    event: ProviderEvent,
  ): Promise<BookingRecord | null> {
    if (!event.externalOrderId) {
      this.logger.warn(`Webhook ${event.event} without an order id`);
      return null;
    }

    const booking = await this.bookingStore.findByExternalOrderId(
      event.externalOrderId,
    );
    if (!booking) {
      this.logger.warn(
        `Webhook ${event.event} for unknown order ${event.externalOrderId}`,
      );
    }
    return booking;
  }

  private async settleCapture(
    booking: BookingRecord,
    externalPaymentId: string,
    receivedAt: Date,
  ): Promise<VerificationResult> {
    if (booking.paymentReceivedAt) {
      this.logger.debug(
        `Duplicate confirmation - bookingId: ${booking.id}, status: ${booking.status}`,
      );
      return { outcome: PaymentOutcome.DUPLICATE, booking };
    }

    if (booking.status !== BookingStatus.PENDING) {
      return this.recordOnClosed(booking, externalPaymentId, receivedAt);
    }

    if (receivedAt.getTime() > booking.expiresAt.getTime()) {
      this.logger.warn(
        `Late payment - bookingId: ${booking.id}, receivedAt: ${receivedAt.toISOString()}, expiresAt: ${booking.expiresAt.toISOString()}`,
      );
      return this.failWithRefund(
        booking,
        ClosureReason.LATE_PAYMENT,
        externalPaymentId,
        receivedAt,
      );
    }

    const conflictingSeats = await this.bookingStore.findConfirmedSeatIds(
      booking.showtimeId,
      seatIdsOf(booking),
    );
    if (conflictingSeats.length > 0) {
      this.logger.warn(
        `Seat conflict on payment - bookingId: ${booking.id}, seats: ${conflictingSeats.join(',')}`,
      );
      const result = await this.failWithRefund(
        booking,
        ClosureReason.SEAT_CONFLICT,
        externalPaymentId,
        receivedAt,
      );
      return result.outcome === PaymentOutcome.SEAT_CONFLICT
        ? { ...result, conflictingSeats }
        : result;
    }

    const confirmed = await this.bookingStore.transition(
      booking.id,
      BookingStatus.PENDING,
      BookingStatus.CONFIRMED,
      {
        externalPaymentId,
        paymentReceivedAt: receivedAt,
        confirmedAt: receivedAt,
      },
    );

    if (!confirmed) {
      return this.afterLostRace(booking.id, externalPaymentId, receivedAt);
    }

    this.logger.log(
      `Booking confirmed - bookingId: ${confirmed.id}, paymentId: ${externalPaymentId}`,
    );
    await this.releaseHold(confirmed);
    this.notificationDispatcher.enqueue(
      NotificationKind.BOOKING_CONFIRMATION,
      confirmed.id,
    );

    return { outcome: PaymentOutcome.CONFIRMED, booking: confirmed };
  }

  private async failWithRefund(
    booking: BookingRecord,
    reason: ClosureReason.LATE_PAYMENT | ClosureReason.SEAT_CONFLICT,
    externalPaymentId: string,
    receivedAt: Date,
  ): Promise<VerificationResult> {
    const failed = await this.bookingStore.transition(
      booking.id,
      BookingStatus.PENDING,
      BookingStatus.FAILED,
      {
        externalPaymentId,
        paymentReceivedAt: receivedAt,
        closedAt: receivedAt,
        closureReason: reason,
      },
    );

    if (!failed) {
      return this.afterLostRace(booking.id, externalPaymentId, receivedAt);
    }

    await this.releaseHold(failed);
    this.notificationDispatcher.enqueue(NotificationKind.REFUND_INTENT, failed.id);

    return {
      outcome:
        reason === ClosureReason.LATE_PAYMENT
          ? PaymentOutcome.LATE_PAYMENT
          : PaymentOutcome.SEAT_CONFLICT,
      booking: failed,
    };
  }

  /**
   * Money arrived for a booking that left PENDING without a payment
   * (expired by the reconciler, cancelled, failed). The payment is recorded
   * once and refunded; the status stays as it is.
   */
  private async recordOnClosed(
    booking: BookingRecord,
    externalPaymentId: string,
    receivedAt: Date,
  ): Promise<VerificationResult> {
    const recorded = await this.bookingStore.recordPaymentOnClosed(
      booking.id,
      externalPaymentId,
      receivedAt,
    );

    if (!recorded) {
      const current = await this.bookingStore.findById(booking.id);
      return { outcome: PaymentOutcome.DUPLICATE, booking: current ?? booking };
    }

    this.logger.warn(
      `Payment for closed booking - bookingId: ${recorded.id}, status: ${recorded.status}, refund queued`,
    );
    this.notificationDispatcher.enqueue(
      NotificationKind.REFUND_INTENT,
      recorded.id,
    );

    return {
      outcome:
        receivedAt.getTime() > recorded.expiresAt.getTime()
          ? PaymentOutcome.LATE_PAYMENT
          : PaymentOutcome.NOT_PAYABLE,
      booking: recorded,
    };
  }

  /**
   * Our conditional write found the booking no longer PENDING. Either a
   * concurrent delivery settled it (duplicate) or it was closed without a
   * payment, in which case this payment is recorded and refunded.
   */
  private async afterLostRace(
    bookingId: string,
    externalPaymentId: string,
    receivedAt: Date,
  ): Promise<VerificationResult> {
    const current = await this.bookingStore.findById(bookingId);
    if (!current) {
      throw new NotFoundError('BOOKING', bookingId);
    }

    if (current.paymentReceivedAt || current.status === BookingStatus.PENDING) {
      this.logger.debug(
        `Settlement race lost - bookingId: ${bookingId}, status: ${current.status}`,
      );
      return { outcome: PaymentOutcome.DUPLICATE, booking: current };
    }

    return this.recordOnClosed(current, externalPaymentId, receivedAt);
  }

  /**
   * Holds are released by holder id, so a seat re-held by someone else
   * is left alone. A failure leaves the seats to their TTL.
   */
  private async releaseHold(booking: BookingRecord): Promise<void> {
    try {
      await this.holdStore.release(
        booking.showtimeId,
        seatIdsOf(booking),
        booking.id,
      );
    } catch (error) {
      this.logger.error(
        `Hold release failed - bookingId: ${booking.id}, seats expire by TTL: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
  }
}
