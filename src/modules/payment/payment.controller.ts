import {
  Controller,
  Post,
  Body,
  Param,
  Headers,
  Req,
  HttpCode,
  HttpStatus,
  UseGuards,
} from '@nestjs/common';
import type { RawBodyRequest } from '@nestjs/common';
import type { Request } from 'express';
import {
  ConflictError,
  LatePaymentError,
  ValidationError,
} from '../../common/errors';
import { AuthGuard } from '../../common/guards/auth.guard';
import { CurrentUser } from '../../common/decorators/current-user.decorator';
import { toBookingResponse } from '../booking/booking.presenter';
import { ConfirmPaymentDto } from './dto';
import { PaymentOrderService } from './payment-order.service';
import { PaymentVerifier } from './payment-verifier.service';
import {
  PaymentOutcome,
  VerificationResult,
} from './interfaces/payment-outcome.interface';
import { PaymentOrderResponse } from './interfaces/payment-order.interface';
import { PaymentResultResponse } from './interfaces/payment-response.interface';

export const WEBHOOK_SIGNATURE_HEADER = 'x-payment-signature';

/**
 * PaymentController handles payment-related HTTP endpoints
 *
 * Endpoints:
 * - POST /api/bookings/:id/payment-order - Open a provider order for a pending booking
 * - POST /api/payments/callback - Checkout redirect confirmation (signed fields)
 * - POST /api/payments/webhook - Provider notification (signed raw body)
 *
 * The callback and the webhook may deliver the same payment; both settle
 * through PaymentVerifier, which makes the second one a no-op.
 */
@Controller()
export class PaymentController {
  constructor(
    private readonly paymentOrderService: PaymentOrderService,
    private readonly paymentVerifier: PaymentVerifier,
  ) {}

  /**
   * Open (or reuse) the provider order for a pending booking
   *
   * @example
   * POST /api/bookings/64a7b8c9d0e1f2a3b4c5d6e8/payment-order
   * Headers: { "Authorization": "Bearer token" }
   *
   * Response 201: {
   *   "booking_id": "64a7b8c9d0e1f2a3b4c5d6e8",
   *   "external_order_id": "order_4f2c9e1ab7d04e55",
   *   "amount": 27140,
   *   "currency": "INR",
   *   "key_id": "test-key-id",
   *   "expires_at": "2024-01-15T10:42:00.000Z",
   *   "reused": false
   * }
   *
   * Error 400: Booking is no longer pending
   * Error 410: Hold expired
   * Error 502: Payment provider unavailable
   */
  @Post('bookings/:id/payment-order')
  @UseGuards(AuthGuard)
  @HttpCode(HttpStatus.CREATED)
  async createPaymentOrder(
    @Param('id') bookingId: string,
    @CurrentUser('id') userId: string,
  ): Promise<PaymentOrderResponse> {
    const order = await this.paymentOrderService.createOrder(bookingId, userId);

    return {
      booking_id: order.bookingId,
      external_order_id: order.externalOrderId,
      amount: order.amount,
      currency: order.currency,
      key_id: order.keyId,
      expires_at: order.expiresAt.toISOString(),
      reused: order.reused,
    };
  }

  /**
   * Synchronous confirmation from the checkout redirect
   *
   * Response 200: { "success": true, "outcome": "confirmed", "booking": {...} }
   * Response 200: { "success": true, "outcome": "duplicate", ... } when the
   *   webhook got there first
   *
   * Error 400: Signature did not verify
   * Error 404: Unknown order
   * Error 409: LATE_PAYMENT or SEATS_NOT_AVAILABLE; the refund is already queued
   */
  @Post('payments/callback')
  @HttpCode(HttpStatus.OK)
  async confirmPayment(
    @Body() dto: ConfirmPaymentDto,
  ): Promise<PaymentResultResponse> {
    const receivedAt = new Date();
    const result = await this.paymentVerifier.confirm(
      {
        externalOrderId: dto.external_order_id,
        externalPaymentId: dto.external_payment_id,
        signature: dto.signature,
      },
      receivedAt,
    );

    if (result.booking && result.outcome === PaymentOutcome.LATE_PAYMENT) {
      throw new LatePaymentError(
        result.booking.id,
        receivedAt,
        result.booking.expiresAt,
      );
    }

    if (result.outcome === PaymentOutcome.SEAT_CONFLICT) {
      throw new ConflictError(result.conflictingSeats ?? []);
    }

    return this.toResultResponse(result);
  }

  /**
   * Provider notification. Every processed event is answered with 200 so
   * the provider stops redelivering; only signature and payload errors are not.
   *
   * @example
   * POST /api/payments/webhook
   * Headers: { "X-Payment-Signature": "<hex hmac of the raw body>" }
   * Body: {
   *   "event": "payment.captured",
   *   "payload": { "payment": { "entity": { "id": "pay_8d31c0f2e6a94b17", "order_id": "order_4f2c9e1ab7d04e55", "status": "captured" } } }
   * }
   */
  @Post('payments/webhook')
  @HttpCode(HttpStatus.OK)
  async handleWebhook(
    @Req() req: RawBodyRequest<Request>,
    @Headers(WEBHOOK_SIGNATURE_HEADER) signature?: string,
  ): Promise<PaymentResultResponse> {
    if (!req.rawBody) {
      throw new ValidationError(
        'INVALID_WEBHOOK_PAYLOAD',
        'Webhook body is missing',
      );
    }

    const result = await this.paymentVerifier.handleNotification(
      req.rawBody,
      signature,
    );
    return this.toResultResponse(result);
  }

  private toResultResponse(result: VerificationResult): PaymentResultResponse {
    return {
      success: true,
      outcome: result.outcome,
      booking: result.booking ? toBookingResponse(result.booking) : null,
    };
  }
}
