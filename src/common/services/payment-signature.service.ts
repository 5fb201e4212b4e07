import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as crypto from 'crypto';

/**
 * Verifies the HMAC-SHA256 signatures the payment provider attaches to
 * redirect callbacks and to webhook notifications.
 *
 * - Redirect callback: HMAC(key secret, "<orderId>|<paymentId>")
 * - Webhook: HMAC(webhook secret, raw request body)
 *
 * Both are hex digests compared in constant time.
 */
@Injectable()
export class PaymentSignatureService {
  private readonly logger = new Logger(PaymentSignatureService.name);

  constructor(private readonly configService: ConfigService) {}

  /**
   * Verify the signature returned to the client after checkout
   */
  verifyPaymentSignature(
    externalOrderId: string,
    externalPaymentId: string,
    signature: string | undefined,
  ): boolean {
    return this.verify(
      'PAYMENT',
      this.configService.get<string>('PAYMENT_KEY_SECRET'),
      `${externalOrderId}|${externalPaymentId}`,
      signature,
      { externalOrderId },
    );
  }

  /**
   * Verify the signature header of a webhook against the exact bytes received
   */
  verifyWebhookSignature(
    rawBody: Buffer | string,
    signature: string | undefined,
  ): boolean {
    return this.verify(
      'WEBHOOK',
      this.configService.get<string>('PAYMENT_WEBHOOK_SECRET'),
      rawBody,
      signature,
      {},
    );
  }

  /**
   * Compute the hex HMAC-SHA256 of `data`
   */
  sign(data: Buffer | string, secret: string): string {
    return crypto.createHmac('sha256', secret).update(data).digest('hex');
  }

  private verify(
    kind: 'PAYMENT' | 'WEBHOOK',
    secret: string | undefined,
    data: Buffer | string,
    signature: string | undefined,
    context: Record<string, unknown>,
  ): boolean {
    if (!signature) {
      this.logSecurityEvent(`${kind}_SIGNATURE_MISSING`, context);
      return false;
    }

    if (!secret) {
      this.logger.error(`${kind} signature secret is not configured`);
      return false;
    }

    const expected = Buffer.from(this.sign(data, secret));
    const received = Buffer.from(signature);

    // timingSafeEqual throws on length mismatch
    const isValid =
      expected.length === received.length &&
      crypto.timingSafeEqual(expected, received);

    if (!isValid) {
      this.logSecurityEvent(`${kind}_SIGNATURE_INVALID`, {
        ...context,
        receivedSignature: signature.substring(0, 10) + '...',
      });
    }

    return isValid;
  }

  /**
   * Log security events for signature failures
   */
  private logSecurityEvent(
    event: string,
    details: Record<string, unknown>,
  ): void {
    this.logger.warn(`[SECURITY] ${event}`, {
      event,
      timestamp: new Date().toISOString(),
      ...details,
    });
  }
}
