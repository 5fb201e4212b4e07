import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GatewayError } from '../../../common/errors';
import {
  CreateOrderRequest,
  CreatedOrder,
  PaymentGatewayAdapter,
} from './payment-gateway.interface';

interface HttpGatewayConfig {
  baseUrl: string;
  keyId: string;
  keySecret: string;
  timeoutMs: number;
}

interface ProviderOrderResponse {
  id: string;
  status?: string;
}

const DEFAULT_TIMEOUT_MS = 5000;

function isProviderOrderResponse(value: unknown): value is ProviderOrderResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'string' &&
    value.id.length > 0
  );
}

/**
 * Orders API client: POST {baseUrl}/orders with basic auth
 */
@Injectable()
export class HttpPaymentGateway implements PaymentGatewayAdapter {
  private readonly logger = new Logger(HttpPaymentGateway.name);
  readonly name = 'http';

  private readonly config: HttpGatewayConfig;

  constructor(private readonly configService: ConfigService) {
    this.config = {
      baseUrl: this.configService.get<string>('PAYMENT_GATEWAY_URL') ?? '',
      keyId: this.configService.get<string>('PAYMENT_KEY_ID') ?? '',
      keySecret: this.configService.get<string>('PAYMENT_KEY_SECRET') ?? '',
      timeoutMs:
        this.configService.get<number>('PAYMENT_GATEWAY_TIMEOUT_MS') ??
        DEFAULT_TIMEOUT_MS,
    };
  }

  async createOrder(request: CreateOrderRequest): Promise<CreatedOrder> {
    const body = await this.makeRequest('POST', '/orders', {
      amount: request.amount,
      currency: request.currency,
      receipt: request.receipt,
      payment_capture: 1,
      notes: request.notes ?? {},
    });

    if (!isProviderOrderResponse(body)) {
      throw new GatewayError('Payment provider returned an invalid order', false);
    }

    this.logger.log(
      `Order created - receipt: ${request.receipt}, orderId: ${body.id}`,
    );
    return { externalOrderId: body.id };
  }

  private async makeRequest(
    method: string,
    endpoint: string,
    data?: Record<string, unknown>,
  ): Promise<unknown> {
    if (!this.config.baseUrl) {
      throw new GatewayError('PAYMENT_GATEWAY_URL is not configured', false);
    }

    const url = `${this.config.baseUrl}${endpoint}`;
    const credentials = Buffer.from(
      `${this.config.keyId}:${this.config.keySecret}`,
    ).toString('base64');

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Basic ${credentials}`,
        },
        body: data ? JSON.stringify(data) : undefined,
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      const timedOut =
        error instanceof Error &&
        (error.name === 'TimeoutError' || error.name === 'AbortError');
      const message = timedOut
        ? `Payment provider timed out after ${this.config.timeoutMs}ms`
        : `Payment provider unreachable: ${error instanceof Error ? error.message : 'Unknown error'}`;

      this.logger.error(`${method} ${endpoint} failed - ${message}`);
      throw new GatewayError(message, true);
    }

    if (!response.ok) {
      // The body can fail to arrive too (aborted by the timeout signal)
      const errorText = await response
        .text()
        .catch((error: unknown) =>
          `<unreadable body: ${error instanceof Error ? error.message : 'Unknown error'}>`,
        );
      const retryable = response.status === 429 || response.status >= 500;

      this.logger.error(
        `${method} ${endpoint} failed - HTTP ${response.status}: ${errorText.substring(0, 200)}`,
      );
      throw new GatewayError(
        `Payment provider responded with HTTP ${response.status}`,
        retryable,
        response.status,
      );
    }

    try {
      const body: unknown = await response.json();
      return body;
    } catch (error) {
      throw new GatewayError(
        `Payment provider returned malformed JSON: ${error instanceof Error ? error.message : 'Unknown error'}`,
        false,
      );
    }
  }
}
