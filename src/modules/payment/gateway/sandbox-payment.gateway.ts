import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  CreateOrderRequest,
  CreatedOrder,
  PaymentGatewayAdapter,
} from './payment-gateway.interface';

/**
 * Local gateway for development: issues order ids without network calls.
 * Payments against these orders are simulated by signing callbacks with
 * the configured key secret.
 */
@Injectable()
export class SandboxPaymentGateway implements PaymentGatewayAdapter {
  private readonly logger = new Logger(SandboxPaymentGateway.name);
  readonly name = 'sandbox';

  async createOrder(request: CreateOrderRequest): Promise<CreatedOrder> {
    const externalOrderId = `order_${uuidv4().replace(/-/g, '')}`;

    this.logger.debug(
      `Sandbox order - receipt: ${request.receipt}, amount: ${request.amount} ${request.currency}, orderId: ${externalOrderId}`,
    );
    return { externalOrderId };
  }
}
