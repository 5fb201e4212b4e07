export const PAYMENT_GATEWAY = 'PAYMENT_GATEWAY';

export interface CreateOrderRequest {
  /** Minor currency units */
  amount: number;
  currency: string;
  /** Our reference for the order, echoed back by the provider */
  receipt: string;
  notes?: Record<string, string>;
}

export interface CreatedOrder {
  externalOrderId: string;
}

/**
 * Outbound port to the payment provider. Implementations throw
 * GatewayError on any failure and never retry on their own.
 */
export interface PaymentGatewayAdapter {
  readonly name: string;
  createOrder(request: CreateOrderRequest): Promise<CreatedOrder>;
}
