/**
 * What the client needs to open the provider checkout
 */
export interface PaymentOrder {
  bookingId: string;
  externalOrderId: string;
  amount: number;
  currency: string;
  keyId: string;
  expiresAt: Date;
  /** True when an order created earlier for this booking was returned */
  reused: boolean;
}

export interface PaymentOrderResponse {
  booking_id: string;
  external_order_id: string;
  amount: number;
  currency: string;
  key_id: string;
  expires_at: string;
  reused: boolean;
}
