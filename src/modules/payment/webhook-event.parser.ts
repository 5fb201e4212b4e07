export enum ProviderEventType {
  PAYMENT_CAPTURED = 'payment.captured',
  PAYMENT_FAILED = 'payment.failed',
  PAYMENT_AUTHORIZED = 'payment.authorized',
}

/**
 * Normalised provider notification
 */
export interface ProviderEvent {
  event: string;
  externalOrderId: string | null;
  externalPaymentId: string | null;
  paymentStatus: string | null;
  errorDescription: string | null;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function child(value: unknown, key: string): unknown {
  return isObject(value) ? value[key] : undefined;
}

function stringAt(value: unknown, key: string): string | null {
  const found = child(value, key);
  return typeof found === 'string' && found.length > 0 ? found : null;
}

/**
 * Accepts both notification shapes the provider sends:
 *
 * - `{ event, payload: { payment: { entity: { id, order_id, status } } } }`
 * - `{ event, payment: { id, status }, order: { id } }`
 *
 * Returns null when the body has no event name.
 */
export function parseProviderEvent(body: unknown): ProviderEvent | null {
  const event = stringAt(body, 'event');
  if (!event) {
    return null;
  }

  const entity = child(child(child(body, 'payload'), 'payment'), 'entity');
  if (isObject(entity)) {
    return {
      event,
      externalOrderId: stringAt(entity, 'order_id'),
      externalPaymentId: stringAt(entity, 'id'),
      paymentStatus: stringAt(entity, 'status'),
      errorDescription: stringAt(entity, 'error_description'),
    };
  }

  const payment = child(body, 'payment');
  return {
    event,
    externalOrderId: stringAt(child(body, 'order'), 'id'),
    externalPaymentId: stringAt(payment, 'id'),
    paymentStatus: stringAt(payment, 'status'),
    errorDescription: stringAt(payment, 'error_description'),
  };
}
