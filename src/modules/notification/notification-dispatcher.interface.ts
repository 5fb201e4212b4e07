export const NOTIFICATION_DISPATCHER = 'NOTIFICATION_DISPATCHER';

export enum NotificationKind {
  BOOKING_CONFIRMATION = 'booking.confirmation',
  REFUND_INTENT = 'payment.refund_intent',
  PAYMENT_FAILED = 'payment.failed',
  BOOKING_EXPIRED = 'booking.expired',
}

/**
 * Message handed to the delivery service
 */
export interface NotificationTask {
  id: string;
  kind: NotificationKind;
  bookingId: string;
  enqueuedAt: string;
}

/**
 * Fire-and-forget hand-off to the external delivery service. Delivery is
 * at least once; `enqueue` never throws and never blocks the caller.
 */
export interface NotificationDispatcher {
  enqueue(kind: NotificationKind, bookingId: string): void;
}
