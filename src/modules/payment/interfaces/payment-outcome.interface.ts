import { BookingRecord } from '../../booking/booking.types';

export enum PaymentOutcome {
  CONFIRMED = 'confirmed',
  /** Payment already recorded; nothing changed */
  DUPLICATE = 'duplicate',
  LATE_PAYMENT = 'late_payment',
  SEAT_CONFLICT = 'seat_conflict',
  PAYMENT_FAILED = 'payment_failed',
  /** Captured against a booking that was already closed; refund queued */
  NOT_PAYABLE = 'not_payable',
  IGNORED = 'ignored',
}

export interface VerificationResult {
  outcome: PaymentOutcome;
  booking: BookingRecord | null;
  /** Set for SEAT_CONFLICT */
  conflictingSeats?: string[];
}

export interface PaymentConfirmation {
  externalOrderId: string;
  externalPaymentId: string;
  signature: string;
}
