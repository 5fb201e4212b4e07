import { BookingResponse } from '../../booking/interfaces/booking-response.interface';
import { PaymentOutcome } from './payment-outcome.interface';

export interface PaymentResultResponse {
  success: boolean;
  outcome: PaymentOutcome;
  booking: BookingResponse | null;
}
