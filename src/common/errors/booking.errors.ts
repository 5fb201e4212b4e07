import {
  BadGatewayException,
  BadRequestException,
  ConflictException,
  ForbiddenException,
  GoneException,
  HttpStatus,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ErrorBody } from '../interfaces/error-body.interface';

function errorBody(
  statusCode: number,
  errorCode: string,
  message: string,
  details?: Record<string, unknown>,
): ErrorBody {
  return {
    statusCode,
    errorCode,
    message,
    ...(details && { details }),
    timestamp: new Date().toISOString(),
  };
}

/**
 * One or more requested seats are held by someone else or already booked.
 * `conflictingSeats` is exactly the subset that blocked the request.
 */
export class ConflictError extends ConflictException {
  constructor(readonly conflictingSeats: string[]) {
    super(
      errorBody(
        HttpStatus.CONFLICT,
        'SEATS_NOT_AVAILABLE',
        'Some seats are not available',
        { conflicting_seats: conflictingSeats },
      ),
    );
  }
}

/**
 * The booking's hold window has passed
 */
export class ExpiredError extends GoneException {
  constructor(readonly bookingId: string) {
    super(
      errorBody(
        HttpStatus.GONE,
        'BOOKING_EXPIRED',
        'The hold on these seats has expired',
        { booking_id: bookingId },
      ),
    );
  }
}

/**
 * Payment signature did not verify. The message stays generic.
 */
export class SignatureInvalidError extends BadRequestException {
  constructor() {
    super(
      errorBody(
        HttpStatus.BAD_REQUEST,
        'PAYMENT_VERIFICATION_FAILED',
        'Payment verification failed',
      ),
    );
  }
}

/**
 * Payment arrived after the hold deadline. Raised only once the refund
 * intent for it has been queued.
 */
export class LatePaymentError extends ConflictException {
  constructor(
    readonly bookingId: string,
    readonly receivedAt: Date,
    readonly expiresAt: Date,
  ) {
    super(
      errorBody(
        HttpStatus.CONFLICT,
        'LATE_PAYMENT',
        'Payment was received after the hold expired and will be refunded',
        {
          booking_id: bookingId,
          received_at: receivedAt.toISOString(),
          expires_at: expiresAt.toISOString(),
        },
      ),
    );
  }
}

/**
 * The payment provider could not be reached or rejected the request
 */
export class GatewayError extends BadGatewayException {
  constructor(
    message: string,
    readonly retryable: boolean,
    readonly providerStatus?: number,
  ) {
    super(
      errorBody(HttpStatus.BAD_GATEWAY, 'PAYMENT_GATEWAY_ERROR', message, {
        retryable,
        ...(providerStatus !== undefined && { provider_status: providerStatus }),
      }),
    );
  }
}

export class NotFoundError extends NotFoundException {
  constructor(resource: 'BOOKING' | 'SHOWTIME', id: string) {
    super(
      errorBody(
        HttpStatus.NOT_FOUND,
        `${resource}_NOT_FOUND`,
        `${resource === 'BOOKING' ? 'Booking' : 'Showtime'} ${id} not found`,
      ),
    );
  }
}

export class ValidationError extends BadRequestException {
  constructor(
    readonly errorCode: string,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(errorBody(HttpStatus.BAD_REQUEST, errorCode, message, details));
  }
}

export class ForbiddenError extends ForbiddenException {
  constructor() {
    super(
      errorBody(
        HttpStatus.FORBIDDEN,
        'BOOKING_NOT_OWNED',
        'You do not have permission to access this booking',
      ),
    );
  }
}

/**
 * The hold store did not answer in time. Nothing was claimed; the caller
 * may retry.
 */
export class StoreUnavailableError extends ServiceUnavailableException {
  constructor(readonly reason: string) {
    super(
      errorBody(
        HttpStatus.SERVICE_UNAVAILABLE,
        'STORE_UNAVAILABLE',
        'Seat holds are temporarily unavailable, please retry',
      ),
    );
  }
}
