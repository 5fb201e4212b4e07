/**
 * Payload carried by every booking-domain HttpException
 */
export interface ErrorBody {
  statusCode: number;
  errorCode: string;
  message: string;
  details?: Record<string, unknown>;
  timestamp: string;
}

/**
 * What the exception filter writes back to the client
 */
export interface ErrorResponse extends ErrorBody {
  path: string;
}
