import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { ErrorResponse } from '../interfaces/error-body.interface';

type Described = Omit<ErrorResponse, 'timestamp' | 'path'>;

const STATUS_CODES: Readonly<Record<number, string>> = {
  400: 'BAD_REQUEST',
  401: 'UNAUTHORIZED',
  403: 'FORBIDDEN',
  404: 'NOT_FOUND',
  409: 'CONFLICT',
  410: 'GONE',
  422: 'UNPROCESSABLE_ENTITY',
  429: 'TOO_MANY_REQUESTS',
  500: 'INTERNAL_ERROR',
  502: 'BAD_GATEWAY',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function codeFor(status: number): string {
  return STATUS_CODES[status] ?? 'UNKNOWN_ERROR';
}

/**
 * Writes every error as `{ statusCode, errorCode, message, timestamp, path, details? }`.
 * Booking errors already carry their errorCode; anything that is not an
 * HttpException becomes an opaque 500.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const request = http.getRequest<Request>();
    const described = this.describe(exception);

    const body: ErrorResponse = {
      ...described,
      timestamp: new Date().toISOString(),
      path: request.url,
    };
    if (!described.details) delete body.details;

    http.getResponse<Response>().status(described.statusCode).json(body);
  }

  private describe(exception: unknown): Described {
    if (!(exception instanceof HttpException)) {
      if (exception instanceof Error) {
        this.logger.error(`Unhandled exception: ${exception.message}`, exception.stack);
        return {
          statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
          errorCode: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
        };
      }
      return {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        errorCode: 'UNKNOWN_ERROR',
        message: 'An unknown error occurred',
      };
    }

    const statusCode = exception.getStatus();
    const payload = exception.getResponse();
    if (!isRecord(payload)) {
      return {
        statusCode,
        errorCode: codeFor(statusCode),
        message: typeof payload === 'string' ? payload : exception.message,
      };
    }

    const errorCode =
      typeof payload.errorCode === 'string' ? payload.errorCode : codeFor(statusCode);

    // ValidationPipe: one message per failed constraint
    if (Array.isArray(payload.message)) {
      return {
        statusCode,
        errorCode,
        message: 'Validation failed',
        details: { errors: payload.message.map(String) },
      };
    }

    return {
      statusCode,
      errorCode,
      message: typeof payload.message === 'string' ? payload.message : exception.message,
      details: isRecord(payload.details) ? payload.details : undefined,
    };
  }
}
