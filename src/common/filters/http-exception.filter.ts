import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import {
  DomainErrorKind,
  DomainException,
} from '../../modules/auth/exceptions/domain.exception';

/**
 * Standardized error response format
 */
export interface ErrorResponse {
  statusCode: number;
  kind?: DomainErrorKind;
  reason?: string;
  retryable?: boolean;
  message: string;
  error: string;
  timestamp: string;
  path: string;
}

export const RATE_LIMIT_RETRY_SECONDS = 900;
export const UNAVAILABLE_RETRY_SECONDS = 5;

function messageOf(exceptionResponse: string | object): string {
  if (typeof exceptionResponse === 'string') {
    return exceptionResponse;
  }
  if ('message' in exceptionResponse) {
    const msg = exceptionResponse.message;
    if (Array.isArray(msg)) {
      return msg.map(String).join(', ');
    }
    if (typeof msg === 'string') {
      return msg;
    }
  }
  return 'An error occurred';
}

/**
 * Global exception filter. Domain failures keep their kind and reason in the
 * body; anything that is not an HttpException becomes a bare 500.
 *
 * Runs for guard failures as well as handler failures, so Retry-After for
 * throttling and unavailable storage is set here.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const status =
      exception instanceof HttpException
        ? exception.getStatus()
        : HttpStatus.INTERNAL_SERVER_ERROR;
    const message =
      exception instanceof HttpException
        ? messageOf(exception.getResponse())
        : 'Internal server error';

    const errorResponse: ErrorResponse = {
      statusCode: status,
      message,
      error: HttpStatus[status] || 'Error',
      timestamp: new Date().toISOString(),
      path: request.url,
    };

    if (exception instanceof DomainException) {
      errorResponse.kind = exception.kind;
      if (exception.reason !== undefined) {
        errorResponse.reason = exception.reason;
      }
      errorResponse.retryable = exception.retryable;
    }

    // Log server faults and auth refusals; other 4xx are the client's problem
    if (status >= 500 || status === 401 || status === 403) {
      this.logger.error(
        `HTTP ${status} Error: ${message} | Path: ${request.url} | IP: ${request.ip}`,
        exception instanceof Error ? exception.stack : String(exception),
      );
    }

    this.setRetryAfter(response, status);
    response.status(status).json(errorResponse);
  }

  private setRetryAfter(response: Response, status: number): void {
    if (status === HttpStatus.SERVICE_UNAVAILABLE) {
      response.setHeader('Retry-After', String(UNAVAILABLE_RETRY_SECONDS));
    }
    // The throttler sets its own value when it knows the remaining block time
    if (status === HttpStatus.TOO_MANY_REQUESTS && !response.getHeader('Retry-After')) {
      response.setHeader('Retry-After', String(RATE_LIMIT_RETRY_SECONDS));
    }
  }
}
