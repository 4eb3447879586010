import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  HttpException,
} from '@nestjs/common';
import { Observable, throwError } from 'rxjs';
import { tap, catchError } from 'rxjs/operators';
import { Response } from 'express';
import { LoggingService } from '../logging.service';
import { getTraceId } from '../logging.context';
import { AuthenticatedRequest } from '../../auth/interfaces/authenticated-request.interface';

/**
 * Logs each request's completion or failure with method, path, status,
 * duration, trace ID and account ID. Skips /health.
 */
@Injectable()
export class RequestLoggingInterceptor implements NestInterceptor {
  private static readonly SKIP_PATHS = ['/health'];

  constructor(private readonly loggingService: LoggingService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const httpContext = context.switchToHttp();
    const request = httpContext.getRequest<AuthenticatedRequest>();
    const path = request.path || request.url;

    if (
      RequestLoggingInterceptor.SKIP_PATHS.some(
        (skip) => path === skip || path.startsWith(skip + '/'),
      )
    ) {
      return next.handle();
    }

    const method = request.method;
    const startTime = Date.now();
    const traceId = getTraceId();
    // Guards run before interceptors, so the account is already attached
    const accountId = request.account?.id;

    return next.handle().pipe(
      tap(() => {
        const response = httpContext.getResponse<Response>();

        this.loggingService.log(
          {
            message: `Request completed ${method} ${path}`,
            method,
            path,
            statusCode: response.statusCode,
            duration: Date.now() - startTime,
            traceId,
            accountId,
          },
          'RequestLoggingInterceptor',
        );
      }),
      catchError((error: unknown) => {
        const statusCode = error instanceof HttpException ? error.getStatus() : 500;
        const log = {
          message: `Request failed ${method} ${path}`,
          method,
          path,
          statusCode,
          duration: Date.now() - startTime,
          traceId,
          accountId,
          error: error instanceof Error ? error.message : String(error),
        };

        if (statusCode >= 500) {
          this.loggingService.error(
            log,
            error instanceof Error ? error.stack : undefined,
            'RequestLoggingInterceptor',
          );
        } else {
          this.loggingService.warn(log, 'RequestLoggingInterceptor');
        }

        return throwError(() => error);
      }),
    );
  }
}
