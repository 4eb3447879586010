import { Global, Module } from '@nestjs/common';
import { APP_INTERCEPTOR } from '@nestjs/core';
import { LoggingService } from './logging.service';
import { CorrelationIdMiddleware } from './middleware/correlation-id.middleware';
import { RequestLoggingInterceptor } from './interceptors/request-logging.interceptor';

/**
 * Structured JSON logging via Winston. LoggingService doubles as the Nest
 * application logger (see main.ts); RequestLoggingInterceptor is registered
 * globally.
 */
@Global()
@Module({
  providers: [
    LoggingService,
    CorrelationIdMiddleware,
    {
      provide: APP_INTERCEPTOR,
      useClass: RequestLoggingInterceptor,
    },
  ],
  exports: [LoggingService, CorrelationIdMiddleware],
})
export class LoggingModule {}
