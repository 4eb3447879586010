import { CallHandler, ForbiddenException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { lastValueFrom, of, throwError } from 'rxjs';
import { RequestLoggingInterceptor } from '../interceptors/request-logging.interceptor';
import { LoggingService } from '../logging.service';
import { loggingContext } from '../logging.context';
import { AccountRole } from '../../../database/entities/account.entity';

describe('RequestLoggingInterceptor', () => {
  let interceptor: RequestLoggingInterceptor;
  let loggingService: LoggingService;

  beforeEach(() => {
    loggingService = new LoggingService();
    // Suppress actual log output during tests
    jest.spyOn(loggingService.getWinstonLogger(), 'log').mockImplementation();
    interceptor = new RequestLoggingInterceptor(loggingService);
  });

  function createContext(path: string, method = 'GET', accountId?: string) {
    const request = {
      path,
      url: path,
      method,
      account: accountId ? { id: accountId, email: 'a@x.com', role: AccountRole.USER } : undefined,
    };
    return new ExecutionContextHost([request, { statusCode: 200 }]);
  }

  function handlerReturning(): CallHandler {
    return { handle: () => of({}) };
  }

  function handlerFailing(error: unknown): CallHandler {
    return { handle: () => throwError(() => error) };
  }

  it('should log completed request with method, path and status', async () => {
    const logSpy = jest.spyOn(loggingService, 'log');

    await lastValueFrom(interceptor.intercept(createContext('/api/auth/login', 'POST'), handlerReturning()));

    expect(logSpy).toHaveBeenCalledWith(
      expect.objectContaining({
        message: 'Request completed POST /api/auth/login',
        method: 'POST',
        path: '/api/auth/login',
        statusCode: 200,
        duration: expect.any(Number),
      }),
      'RequestLoggingInterceptor',
    );
  });

  it('should log client errors at warn level with the HTTP status', async () => {
    const warnSpy = jest.spyOn(loggingService, 'warn');
    const errorSpy = jest.spyOn(loggingService, 'error');
    const failure = new ForbiddenException('Forbidden');

    await expect(
      lastValueFrom(interceptor.intercept(createContext('/api/admin/accounts'), handlerFailing(failure))),
    ).rejects.toBe(failure);

    expect(warnSpy).toHaveBeenCalledWith(
      expect.objectContaining({ statusCode: 403, error: 'Forbidden' }),
      'RequestLoggingInterceptor',
    );
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('should log unexpected errors at error level with the stack', async () => {
    const errorSpy = jest.spyOn(loggingService, 'error');
    const failure = new Error('boom');

    await expect(
      lastValueFrom(interceptor.intercept(createContext('/api/auth/me'), handlerFailing(failure))),
    ).rejects.toBe(failure);

    expect(errorSpy).toHaveBeenCalledWith(
      expect.objectContaining({ statusCode: 500, error: 'boom' }),
      failure.stack,
      'RequestLoggingInterceptor',
    );
  });

  it('should skip /health endpoint', async () => {
    const logSpy = jest.spyOn(loggingService, 'log');

    await lastValueFrom(interceptor.intercept(createContext('/health'), handlerReturning()));

    expect(logSpy).not.toHaveBeenCalled();
  });

  it('should include traceId and the authenticated account', async () => {
    const logSpy = jest.spyOn(loggingService, 'log');

    await loggingContext.run({ traceId: 'interceptor-trace-123' }, () =>
      lastValueFrom(
        interceptor.intercept(createContext('/api/auth/me', 'GET', 'account-7'), handlerReturning()),
      ),
    );

    expect(logSpy).toHaveBeenCalledWith(
      expect.objectContaining({ traceId: 'interceptor-trace-123', accountId: 'account-7' }),
      'RequestLoggingInterceptor',
    );
  });
});
