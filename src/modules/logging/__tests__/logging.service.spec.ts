import { LoggingService } from '../logging.service';
import { loggingContext } from '../logging.context';

describe('LoggingService', () => {
  let service: LoggingService;
  let originalEnv: NodeJS.ProcessEnv;

  beforeAll(() => {
    originalEnv = { ...process.env };
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  beforeEach(() => {
    delete process.env.LOG_LEVEL;
    delete process.env.LOG_FORMAT;
    delete process.env.LOG_SERVICE_NAME;
    service = new LoggingService();
  });

  it('should log info level messages with correct JSON structure', () => {
    const logger = service.getWinstonLogger();
    const writeSpy = jest.spyOn(logger, 'log');

    service.log('Test info message', 'TestContext');

    expect(writeSpy).toHaveBeenCalledWith(
      'info',
      'Test info message',
      expect.objectContaining({ context: 'TestContext' }),
    );
  });

  it('should log error level messages with error stack trace', () => {
    const logger = service.getWinstonLogger();
    const writeSpy = jest.spyOn(logger, 'log');

    service.error('Test error', 'Error stack trace', 'ErrorContext');

    expect(writeSpy).toHaveBeenCalledWith(
      'error',
      'Test error',
      expect.objectContaining({
        context: 'ErrorContext',
        error: 'Error stack trace',
      }),
    );
  });

  it('should log warn level messages', () => {
    const logger = service.getWinstonLogger();
    const writeSpy = jest.spyOn(logger, 'log');

    service.warn('Test warning', 'WarnContext');

    expect(writeSpy).toHaveBeenCalledWith(
      'warn',
      'Test warning',
      expect.objectContaining({ context: 'WarnContext' }),
    );
  });

  it('should log debug level messages (only when level is debug or verbose)', () => {
    process.env.LOG_LEVEL = 'debug';
    const debugService = new LoggingService();
    const logger = debugService.getWinstonLogger();
    const writeSpy = jest.spyOn(logger, 'log');

    debugService.debug('Debug message', 'DebugContext');

    expect(writeSpy).toHaveBeenCalledWith(
      'debug',
      'Debug message',
      expect.objectContaining({ context: 'DebugContext' }),
    );
  });

  it('should default the service name to identity-api', () => {
    expect(service.getServiceName()).toBe('identity-api');
  });

  it.each([
    { configured: undefined, winston: 'info' },
    { configured: 'error', winston: 'error' },
    { configured: 'verbose', winston: 'debug' },
    { configured: 'debug', winston: 'verbose' },
    { configured: 'chatty', winston: 'info' },
  ])('should run winston at $winston when LOG_LEVEL is $configured', ({ configured, winston }) => {
    if (configured) {
      process.env.LOG_LEVEL = configured;
    }
    expect(new LoggingService().getWinstonLogger().level).toBe(winston);
  });

  it('should redact credentials in object messages before writing', () => {
    const logger = service.getWinstonLogger();
    const logSpy = jest.spyOn(logger, 'log');

    service.log(
      {
        message: 'Login attempt',
        email: 'user@example.com',
        password: 'hunter22',
        headers: { authorization: 'Bearer abc' },
      },
      'AuthService',
    );

    expect(logSpy).toHaveBeenCalledWith(
      'info',
      'Login attempt',
      expect.objectContaining({
        context: 'AuthService',
        email: 'user@example.com',
        password: '[REDACTED]',
        headers: { authorization: '[REDACTED]' },
      }),
    );
  });

  it('should redact tokens embedded in string messages', () => {
    const logger = service.getWinstonLogger();
    const logSpy = jest.spyOn(logger, 'log');

    service.warn('Rejected Bearer abc.def for refresh', 'JwtAuthGuard');

    expect(logSpy).toHaveBeenCalledWith(
      'warn',
      'Rejected Bearer [REDACTED] for refresh',
      expect.objectContaining({ context: 'JwtAuthGuard' }),
    );
  });

  it('should handle undefined/null messages gracefully', () => {
    const logger = service.getWinstonLogger();
    const logSpy = jest.spyOn(logger, 'log');

    service.log(undefined, 'TestContext');
    expect(logSpy).toHaveBeenCalledWith(
      'info',
      'undefined',
      expect.objectContaining({ context: 'TestContext' }),
    );

    service.log(null, 'TestContext');
    expect(logSpy).toHaveBeenCalledWith(
      'info',
      'null',
      expect.objectContaining({ context: 'TestContext' }),
    );
  });

  it('should include traceId and accountId from AsyncLocalStorage when available', () => {
    const logger = service.getWinstonLogger();
    const writeSpy = jest.spyOn(logger, 'log');

    loggingContext.run({ traceId: 'test-trace-123', accountId: 'account-9' }, () => {
      service.log('Traced message', 'TracedContext');
    });

    expect(writeSpy).toHaveBeenCalledWith(
      'info',
      'Traced message',
      expect.objectContaining({
        context: 'TracedContext',
        traceId: 'test-trace-123',
        accountId: 'account-9',
      }),
    );
  });

  it('should respect LOG_SERVICE_NAME environment variable', () => {
    process.env.LOG_SERVICE_NAME = 'custom-service';
    const customService = new LoggingService();
    expect(customService.getServiceName()).toBe('custom-service');
  });

  it('should merge object message properties into log meta as top-level fields', () => {
    const logger = service.getWinstonLogger();
    const logSpy = jest.spyOn(logger, 'log');

    service.log(
      {
        message: 'Request completed GET /api',
        method: 'GET',
        path: '/api',
        statusCode: 200,
        duration: 42,
      },
      'TestContext',
    );

    expect(logSpy).toHaveBeenCalledWith(
      'info',
      'Request completed GET /api',
      expect.objectContaining({
        context: 'TestContext',
        method: 'GET',
        path: '/api',
        statusCode: 200,
        duration: 42,
      }),
    );
  });
});
