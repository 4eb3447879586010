export { LoggingModule } from './logging.module';
export { LoggingService } from './logging.service';
export { CorrelationIdMiddleware } from './middleware/correlation-id.middleware';
export { RequestLoggingInterceptor } from './interceptors/request-logging.interceptor';
export { loggingContext, getTraceId, getAccountId, setAccountId } from './logging.context';
export type { RequestContext } from './logging.context';
