import { LoggerService, Injectable } from '@nestjs/common';
import * as winston from 'winston';
import { getTraceId, getAccountId } from './logging.context';
import { sanitizeLogData } from '../../shared/logging/log-sanitizer';

/**
 * NestJS LoggerService implementation backed by Winston.
 * Produces structured JSON logs with correlation IDs, service name and the
 * authenticated account. Every message and metadata object passes through
 * the log sanitizer first.
 *
 * Environment variables:
 * - LOG_LEVEL: error | warn | info | debug | verbose (default: "info")
 * - LOG_FORMAT: "json" (default) | "pretty"
 * - LOG_SERVICE_NAME: service identifier (default: "identity-api")
 */

type WinstonLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug';
type LogMeta = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

@Injectable()
export class LoggingService implements LoggerService {
  private readonly logger: winston.Logger;
  private readonly serviceName: string;

  constructor() {
    this.serviceName = process.env.LOG_SERVICE_NAME || 'identity-api';
    const level = this.mapLogLevel(process.env.LOG_LEVEL || 'info');
    const formatType = process.env.LOG_FORMAT || 'json';

    const formatters =
      formatType === 'pretty'
        ? winston.format.combine(
            winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
            winston.format.colorize(),
            winston.format.printf(({ timestamp, level: lvl, message, ...meta }) => {
              const ctx = meta.context ? `[${String(meta.context)}]` : '';
              const traceId = meta.traceId ? `(${String(meta.traceId)})` : '';
              return `${String(timestamp)} ${lvl} ${ctx} ${traceId} ${String(message)}`;
            }),
          )
        : winston.format.combine(
            winston.format.timestamp(),
            winston.format.json(),
          );

    this.logger = winston.createLogger({
      level,
      defaultMeta: { service: this.serviceName },
      format: formatters,
      transports: [new winston.transports.Console()],
    });
  }

  /**
   * Map NestJS-style log levels to Winston log levels.
   *
   * NestJS "verbose" is the most permissive level while Winston "verbose"
   * (priority 4) sits below "debug" (priority 5), so the two are swapped.
   */
  private mapLogLevel(level: string): WinstonLevel {
    const mapping: Record<string, WinstonLevel> = {
      error: 'error',
      warn: 'warn',
      info: 'info',
      debug: 'verbose',
      verbose: 'debug',
    };
    return mapping[level] || 'info';
  }

  log(message: unknown, context?: string): void {
    this.logMessage('info', message, this.buildMeta(context));
  }

  error(message: unknown, trace?: string, context?: string): void {
    const meta = this.buildMeta(context);
    if (trace) {
      meta.error = sanitizeLogData(trace);
    }
    this.logMessage('error', message, meta);
  }

  warn(message: unknown, context?: string): void {
    this.logMessage('warn', message, this.buildMeta(context));
  }

  debug(message: unknown, context?: string): void {
    this.logMessage('debug', message, this.buildMeta(context));
  }

  verbose(message: unknown, context?: string): void {
    this.logMessage('verbose', message, this.buildMeta(context));
  }

  /**
   * Object messages are spread into top-level fields, with their `message`
   * property used as the log line.
   */
  private logMessage(level: WinstonLevel, message: unknown, meta: LogMeta): void {
    const sanitized = this.sanitize(message);
    if (isRecord(sanitized)) {
      const { message: msg, ...rest } = sanitized;
      Object.assign(meta, rest);
      this.logger.log(level, typeof msg === 'string' ? msg : '', meta);
    } else {
      this.logger.log(level, String(sanitized), meta);
    }
  }

  private buildMeta(context?: string): LogMeta {
    const meta: LogMeta = {};
    if (context) {
      meta.context = context;
    }
    const traceId = getTraceId();
    if (traceId) {
      meta.traceId = traceId;
    }
    const accountId = getAccountId();
    if (accountId) {
      meta.accountId = accountId;
    }
    return meta;
  }

  sanitize(data: unknown): unknown {
    if (data === null || data === undefined) {
      return String(data);
    }
    return sanitizeLogData(data);
  }

  /**
   * Get the underlying Winston logger instance (for testing).
   */
  getWinstonLogger(): winston.Logger {
    return this.logger;
  }

  getServiceName(): string {
    return this.serviceName;
  }
}
