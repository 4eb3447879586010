import { Injectable, NestMiddleware } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { loggingContext, RequestContext } from '../logging.context';

const MAX_TRACE_ID_LENGTH = 128;

function headerValue(value: string | string[] | undefined): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  if (!first) {
    return undefined;
  }
  const trimmed = first.trim();
  return trimmed.length > 0 && trimmed.length <= MAX_TRACE_ID_LENGTH ? trimmed : undefined;
}

/**
 * Generates or propagates a correlation ID for every incoming request and
 * runs the rest of the pipeline inside the logging context.
 *
 * Header precedence:
 * 1. x-trace-id
 * 2. x-correlation-id
 * 3. generated UUID v4
 *
 * The resolved ID is echoed back as the x-trace-id response header.
 */
@Injectable()
export class CorrelationIdMiddleware implements NestMiddleware {
  use(req: Pick<Request, 'headers'>, res: Pick<Response, 'setHeader'>, next: NextFunction): void {
    const traceId =
      headerValue(req.headers['x-trace-id']) ??
      headerValue(req.headers['x-correlation-id']) ??
      uuidv4();

    res.setHeader('x-trace-id', traceId);

    const context: RequestContext = { traceId };
    loggingContext.run(context, () => {
      next();
    });
  }
}
