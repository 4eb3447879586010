import { Request } from 'express';

/**
 * Real client address for a request.
 *
 * Uses request.ip as the primary source (respects the Express 'trust proxy'
 * setting), then the socket's remote address. X-Forwarded-For is not read
 * directly; configure 'trust proxy' when running behind a load balancer.
 */
export function extractClientIp(request: Pick<Request, 'ip' | 'socket'>): string | null {
  if (request.ip) {
    return request.ip;
  }
  return request.socket?.remoteAddress ?? null;
}
