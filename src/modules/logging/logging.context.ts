import { AsyncLocalStorage } from 'async_hooks';

/**
 * Request-scoped context carried through AsyncLocalStorage so log lines can
 * be correlated without passing ids around.
 */
export interface RequestContext {
  traceId: string;
  accountId?: string;
}

export const loggingContext = new AsyncLocalStorage<RequestContext>();

/**
 * Current trace/correlation ID, or undefined outside a request scope.
 */
export function getTraceId(): string | undefined {
  return loggingContext.getStore()?.traceId;
}

export function getAccountId(): string | undefined {
  return loggingContext.getStore()?.accountId;
}

/**
 * Records the authenticated account on the active request context. A no-op
 * outside a request scope.
 */
export function setAccountId(accountId: string): void {
  const store = loggingContext.getStore();
  if (store) {
    store.accountId = accountId;
  }
}
