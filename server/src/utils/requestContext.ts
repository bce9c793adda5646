/**
 * Request Context
 *
 * Request-scoped context using AsyncLocalStorage, so the correlation ID set
 * by the request logger is available to every log line written while the
 * request is handled.
 *
 * Usage:
 *   requestContext.run({ requestId: 'abc123', startTime: Date.now() }, next);
 *
 *   const ctx = requestContext.get();
 *   ctx?.requestId; // 'abc123'
 */

import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';

export interface RequestContextData {
  /** Unique request correlation ID for tracing */
  requestId: string;
  /** Request start time for duration calculation */
  startTime: number;
  path?: string;
  method?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContextData>();

export const requestContext = {
  run<T>(context: RequestContextData, fn: () => T): T {
    return asyncLocalStorage.run(context, fn);
  },

  /**
   * Get the current request context (undefined outside request scope,
   * e.g. in the health monitor loop)
   */
  get(): RequestContextData | undefined {
    return asyncLocalStorage.getStore();
  },

  getRequestId(): string {
    return asyncLocalStorage.getStore()?.requestId ?? 'no-request';
  },

  generateRequestId(): string {
    // 8 characters from a UUID for readability in logs
    return randomUUID().split('-')[0];
  },
};

export default requestContext;
