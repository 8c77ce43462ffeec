import { randomUUID } from 'crypto';
import { AsyncLocalStorage } from 'async_hooks';
import type { LogContext } from './types.js';

const logContextStorage = new AsyncLocalStorage<LogContext>();

// Ids a client may supply in X-Request-Id.
const CLIENT_REQUEST_ID = /^[A-Za-z0-9_-]{1,64}$/;

/** Run `fn` with `context` merged over the enclosing one. */
export function withLogContext<T>(context: LogContext, fn: () => T): T {
  const parent = logContextStorage.getStore() ?? {};
  return logContextStorage.run({ ...parent, ...context }, fn);
}

export function getLogContext(): LogContext {
  return logContextStorage.getStore() ?? {};
}

/**
 * Request id for an incoming call. A well-formed id sent by the client is
 * kept so its logs and ours line up; anything else gets a fresh `req_` id.
 */
export function createRequestId(incoming?: string): string {
  if (incoming && CLIENT_REQUEST_ID.test(incoming)) {
    return incoming;
  }
  return `req_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}
