import { AsyncLocalStorage } from 'node:async_hooks';

/**
 * Request-scoped fields set once at the HTTP boundary. Every log line written
 * while the request is being handled picks them up.
 */
export interface RequestContext {
  requestId?: string;
  method?: string;
  path?: string;
  [key: string]: unknown;
}

const storage = new AsyncLocalStorage<RequestContext>();

export function runInContext<T>(ctx: RequestContext, fn: () => T): T {
  return storage.run(ctx, fn);
}

/** Returns an empty object outside of `runInContext()`. */
export function getRequestContext(): RequestContext {
  return storage.getStore() ?? {};
}
