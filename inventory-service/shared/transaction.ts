import { InternalError, isAppError } from './errors';
import { createServiceLogger } from './logger';
import type { Store, StoreSession } from './store';

const log = createServiceLogger('transaction');

export interface ScopeOptions {
  /** Run on a plain session instead of opening a transaction. */
  readOnly?: boolean;
}

/**
 * Unit of work shared by every catalog, order and report operation. Business
 * errors propagate unchanged after the rollback; anything else is logged with
 * the operation and entity context and surfaced as an `InternalError`.
 */
export async function runScoped<T>(
  store: Store,
  operation: string,
  context: Record<string, unknown>,
  work: (session: StoreSession) => Promise<T>,
  options: ScopeOptions = {},
): Promise<T> {
  try {
    const result = options.readOnly ? await store.read(work) : await store.transaction(work);
    log.debug('Operation completed', { operation, ...context });
    return result;
  } catch (err) {
    if (isAppError(err)) {
      if (err instanceof InternalError) {
        log.error('Operation failed', { operation, ...context, error: err });
      }
      throw err;
    }
    log.error('Unexpected persistence failure', { operation, ...context, error: err });
    throw new InternalError();
  }
}
