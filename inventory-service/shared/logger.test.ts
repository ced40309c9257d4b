import { afterEach, describe, expect, it, vi } from 'vitest';
import { runInContext } from './context';
import { StructuredLogger } from './logger';

function lastLine(spy: { mock: { calls: unknown[][] } }): unknown {
  const call = spy.mock.calls[spy.mock.calls.length - 1];
  return JSON.parse(String(call[0]));
}

describe('StructuredLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write debug and info lines to stdout', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const log = new StructuredLogger({ service: 'orders' }, 'debug');

    log.debug('Operation completed', { orderId: 7 });

    expect(out).toHaveBeenCalledTimes(1);
    expect(lastLine(out)).toMatchObject({ level: 'debug', service: 'orders', msg: 'Operation completed', orderId: 7 });
  });

  it('should write warnings to stderr with serialized errors', () => {
    const err = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const log = new StructuredLogger({ service: 'pg-store' }, 'info');

    log.warn('Rollback failed', { error: new Error('connection reset') });

    expect(lastLine(err)).toMatchObject({
      level: 'warn',
      msg: 'Rollback failed',
      error: { name: 'Error', message: 'connection reset' },
    });
  });

  it('should drop lines below the minimum level', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const log = new StructuredLogger({}, 'info');

    log.debug('ignored');

    expect(out).not.toHaveBeenCalled();
  });

  it('should stamp the request context on every line', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const log = new StructuredLogger({ service: 'api-read' }, 'info');

    runInContext({ requestId: 'req-9', method: 'GET', path: '/orders' }, () => log.info('Request completed'));

    expect(lastLine(out)).toMatchObject({ requestId: 'req-9', method: 'GET', path: '/orders' });
  });
});
