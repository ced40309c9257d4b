import { getRequestContext } from './context';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface LogContext {
  service?: string;
  [key: string]: unknown;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_VALUES;
}

/**
 * JSON-lines logger. Static context is bound at construction, request
 * context (request id, method, path) is read from AsyncLocalStorage on every
 * call.
 *
 * ```ts
 * const log = createServiceLogger('api-write');
 * log.info('Order created', { orderId: 7 });
 * // {"level":"info","service":"api-write","requestId":"...","msg":"Order created","orderId":7,"timestamp":"..."}
 * ```
 */
export class StructuredLogger {
  private readonly staticContext: LogContext;
  private readonly minLevel: LogLevel;

  constructor(staticContext: LogContext = {}, minLevel?: LogLevel) {
    this.staticContext = staticContext;
    const envLevel = process.env['LOG_LEVEL'];
    this.minLevel = minLevel ?? (isLogLevel(envLevel) ? envLevel : 'info');
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.write('debug', msg, data);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.write('info', msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.write('warn', msg, data);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.write('error', msg, data);
  }

  private write(level: Exclude<LogLevel, 'silent'>, msg: string, data?: Record<string, unknown>): void {
    if (LEVEL_VALUES[level] < LEVEL_VALUES[this.minLevel]) return;

    // static context < request context < per-call data
    const entry: Record<string, unknown> = {
      level,
      ...this.staticContext,
      ...getRequestContext(),
      msg,
      ...serializeErrors(data),
      timestamp: new Date().toISOString(),
    };

    if (level === 'error' || level === 'warn') {
      console.error(JSON.stringify(entry));
    } else {
      console.log(JSON.stringify(entry));
    }
  }
}

function serializeErrors(data: Record<string, unknown> | undefined): Record<string, unknown> {
  if (!data) return {};
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    out[key] = value instanceof Error ? { name: value.name, message: value.message, stack: value.stack } : value;
  }
  return out;
}

export function createServiceLogger(service: string): StructuredLogger {
  return new StructuredLogger({ service });
}
