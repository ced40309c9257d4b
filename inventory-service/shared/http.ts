import express from 'express';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { runInContext } from './context';
import { isAppError } from './errors';
import type { StructuredLogger } from './logger';
import type { Store } from './store';

export type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/** Forwards a rejected handler promise to the error middleware. */
export function route(handler: AsyncHandler): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function requestContext(log: StructuredLogger): RequestHandler {
  return (req, res, next) => {
    const requestId = req.header('x-request-id') ?? uuidv4();
    res.setHeader('X-Request-Id', requestId);
    runInContext({ requestId, method: req.method, path: req.path }, () => {
      const started = Date.now();
      res.on('finish', () => {
        log.info('Request completed', { status: res.statusCode, durationMs: Date.now() - started });
      });
      next();
    });
  };
}

function isJsonSyntaxError(err: unknown): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

export function errorHandler(log: StructuredLogger) {
  return (err: unknown, _req: Request, res: Response, _next: NextFunction): void => {
    if (isAppError(err)) {
      if (err.status >= 500) {
        log.error('Request failed', { error: err });
      }
      res.status(err.status).json({ code: err.code, message: err.message, ...err.details() });
      return;
    }

    if (isJsonSyntaxError(err)) {
      res.status(400).json({ code: 'INVALID_JSON', message: 'Invalid JSON in request body' });
      return;
    }

    log.error('Unhandled error', { error: err });
    res.status(500).json({ code: 'INTERNAL_ERROR', message: 'Internal Server Error' });
  };
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({ code: 'NOT_FOUND', message: `Route ${req.method} ${req.path} not found` });
}

export interface ServiceInfo {
  name: string;
  version: string;
  endpoints: string[];
}

/** Root, liveness and deep (database) health endpoints. */
export function serviceRoutes(store: Store, info: ServiceInfo, log: StructuredLogger): express.Router {
  const router = express.Router();

  router.get('/', (_req, res) => {
    res.status(200).json(info);
  });

  router.get('/health', (_req, res) => {
    res.status(200).json({ status: 'OK', timestamp: new Date().toISOString() });
  });

  router.get('/health/deep', async (_req, res) => {
    try {
      await store.ping();
      res.status(200).json({ status: 'HEALTHY', database: 'CONNECTED' });
    } catch (err) {
      log.error('Deep health check failed', { error: err });
      res.status(500).json({ status: 'UNHEALTHY', database: 'DISCONNECTED' });
    }
  });

  return router;
}
