import type { NextFunction, Response } from 'express';
import type { CatalogRequest } from '../common/request/request-context';
import { safePath } from '../common/request/request-context';
import type { JsonLogger } from './json-logger.service';

/**
 * Logs one line per finished response. Expects requestIdMiddleware to run first.
 */
export function createHttpLoggingMiddleware(logger: JsonLogger) {
  return function httpLoggingMiddleware(req: CatalogRequest, res: Response, next: NextFunction) {
    const start = process.hrtime.bigint();

    res.on('finish', () => {
      const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;

      const meta: Record<string, unknown> = {
        requestId: req.requestId,
        method: req.method,
        // Query strings may carry secrets; keep just the path.
        path: safePath(req),
        statusCode: res.statusCode,
        durationMs: Math.round(durationMs * 10) / 10
      };

      if (req.principal?.kind === 'user') meta.principalId = req.principal.id;

      // Keep noise down: log 5xx as error, 4xx as warn, otherwise info.
      if (res.statusCode >= 500) {
        logger.error('HTTP request failed', meta);
      } else if (res.statusCode >= 400) {
        logger.warn('HTTP request client error', meta);
      } else {
        logger.log('HTTP request', meta);
      }
    });

    next();
  };
}
