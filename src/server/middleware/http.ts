import { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import { createInternalError, createInvalidInputError, isGameError } from '../../shared/errors';
import { Logger } from '../../shared/logger';
import { RequestMetrics } from '../metrics/RequestMetrics';

/**
 * Forward rejected promises from async route handlers to the error handler
 */
export function asyncHandler(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

export function requestTiming(metrics: RequestMetrics): RequestHandler {
  return (_req, res, next) => {
    const startedAt = Date.now();
    metrics.recordRequest();
    res.on('finish', () => {
      metrics.recordResponseTime(Date.now() - startedAt);
    });
    next();
  };
}

/**
 * GameError -> its status and JSON body; malformed JSON -> 400; anything
 * else is logged, counted and answered with 500.
 */
export function createErrorHandler(logger: Logger, metrics: RequestMetrics): ErrorRequestHandler {
  return (err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isGameError(err)) {
      res.status(err.statusCode).json({ error: err.toJSON() });
      return;
    }
    if (err instanceof SyntaxError) {
      const error = createInvalidInputError('Malformed JSON body');
      res.status(error.statusCode).json({ error: error.toJSON() });
      return;
    }

    metrics.recordError();
    logger.error('Unhandled request error', err);
    const error = createInternalError();
    res.status(error.statusCode).json({ error: error.toJSON() });
  };
}
