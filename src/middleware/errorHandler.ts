import { NextFunction, Request, Response } from 'express';
import { isAppError } from '../core/errors';
import { Logger, logger as defaultLogger } from '../utils/logger';

export function createErrorHandler(logger: Logger = defaultLogger) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    if (isAppError(err)) {
      if (err.statusCode >= 500) {
        logger.error(`${req.method} ${req.path} failed:`, err);
      } else {
        logger.warn(`${req.method} ${req.path} rejected: ${err.message}`);
      }
      res.status(err.statusCode).json(
        err.details !== undefined && err.statusCode < 500
          ? { error: err.message, details: err.details }
          : { error: err.message }
      );
      return;
    }

    // express.json() rejects malformed bodies with a 400-status SyntaxError
    if (err instanceof SyntaxError && Reflect.get(err, 'status') === 400) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }

    logger.error('Unhandled error:', err);
    res.status(500).json({ error: 'Internal server error' });
  };
}
