import { Request, Response, NextFunction } from 'express';
import type { ServerConfig } from '../config/index.js';
import { failure } from '../commands/types.js';
import logger from '../utils/logger.js';

/** Shape of the errors body-parser raises for unreadable request bodies. */
interface BodyParserError extends Error {
  type: string;
  status: number;
}

function isBodyParserError(err: Error): err is BodyParserError {
  return 'type' in err && typeof err.type === 'string' && 'status' in err && typeof err.status === 'number';
}

export function createErrorHandler(config: Pick<ServerConfig, 'nodeEnv'>) {
  return function errorHandler(
    err: Error,
    _req: Request,
    res: Response,
    next: NextFunction
  ): void {
    if (res.headersSent) {
      return next(err);
    }

    if (isBodyParserError(err) && err.status >= 400 && err.status < 500) {
      logger.warn(`Rejected request body: ${err.message}`);
      const message = err.type === 'entity.parse.failed' ? 'Invalid JSON payload' : err.message;
      res.status(err.status).json(failure(message));
      return;
    }

    logger.error('Unhandled error:', err);
    res.status(500).json({
      ...failure('An unexpected error occurred'),
      ...(config.nodeEnv === 'development' && {
        detail: err.message,
        stack: err.stack,
      }),
    });
  };
}
