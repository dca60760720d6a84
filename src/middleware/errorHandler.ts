import { Request, Response, NextFunction } from 'express';
import { AppError, PersistenceError, ScreeningError, ServiceError } from '../utils/errors';
import { env } from '../config/env';
import { logger } from '../utils/logger';

function isBodyParseError(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction) {
  if (isBodyParseError(err)) {
    res.status(400).json({ success: false, error: 'Malformed JSON body' });
    return;
  }

  logger.error('Unhandled error', {
    error: err.message,
    stack: err.stack,
    path: req.path,
    method: req.method,
  });

  if (err instanceof ScreeningError) {
    res.status(err.statusCode).json({ success: false, error: err.code, message: err.message });
    return;
  }

  if (err instanceof ServiceError) {
    res.status(503).json({ success: false, error: 'Service temporarily unavailable' });
    return;
  }

  if (err instanceof PersistenceError) {
    res.status(500).json({ success: false, error: 'PERSISTENCE_ERROR' });
    return;
  }

  if (err instanceof AppError) {
    res.status(err.statusCode).json({ success: false, error: err.message });
    return;
  }

  // Don't leak internal errors in production
  const message = env.NODE_ENV === 'production' ? 'Internal server error' : err.message;

  res.status(500).json({ success: false, error: message });
}
