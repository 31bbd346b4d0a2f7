import { Request, Response, NextFunction } from 'express';
import { AppError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export function errorMiddleware(
  err: AppError,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const statusCode = err.statusCode || 500;
  const code = err.code || 'INTERNAL_ERROR';
  const message = err.message || 'An unexpected error occurred';

  const log = statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
  log('Request error', {
    path: req.path,
    method: req.method,
    statusCode,
    code,
    message,
    stack: statusCode >= 500 ? err.stack : undefined,
  });

  res.status(statusCode).json({
    success: false,
    error: {
      code,
      message,
      details: err.details,
    },
  });
}
