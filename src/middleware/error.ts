/**
 * Global error-handling middleware.
 *
 * Returns a generic message to avoid leaking implementation details to clients.
 */
import { Request, Response, NextFunction } from 'express';
import { logger } from '../infra/logger';
import { Sentry, isSentryEnabled } from '../infra/observability';

export const errorMiddleware = (
  err: Error,
  req: Request,
  res: Response,
  next: NextFunction,
): void => {
  if (isSentryEnabled()) {
    Sentry.captureException(err);
  }
  logger.error('Sticky gateway error', {
    message: err.message,
    stack: err.stack,
    requestId: req.headers['x-request-id'],
  });

  // Headers already went out (e.g. mid-stream); let Express close the connection.
  if (res.headersSent) {
    next(err);
    return;
  }

  res.status(500).json({
    success: false,
    error: {
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
    },
  });
};
