/**
 * Request correlation middleware.
 *
 * Reuses the caller's `x-request-id` when it is a short printable token and
 * mints a UUID v4 otherwise. The id is written back onto the request (so the
 * upstream proxy forwards it) and echoed as a response header.
 */
import { randomUUID } from 'crypto';
import { Request, Response, NextFunction } from 'express';

const REQUEST_ID_PATTERN = /^[\w.:-]{1,128}$/;

export const requestIdMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const existing = req.headers['x-request-id'];
  const id =
    typeof existing === 'string' && REQUEST_ID_PATTERN.test(existing) ? existing : randomUUID();

  req.headers['x-request-id'] = id;
  res.setHeader('x-request-id', id);
  next();
};
