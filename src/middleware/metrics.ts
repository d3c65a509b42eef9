/**
 * HTTP metrics middleware.
 *
 * Records http_request_duration_seconds, http_requests_total and
 * http_errors_total (4xx/5xx only), labelled by method, route and status.
 * Proxied traffic has no matched route pattern, so its route label is
 * collapsed to `proxy` to keep label cardinality bounded.
 */
import { Request, Response, NextFunction } from 'express';
import {
  httpRequestDuration,
  httpRequestCounter,
  errorCounter,
} from '../infra/metrics';

export const metricsMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const startTime = process.hrtime.bigint();

  res.on('finish', () => {
    const durationSeconds = Number(process.hrtime.bigint() - startTime) / 1e9;
    const routePath: unknown = req.route?.path;
    const labels = {
      method: req.method,
      route: typeof routePath === 'string' ? routePath : 'proxy',
      status_code: String(res.statusCode),
    };

    httpRequestDuration.observe(labels, durationSeconds);
    httpRequestCounter.inc(labels);

    if (res.statusCode >= 400) {
      errorCounter.inc(labels);
    }
  });

  next();
};
