/**
 * HTTP request logging middleware.
 *
 * One structured pino line per request/response, keyed by the correlation
 * id. Cookies and the affinity cookies the upstream sets are redacted.
 */
import { randomUUID } from 'crypto';
import PinoHttp from 'pino-http';
import pinoInstance from '../infra/logger';

const PROBE_PATHS = new Set(['/health', '/ready', '/metrics']);

export const httpLogger = PinoHttp({
  logger: pinoInstance,
  genReqId: (req) => {
    const id = req.headers['x-request-id'];
    return typeof id === 'string' && id.length > 0 ? id : randomUUID();
  },
  redact: {
    paths: ['req.headers.authorization', 'req.headers.cookie', 'res.headers["set-cookie"]'],
    censor: '[REDACTED]',
  },
  autoLogging: {
    ignore: (req) => PROBE_PATHS.has(req.url ?? ''),
  },
});
