/**
 * Pino-based structured logger for the sticky gateway.
 *
 * Redacts credentials and cookies so affinity tokens and session cookies
 * never land in production logs.
 * Log level is driven by the LOG_LEVEL env var. Without it the logger is
 * silent under NODE_ENV=test, `info` in production and `debug` elsewhere.
 */
import pino from 'pino';

const NODE_ENV = process.env.NODE_ENV ?? 'production';
const defaultLevel = NODE_ENV === 'test' ? 'silent' : NODE_ENV === 'production' ? 'info' : 'debug';
const LOG_LEVEL = process.env.LOG_LEVEL ?? defaultLevel;

const pinoInstance = pino({
  level: LOG_LEVEL,
  redact: {
    paths: [
      'password',
      'token',
      'secret',
      'authorization',
      'req.headers.authorization',
      'req.headers.cookie',
      'res.headers["set-cookie"]',
      '*.password',
      '*.token',
      '*.secret',
    ],
    censor: '[REDACTED]',
  },
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: { service: process.env.SERVICE_NAME ?? 'sticky-gateway' },
}, process.stdout);

type LogMeta = Record<string, unknown>;

/**
 * Wrapped logger with a `logger.info(message, meta?)` call signature.
 */
export const logger = {
  error: (message: string, meta?: LogMeta) => {
    if (meta) pinoInstance.error({ ...meta }, message);
    else pinoInstance.error(message);
  },
  warn: (message: string, meta?: LogMeta) => {
    if (meta) pinoInstance.warn({ ...meta }, message);
    else pinoInstance.warn(message);
  },
  info: (message: string, meta?: LogMeta) => {
    if (meta) pinoInstance.info({ ...meta }, message);
    else pinoInstance.info(message);
  },
  debug: (message: string, meta?: LogMeta) => {
    if (meta) pinoInstance.debug({ ...meta }, message);
    else pinoInstance.debug(message);
  },
};

/** Raw pino instance — used by pino-http. */
export default pinoInstance;
