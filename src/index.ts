import 'dotenv/config';
import { createApp } from './app';
import { parseEnv } from './config/env';
import { initSentry } from './infra/observability';
import { logger } from './infra/logger';

const env = parseEnv(process.env);

// Initialise Sentry before anything else so errors during startup are captured.
initSentry({ dsn: env.SENTRY_DSN, environment: env.NODE_ENV, serviceName: env.SERVICE_NAME });

const app = createApp({
  upstreamUrl: env.UPSTREAM_URL,
  allowedOrigins: env.ALLOWED_ORIGINS,
  rateLimit: { windowMs: env.RATE_LIMIT_WINDOW_MS, limit: env.RATE_LIMIT_MAX },
  legacyCookiePath: env.STICKY_LEGACY_COOKIE_PATH,
  serviceName: env.SERVICE_NAME,
  serviceVersion: env.SERVICE_VERSION,
});

app.listen(env.PORT, () => {
  logger.info(`Sticky gateway running on port ${env.PORT}`);
  logger.info(`Upstream: ${env.UPSTREAM_URL}`);
  if (env.STICKY_LEGACY_COOKIE_PATH) {
    logger.info(`Expiring legacy affinity cookie on ${env.STICKY_LEGACY_COOKIE_PATH}`);
  }
});

export default app;
