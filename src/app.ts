import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { createUpstreamProxy } from './routes/proxy';
import { httpLogger } from './middleware/logger';
import { requestIdMiddleware } from './middleware/request-id';
import { metricsMiddleware } from './middleware/metrics';
import { errorMiddleware } from './middleware/error';
import { stickyHeader } from './middleware/sticky-header';
import { register } from './infra/metrics';

export interface GatewayOptions {
  /** Load balancer every non-probe request is forwarded to. */
  upstreamUrl: string;
  allowedOrigins?: string;
  rateLimit?: { windowMs: number; limit: number };
  legacyCookiePath?: string;
  serviceName?: string;
  serviceVersion?: string;
}

// ALLOWED_ORIGINS entries may be an exact origin or a pattern such as
// "https://*.example.com". No entries denies all cross-origin requests.
const buildCorsOrigin = (raw: string | undefined): cors.CorsOptions['origin'] => {
  const entries = (raw ?? '').split(',').map((o) => o.trim()).filter(Boolean);
  if (entries.length === 0) return false;

  const matchers: Array<string | RegExp> = entries.map((entry) => {
    if (entry.includes('*')) {
      const escaped = entry.replace(/[.+?^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '[^.]+');
      return new RegExp(`^${escaped}$`);
    }
    return entry;
  });

  return (origin, callback) => {
    // Same-origin / non-browser (no Origin header) requests.
    if (!origin) return callback(null, true);
    const allowed = matchers.some((m) =>
      typeof m === 'string' ? m === origin : m.test(origin)
    );
    if (allowed) return callback(null, true);
    callback(new Error('Not allowed by CORS'));
  };
};

export const createApp = (options: GatewayOptions): Application => {
  const app: Application = express();
  const serviceName = options.serviceName ?? 'sticky-gateway';
  const serviceVersion = options.serviceVersion ?? '1.0.0';
  const serviceStartTime = Date.now();

  app.disable('x-powered-by');
  app.use(helmet());

  app.use(cors({
    origin: buildCorsOrigin(options.allowedOrigins),
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-Id'],
    exposedHeaders: ['X-Request-Id'],
    optionsSuccessStatus: 204,
  }));

  // ─── Observability middleware (before routes) ───────────────────────────────
  app.use(requestIdMiddleware);
  app.use(httpLogger);
  app.use(metricsMiddleware);

  app.use(rateLimit({
    windowMs: options.rateLimit?.windowMs ?? 60_000,
    limit: options.rateLimit?.limit ?? 1000,
    standardHeaders: true,
    legacyHeaders: false,
    message: {
      success: false,
      error: {
        code: 'RATE_LIMIT_EXCEEDED',
        message: 'Too many requests. Please retry after the window resets.',
      },
    },
  }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      service: serviceName,
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - serviceStartTime) / 1000),
      version: serviceVersion,
    });
  });

  // Readiness probe — returns 200 once the process is ready to serve traffic.
  app.get('/ready', (_req, res) => {
    res.json({ status: 'ready', service: serviceName, timestamp: new Date().toISOString() });
  });

  // Prometheus metrics endpoint.
  app.get('/metrics', async (_req, res, next) => {
    try {
      res.set('Content-Type', register.contentType);
      res.end(await register.metrics());
    } catch (err) {
      next(err);
    }
  });

  // Everything else goes to the upstream, with backend affinity surfaced as a header.
  app.use(stickyHeader(createUpstreamProxy(options.upstreamUrl), {
    legacyCookiePath: options.legacyCookiePath,
  }));

  app.use(errorMiddleware);

  return app;
};
