import { z } from 'zod';

export const envSchema = z.object({
  PORT: z.coerce.number().int().positive(),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  UPSTREAM_URL: z.string().url(),
  // Comma-separated origins; unset means cross-origin requests are denied.
  ALLOWED_ORIGINS: z.string().optional(),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(1000),
  STICKY_LEGACY_COOKIE_PATH: z
    .string()
    .startsWith('/', { message: 'must be an absolute cookie path' })
    .optional(),
  // Observability (all optional — safe defaults applied in infra/logger.ts etc.)
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).optional(),
  SERVICE_NAME: z.string().default('sticky-gateway'),
  SERVICE_VERSION: z.string().default('1.0.0'),
  SENTRY_DSN: z.string().url().optional(),
});

export type Env = z.infer<typeof envSchema>;

export const parseEnv = (source: NodeJS.ProcessEnv): Env => envSchema.parse(source);
