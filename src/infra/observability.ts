/**
 * Sentry error-tracking initialisation for the sticky gateway.
 *
 * Call initSentry() once at start-up, before the app is created.
 * Sentry is only activated when SENTRY_DSN is set and NODE_ENV is not
 * 'development' or 'test'.
 */
import * as Sentry from '@sentry/node';

let sentryInitialised = false;

export interface SentryOptions {
  dsn?: string;
  environment: string;
  serviceName: string;
}

export function initSentry({ dsn, environment, serviceName }: SentryOptions): void {
  if (!dsn || environment === 'development' || environment === 'test') {
    return;
  }

  Sentry.init({
    dsn,
    environment,
    initialScope: {
      tags: { service: serviceName },
    },
    tracesSampleRate: 0.1,
  });

  // Capture unhandled promise rejections that may slip past Express.
  process.on('unhandledRejection', (reason) => {
    Sentry.captureException(reason);
  });

  sentryInitialised = true;
}

export function isSentryEnabled(): boolean {
  return sentryInitialised;
}

export { Sentry };
