/**
 * Sentry Error Tracking
 * Initialize FIRST, before any other imports in index.ts
 */

import * as Sentry from '@sentry/node';
import { logger } from './logger.js';

const SENTRY_DSN = process.env.SENTRY_DSN;

export function initSentry(): void {
  if (!SENTRY_DSN) {
    logger.info('⚠️ Sentry disabled (no SENTRY_DSN)');
    return;
  }

  Sentry.init({
    dsn: SENTRY_DSN,
    environment: process.env.NODE_ENV || 'development',
    tracesSampleRate: process.env.NODE_ENV === 'production' ? 0.1 : 1.0,

    // Phrases come from children; never ship them as PII
    sendDefaultPii: false,

    ignoreErrors: [
      'Too many requests',
      'Invalid internal API key',
    ],

    beforeSend(event) {
      if (event.request?.headers) {
        delete event.request.headers['authorization'];
      }
      return event;
    },
  });

  logger.info('✅ Sentry initialized');
}

export { Sentry };

/**
 * Capture exception with context
 */
export function captureError(error: unknown, context?: Record<string, unknown>): void {
  if (!SENTRY_DSN) return;

  Sentry.withScope((scope) => {
    if (context) {
      scope.setExtras(context);
    }
    Sentry.captureException(error);
  });
}
