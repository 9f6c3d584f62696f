import * as Sentry from '@sentry/node';
import logger from './utils/logger';

let sentryEnabled = false;

// Initialize Sentry for error tracking
export function initSentry(): void {
  // Only initialize if DSN is provided
  if (!process.env.SENTRY_DSN) {
    logger.warn('Sentry DSN not found. Skipping Sentry initialization.');
    return;
  }

  Sentry.init({
    dsn: process.env.SENTRY_DSN,
    environment: process.env.NODE_ENV || 'development',
    release: process.env.SENTRY_RELEASE || 'state-graph-runtime@unknown',
    tracesSampleRate: process.env.NODE_ENV === 'production' ? 0.1 : 1.0,

    // Filter out sensitive information
    beforeSend(event) {
      logger.info('Sending error to Sentry', {
        eventId: event.event_id,
        level: event.level,
      });

      if (event.request) {
        delete event.request.cookies;
        delete event.request.headers?.authorization;
        delete event.request.headers?.cookie;
      }

      return event;
    },
  });

  sentryEnabled = true;
  logger.info('Sentry initialized successfully', {
    environment: process.env.NODE_ENV,
    release: process.env.SENTRY_RELEASE,
  });
}

export function isSentryEnabled(): boolean {
  return sentryEnabled;
}

/**
 * Report a failed graph execution. No-op until `initSentry` has run.
 */
export function reportExecutionFailure(
  error: Error,
  context: { executionId: string; graphName: string; nodeId: string },
): void {
  if (!sentryEnabled) return;
  Sentry.captureException(error, {
    tags: {
      graph: context.graphName,
      node: context.nodeId,
    },
    extra: { executionId: context.executionId },
  });
}

// Export Sentry for use in other files
export { Sentry };
