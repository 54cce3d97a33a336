import * as Sentry from '@sentry/node';

const dsn = process.env.SENTRY_DSN;

if (dsn) {
  Sentry.init({
    dsn,
    environment: process.env.NODE_ENV || 'development',
    tracesSampleRate: 0,
    beforeSend(event) {
      // Add memory info to all events
      const mem = process.memoryUsage();
      event.contexts = {
        ...event.contexts,
        memory: {
          heap_used_mb: Math.round(mem.heapUsed / 1024 / 1024),
          rss_mb: Math.round(mem.rss / 1024 / 1024),
        },
      };
      return event;
    },
  });

  // Capture unhandled rejections
  process.on('unhandledRejection', (reason) => {
    Sentry.captureException(reason);
  });
}

export { Sentry };
