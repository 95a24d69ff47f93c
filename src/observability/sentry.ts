import * as Sentry from "@sentry/node";

let enabled = false;

/**
 * Initialize the Sentry SDK. Call once at startup, before background work
 * begins. Without a DSN Sentry stays disabled and captureError is a no-op.
 */
export function initSentry(dsn: string | undefined, environment: string): void {
  enabled = false;
  if (!dsn) return;

  Sentry.init({
    dsn,
    environment,
    release: process.env.SENTRY_RELEASE ?? undefined,
    // Only alert on new error types
    integrations: [Sentry.dedupeIntegration()],
  });
  enabled = true;
}

/**
 * Report an unexpected failure from background work.
 * `source` names the component ("quote-job-processor", "coordination-sweep").
 */
export function captureError(
  error: unknown,
  context: {
    source: string;
    jobId?: string;
    extra?: Record<string, unknown>;
  },
): void {
  if (!enabled) return;
  Sentry.captureException(error, {
    tags: {
      source: context.source,
      ...(context.jobId && { jobId: context.jobId }),
    },
    extra: context.extra,
  });
}
