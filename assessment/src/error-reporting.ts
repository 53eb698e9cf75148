import * as Sentry from "@sentry/node";
import { isResponseQualityError } from "@response-quality/core";

export interface ErrorReporter {
  readonly enabled: boolean;
  report(error: unknown, context?: Record<string, unknown>): void;
}

export interface ErrorReportingOptions {
  dsn: string | null;
  environment: string;
}

/**
 * Sentry is initialised only when a DSN is configured.
 * Input and configuration errors are never reported.
 */
export const createErrorReporter = ({ dsn, environment }: ErrorReportingOptions): ErrorReporter => {
  const enabled = dsn !== null && dsn.length > 0;

  if (enabled) {
    Sentry.init({ dsn, environment });
  }

  return {
    enabled,
    report(error, context) {
      if (!enabled || isResponseQualityError(error)) {
        return;
      }
      Sentry.captureException(error, context ? { extra: context } : undefined);
    },
  };
};
