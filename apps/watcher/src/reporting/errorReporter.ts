import * as Sentry from "@sentry/node";

import type { Logger } from "../logger.js";

export type ReportTags = Record<string, string>;

export interface ErrorReporter {
  captureException(err: unknown, tags?: ReportTags): void;
  captureMessage(message: string, tags?: ReportTags): void;
  flush(timeoutMs: number): Promise<boolean>;
}

export const noopErrorReporter: ErrorReporter = {
  captureException: () => {},
  captureMessage: () => {},
  flush: async () => true,
};

class SentryErrorReporter implements ErrorReporter {
  captureException(err: unknown, tags?: ReportTags): void {
    Sentry.captureException(err, { tags });
  }

  captureMessage(message: string, tags?: ReportTags): void {
    Sentry.captureMessage(message, { level: "warning", tags });
  }

  flush(timeoutMs: number): Promise<boolean> {
    return Sentry.flush(timeoutMs);
  }
}

/**
 * Sentry when a DSN is configured, otherwise failures only reach the log.
 */
export function createErrorReporter(dsn: string | undefined, logger: Logger): ErrorReporter {
  if (!dsn) {
    logger.info({ component: "reporter" }, "error reporting disabled (SENTRY_DSN not set)");
    return noopErrorReporter;
  }
  Sentry.init({ dsn, defaultIntegrations: false });
  logger.info({ component: "reporter" }, "error reporting enabled");
  return new SentryErrorReporter();
}
