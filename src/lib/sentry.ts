/**
 * Smyklot - src/lib/sentry.ts
 * WHAT: Sentry bootstrap plus the few helpers the dispatcher and listeners call.
 * WHY: Every helper is a no-op until init succeeds, so callers never check.
 * FLOWS: initializeSentry() → logger error sink → captureException/addBreadcrumb/setTag → flushSentry on shutdown
 * DOCS:
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import * as Sentry from "@sentry/node";
import { env } from "./env.js";
import { logger, redact, setErrorSink } from "./logger.js";

let sentryEnabled = false;

/** Structural check only: https://{key}@{host}/{project} */
export function hasValidDsn(dsn: string | undefined): dsn is string {
  if (!dsn) return false;
  try {
    const parsed = new URL(dsn);
    return (
      (parsed.protocol === "https:" || parsed.protocol === "http:") &&
      parsed.username.length > 0 &&
      parsed.pathname.length > 1
    );
  } catch {
    return false;
  }
}

/**
 * Never enabled under Vitest or without a usable SENTRY_DSN.
 */
export function initializeSentry(): void {
  if (process.env.VITEST_WORKER_ID) return;

  if (!hasValidDsn(env.SENTRY_DSN)) {
    logger.info("Sentry DSN missing or invalid, error tracking disabled");
    return;
  }

  const environment = env.SENTRY_ENVIRONMENT || env.NODE_ENV;
  try {
    Sentry.init({
      dsn: env.SENTRY_DSN,
      environment,
      release: `smyklot@${env.BOT_VERSION}`,
      tracesSampleRate: env.SENTRY_TRACES_SAMPLE_RATE,
      beforeSend(event) {
        // error messages can quote user content or a token
        if (event.message) event.message = redact(event.message);
        return event;
      },
      // gateway reconnects, logged locally already
      ignoreErrors: ["ECONNRESET", "ETIMEDOUT", "ENOTFOUND"],
    });
  } catch (err) {
    logger.error({ err }, "Failed to initialize Sentry");
    return;
  }

  sentryEnabled = true;
  setErrorSink((err, context) => {
    captureException(err, context);
  });
  logger.info({ environment }, "Sentry initialized");
}

export function isSentryEnabled(): boolean {
  return sentryEnabled;
}

export function captureException(error: unknown, context?: Record<string, unknown>): string | null {
  if (!sentryEnabled) return null;
  return Sentry.captureException(error, { contexts: context ? { smyklot: context } : undefined });
}

export function addBreadcrumb(breadcrumb: {
  message: string;
  category?: string;
  level?: Sentry.SeverityLevel;
  data?: Record<string, unknown>;
}): void {
  if (sentryEnabled) Sentry.addBreadcrumb(breadcrumb);
}

export function setTag(key: string, value: string): void {
  if (sentryEnabled) Sentry.setTag(key, value);
}

/**
 * Resolves false when events were still queued at the deadline.
 */
export async function flushSentry(timeout = 2000): Promise<boolean> {
  if (!sentryEnabled) return true;
  try {
    return await Sentry.flush(timeout);
  } catch (err) {
    logger.warn({ err }, "Sentry flush failed");
    return false;
  }
}
