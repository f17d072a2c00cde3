/**
 * Smyklot - src/lib/logger.ts
 * WHAT: Pino logger with light redaction and an error sink for error-level logs.
 * WHY: Centralizes structured logging to keep other modules clean.
 * FLOWS: create logger → redact helpers → setErrorSink(fn) once Sentry is live → error logs reach it
 * DOCS:
 *  - pino: https://getpino.io
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import pino from "pino";

/**
 * Redaction patterns for secrets and pings that might leak into logs.
 *
 * Token pattern: Discord bot tokens are 3 base64-ish segments separated by dots.
 * Mention pattern: @everyone/@here in logs usually means user content leaked
 *                  through; it should never be echoed back anywhere raw.
 */
const tokenRe = /[A-Za-z0-9_-]{24}\.[A-Za-z0-9_-]{6}\.[A-Za-z0-9_-]{27}/g;
const dsnRe = /(https?:\/\/)([^:@]+):[^@]+@/gi;
const mentionRe = /@(everyone|here)/gi;

export type ErrorSink = (err: Error, context: { message?: string; level: string }) => void;

let errorSink: ErrorSink | null = null;

/**
 * Registered by initializeSentry(). Kept here so the logger never imports
 * the sentry module, which itself logs.
 */
export function setErrorSink(sink: ErrorSink | null): void {
  errorSink = sink;
}

/**
 * Sanitizes strings before logging. Use on any user-controlled or external data.
 * Truncates at 300 chars to prevent log flooding.
 */
export function redact(value: string): string {
  if (!value) return "";
  let sanitized = value.replace(/\s+/g, " ").trim();
  sanitized = sanitized.replace(tokenRe, "[redacted_token]");
  sanitized = sanitized.replace(dsnRe, "$1$2:[redacted]@");
  sanitized = sanitized.replace(mentionRe, "@redacted");
  if (sanitized.length > 300) {
    sanitized = `${sanitized.slice(0, 300)}...`;
  }
  return sanitized;
}

/**
 * Keeps only the fields worth reading from an error. discord.js errors carry
 * request bodies and circular client references we never want serialized.
 */
export function serializeError(e: unknown): Record<string, unknown> {
  if (e instanceof Error) {
    const code: unknown = "code" in e ? e.code : undefined;
    return { name: e.name, code, message: e.message, stack: e.stack };
  }
  return { message: String(e) };
}

const logLevel = process.env.LOG_LEVEL ?? "info";
const isVitest = !!process.env.VITEST_WORKER_ID;
const wantPretty = isVitest || (process.env.LOG_PRETTY === "true" && process.stdout.isTTY);

export const logger = pino({
  level: logLevel,
  // Newline-delimited JSON unless pretty output was asked for
  ...(wantPretty
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "pid,hostname",
            singleLine: false,
          },
        },
      }
    : {}),
  base: undefined,
  serializers: {
    err: serializeError,
  },
  /**
   * Error-level logs that carry an Error go to the error sink, so callers
   * just use logger.error() and never call captureException themselves.
   */
  hooks: {
    logMethod(args, method, level) {
      if (errorSink && level >= pino.levels.values.error) {
        const firstArg: unknown = args[0];
        const errorCandidate =
          firstArg instanceof Error
            ? firstArg
            : firstArg && typeof firstArg === "object" && "err" in firstArg
              ? firstArg.err
              : undefined;

        if (errorCandidate instanceof Error) {
          errorSink(errorCandidate, {
            message: typeof args[1] === "string" ? args[1] : undefined,
            level: pino.levels.labels[level] ?? "error",
          });
        }
      }

      return method.apply(this, args);
    },
  },
});
