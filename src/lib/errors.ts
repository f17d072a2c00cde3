/**
 * Smyklot - src/lib/errors.ts
 * WHAT: Discriminated union error types for precise error handling
 * WHY: Handlers translate upstream failures into outcomes; the dispatcher decides what to report
 * FLOWS:
 *  - classifyError(err) → ClassifiedError union type
 *  - describeForUser(err) → short phrase safe to show in a reply
 *  - shouldReportToSentry(err) → boolean (filter noise)
 * USAGE:
 *  import { classifyError } from "./errors.js";
 *  const classified = classifyError(err);
 *  if (classified.kind === "discord_api" && classified.code === 10007) { ... }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// ===== Error Type Definitions =====

/**
 * The `kind` field is the discriminator. It works across module boundaries,
 * unlike instanceof checks against discord.js classes.
 */
export interface AppError {
  kind: string;
  message: string;
  cause?: Error;
}

/**
 * Discord API errors. Discord uses numeric codes, not HTTP status, to name
 * the failure. The ones handlers care about:
 * - 10007: Unknown Member
 * - 10011: Unknown Role
 * - 50013: Missing Permissions
 * - 50001: Missing Access
 */
export interface DiscordApiError extends AppError {
  kind: "discord_api";
  code: number;
  httpStatus?: number;
  method?: string;
  path?: string;
}

/** Validation errors (user input) */
export interface ValidationError extends AppError {
  kind: "validation";
  field: string;
  value?: unknown;
}

/** Permission errors (Discord permissions) */
export interface PermissionError extends AppError {
  kind: "permission";
  needed: string[];
}

/**
 * Node system errors: the request never reached Discord or the connection
 * dropped mid-flight.
 */
export interface NetworkError extends AppError {
  kind: "network";
  code: string;
  host?: string;
}

/** Configuration errors (required shared state missing) */
export interface ConfigError extends AppError {
  kind: "config";
  key: string;
}

export interface UnknownError extends AppError {
  kind: "unknown";
}

export type ClassifiedError =
  | DiscordApiError
  | ValidationError
  | PermissionError
  | NetworkError
  | ConfigError
  | UnknownError;

/**
 * Thrown by code that finds a required configuration value missing. Carries
 * the key so classifyError can keep it.
 */
export class MissingConfigError extends Error {
  readonly key: string;

  constructor(key: string, message = `Missing configuration: ${key}`) {
    super(message);
    this.name = "MissingConfigError";
    this.key = key;
  }
}

const NETWORK_CODES = ["ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "ECONNREFUSED", "EPIPE", "EAI_AGAIN"];

function readString(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === "string" ? value : undefined;
}

function readNumber(source: object, key: string): number | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === "number" ? value : undefined;
}

// ===== Error Classification =====

/**
 * Classify any caught error into a discriminated union.
 *
 * Ordered from most specific to least: our own config error, permission codes
 * (50013/50001 are Discord errors too, but callers want them as permissions),
 * other Discord API errors, network errors, then unknown.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (err === null || err === undefined) {
    return { kind: "unknown", message: "Unknown error (null/undefined)" };
  }

  const cause = err instanceof Error ? err : undefined;

  if (err instanceof MissingConfigError) {
    return { kind: "config", key: err.key, message: err.message, cause };
  }

  if (typeof err !== "object") {
    return { kind: "unknown", message: String(err) };
  }

  const error = err;
  const message = readString(error, "message") ?? String(err);
  const code: unknown = Reflect.get(error, "code");
  const name = readString(error, "name");

  if (code === 50013) {
    return { kind: "permission", needed: ["Unknown"], message, cause };
  }

  // Missing access: the bot cannot see the resource at all
  if (code === 50001) {
    return { kind: "permission", needed: ["ViewChannel"], message, cause };
  }

  if (typeof code === "number" && (name === "DiscordAPIError" || name?.includes("Discord"))) {
    return {
      kind: "discord_api",
      code,
      httpStatus: readNumber(error, "httpStatus") ?? readNumber(error, "status"),
      method: readString(error, "method"),
      path: readString(error, "path") ?? readString(error, "url"),
      message,
      cause,
    };
  }

  if (typeof code === "string" && NETWORK_CODES.includes(code)) {
    return {
      kind: "network",
      code,
      host: readString(error, "hostname") ?? readString(error, "host"),
      message,
      cause,
    };
  }

  return { kind: "unknown", message, cause };
}

// ===== Error Predicates =====

/**
 * Sentry alerts should mean "something is actually broken", not "Discord had
 * a hiccup" or "a moderator removed the bot's role".
 */
export function shouldReportToSentry(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "discord_api": {
      const ignoredCodes = [
        10003, // Unknown channel (deleted)
        10007, // Unknown member (left the guild)
        10008, // Unknown message (deleted before we replied)
        10011, // Unknown role (mute role deleted)
      ];
      return !ignoredCodes.includes(err.code);
    }

    case "network":
    case "validation":
    case "permission":
      return false;

    default:
      return true;
  }
}

/**
 * Human-readable reason for a failed upstream call. Mutation commands put
 * this in their reply instead of the raw API message.
 */
export function describeForUser(err: ClassifiedError): string {
  switch (err.kind) {
    case "permission":
      return "I don't have permission to do that";
    case "discord_api":
      if (err.code === 10007) return "that member is no longer in the server";
      if (err.code === 10011) return "the role no longer exists";
      return "Discord rejected the request";
    case "network":
      return "Discord could not be reached";
    case "config":
      return `the bot is missing configuration (${err.key})`;
    case "validation":
      return `invalid ${err.field}`;
    default:
      return "something went wrong";
  }
}

// ===== Error Context Helpers =====

/**
 * Flat log fields for a classified error. Spread into pino payloads.
 */
export function errorContext(
  err: ClassifiedError,
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  const base: Record<string, unknown> = {
    errorKind: err.kind,
    errorMessage: err.message,
    ...extra,
  };

  switch (err.kind) {
    case "discord_api":
      base.code = err.code;
      base.httpStatus = err.httpStatus;
      break;
    case "network":
      base.code = err.code;
      base.host = err.host;
      break;
    case "permission":
      base.needed = err.needed;
      break;
    case "config":
      base.key = err.key;
      break;
    case "validation":
      base.field = err.field;
      break;
  }

  return base;
}
