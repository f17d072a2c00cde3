/**
 * Smyklot - src/lib/env.ts
 * WHAT: Environment loading/validation via dotenv + zod.
 * WHY: Fail-fast on missing secrets; keep process.env access centralized.
 * FLOWS: load .env → parse/validate → export typed env object
 * DOCS:
 *  - zod: https://zod.dev
 *  - dotenv: https://github.com/motdotla/dotenv
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";

// override: true outside tests so .env wins over a stale shell environment;
// tests set their variables before import and must not be clobbered.
// GOTCHA: .env is looked up in the working directory. Run from the project root.
const isTest = process.env.NODE_ENV === "test";
dotenv.config({ path: path.join(process.cwd(), ".env"), override: !isTest });

/**
 * Placeholder the release pipeline substitutes with the real version. An
 * unsubstituted value means "unknown build" and is reported as such.
 */
export const VERSION_PLACEHOLDER = "{{version}}";

const truthyPattern = /^(1|true|yes|on)$/i;

/**
 * Splits "a, b,,c " into ["a", "b", "c"]. Used for every comma-separated list
 * variable so they all tolerate the same copy-paste accidents.
 */
export function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Delimiters are the one list where whitespace is meaningful (" " is the
 * default delimiter), so entries are not trimmed. A lone "," in the list is
 * written as "\,".
 */
export function splitDelimiters(value: string | undefined): string[] {
  if (value === undefined || value === "") return [" "];
  const parts = value
    .split(/(?<!\\),/)
    .map((part) => part.replace(/\\,/g, ","))
    .filter((part) => part.length > 0);
  return parts.length > 0 ? parts : [" "];
}

export const envSchema = z.object({
  // Bot won't start without this
  DISCORD_TOKEN: z.string().min(1, "Missing DISCORD_TOKEN"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.string().optional(),

  BOT_VERSION: z.string().default(VERSION_PLACEHOLDER),

  // Comma-separated user IDs; the application owner is added at ready time
  OWNER_IDS: z.string().optional().transform(splitList),

  // Command parsing
  COMMAND_PREFIXES: z
    .string()
    .optional()
    .transform((value) => {
      const prefixes = splitList(value);
      return prefixes.length > 0 ? prefixes : ["!"];
    }),
  COMMAND_DELIMITERS: z.string().optional().transform(splitDelimiters),
  PREFIX_WHITESPACE: z
    .string()
    .optional()
    .transform((value) => (value === undefined ? true : truthyPattern.test(value))),
  MAX_SUGGESTION_DISTANCE: z.coerce.number().int().min(0).max(10).default(3),

  // Shared configuration seeds
  MUTE_ROLE_ID: z.string().optional(),
  GENERAL_CHANNEL_ID: z.string().optional(),
  MODERATOR_ROLE_IDS: z.string().optional().transform(splitList),

  PRESENCE_TEXT: z.string().default("Use !help"),

  // Sentry error tracking - disabled if DSN not provided
  SENTRY_DSN: z.string().optional(),
  SENTRY_ENVIRONMENT: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),
});

export type Env = z.infer<typeof envSchema>;

type RawEnv = Record<string, string | undefined>;

/**
 * Every variable is trimmed except the delimiters, where a space is a value.
 * Empty strings count as unset so `MUTE_ROLE_ID=` in .env behaves like absence.
 */
export function readRawEnv(source: NodeJS.ProcessEnv): RawEnv {
  const raw: RawEnv = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = source[key];
    if (value === undefined) continue;
    const cleaned = key === "COMMAND_DELIMITERS" ? value : value.trim();
    if (cleaned !== "") raw[key] = cleaned;
  }
  return raw;
}

export type EnvResult = { ok: true; env: Env } | { ok: false; issues: string[] };

/**
 * safeParse instead of parse: all problems are reported at once instead of
 * one per restart.
 */
export function parseEnv(source: NodeJS.ProcessEnv): EnvResult {
  const parsed = envSchema.safeParse(readRawEnv(source));
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`),
    };
  }
  return { ok: true, env: parsed.data };
}

const result = parseEnv(process.env);
if (!result.ok) {
  console.error(`Environment validation failed:\n${result.issues.join("\n")}`);
  process.exit(1);
}

export const env: Env = result.env;
