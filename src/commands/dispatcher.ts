/**
 * Smyklot - src/commands/dispatcher.ts
 * WHAT: Turns a chat message into at most one command invocation.
 * WHY: Prefix matching, resolution, gating and rate limiting in a fixed order,
 *      so every command gets the same treatment.
 * FLOWS:
 *  - dispatch(message):
 *      bot author? → ignored
 *      prefix (literal or bot mention) → resolve name → not_found (+ suggestion)
 *      guild-only → owners-only → checks → argument count → bucket
 *      handler → "revert_bucket"? refund
 *      afterDispatch(result) always
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { Args, skipDelimiters } from "../lib/args.js";
import { afterDispatch, startInvocation, type DispatchMeta } from "../lib/cmdWrap.js";
import type { ConfigStore } from "../lib/configStore.js";
import { nearest } from "../lib/editDistance.js";
import { MissingConfigError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { OwnerSet } from "../lib/owner.js";
import { formatCooldown, type BucketRegistry } from "../lib/rateLimiter.js";
import { ctx as reqCtx, newTraceId, runWithCtx } from "../lib/reqctx.js";
import { evaluateAccess } from "./access.js";
import type { CommandRegistry } from "./registry.js";
import {
  REVERT_BUCKET,
  type ChatPlatform,
  type CommandDescriptor,
  type DispatchResult,
  type DispatchSettings,
  type GroupDescriptor,
  type IncomingMessage,
} from "./types.js";

export const GUILD_ONLY_MESSAGE = "This command only works in servers.";

export interface DispatcherDeps {
  registry: CommandRegistry;
  buckets: BucketRegistry;
  config: ConfigStore;
  platform: ChatPlatform;
  owners: OwnerSet;
  settings: DispatchSettings;
}

function countArgs(n: number): string {
  return `${n} argument${n === 1 ? "" : "s"}`;
}

export function describeArgBounds(min: number | undefined, max: number | undefined): string {
  if (min !== undefined && min === max) return `exactly ${countArgs(min)}`;
  if (min !== undefined && max !== undefined) return `between ${min} and ${countArgs(max)}`;
  if (min !== undefined) return `at least ${countArgs(min)}`;
  return `at most ${countArgs(max ?? 0)}`;
}

/**
 * What the user sees for a result, or null for silence.
 */
export function userFacingText(result: DispatchResult): string | null {
  switch (result.kind) {
    case "not_found":
      return result.suggestion
        ? `Did you mean \`${result.suggestion}\`?`
        : `Could not find command \`${result.input}\`.`;
    case "guild_only":
      return GUILD_ONLY_MESSAGE;
    case "check_failed":
      if (result.reason.kind === "user") return result.reason.text;
      if (result.reason.kind === "both") return result.reason.user;
      return null;
    case "bad_args":
      return `Expected ${describeArgBounds(result.min, result.max)}, got ${result.got}.`;
    case "ratelimited":
      return result.isFirstTry ? `Try this again in ${formatCooldown(result.remainingMs)}.` : null;
    case "error":
      return `Something went wrong while running \`${result.command}\`.`;
    default:
      return null;
  }
}

export class Dispatcher {
  private readonly deps: DispatcherDeps;

  constructor(deps: DispatcherDeps) {
    this.deps = deps;
    // A command pointing at an undefined bucket would otherwise only fail on first use
    for (const { command } of deps.registry.commands()) {
      if (command.bucket !== undefined && !deps.buckets.get(command.bucket)) {
        throw new MissingConfigError(`bucket:${command.bucket}`, `Command ${command.name} uses undefined bucket ${command.bucket}`);
      }
    }
  }

  /**
   * The text after the prefix, or null when the message doesn't address the
   * bot. A mention prefix always tolerates blanks after it; a literal one
   * only when allowWhitespace is set.
   */
  stripPrefix(content: string): string | null {
    const { settings, platform } = this.deps;
    const botId = platform.currentUserId();
    const mentions = botId ? [`<@${botId}>`, `<@!${botId}>`] : [];

    for (const mention of mentions) {
      if (content.startsWith(mention)) {
        return skipDelimiters(content.slice(mention.length), settings.delimiters, true);
      }
    }

    // Longest literal first so "!!" wins over "!"
    const literals = [...settings.prefixes].filter((p) => p.length > 0).sort((a, b) => b.length - a.length);
    for (const prefix of literals) {
      if (!content.startsWith(prefix)) continue;
      const rest = content.slice(prefix.length);
      if (settings.allowWhitespace) return skipDelimiters(rest, settings.delimiters, true);
      if (/^\s/.test(rest)) return null;
      return rest;
    }
    return null;
  }

  async dispatch(message: IncomingMessage): Promise<DispatchResult> {
    if (this.deps.settings.ignoreBots && message.author.bot) return { kind: "ignored" };

    const body = this.stripPrefix(message.content);
    if (body === null || body.trim() === "") return { kind: "ignored" };

    const meta: DispatchMeta = {
      traceId: reqCtx().traceId ?? newTraceId(),
      userId: message.author.id,
      guildId: message.guildId,
      channelId: message.channelId,
    };
    return runWithCtx(meta, async () => {
      const result = await this.route(message, body, meta);
      afterDispatch(result, meta);
      await this.notify(message, result);
      return result;
    });
  }

  private async route(message: IncomingMessage, body: string, meta: DispatchMeta): Promise<DispatchResult> {
    const { registry, settings } = this.deps;
    const resolution = registry.resolve(body, settings.delimiters);

    if (resolution.kind === "not_found") {
      const suggestion = resolution.token
        ? nearest(resolution.token, resolution.candidates, settings.maxSuggestionDistance)
        : null;
      return {
        kind: "not_found",
        input: `${resolution.prefix}${resolution.token}`.trim(),
        suggestion: suggestion ? `${resolution.prefix}${suggestion.name}` : null,
      };
    }

    const { command, path, invokedAs, rest } = resolution;
    return runWithCtx({ cmd: command.name }, () => this.run(message, command, path, invokedAs, rest, meta));
  }

  private async run(
    message: IncomingMessage,
    command: CommandDescriptor,
    path: readonly GroupDescriptor[],
    invokedAs: string,
    rest: string,
    meta: DispatchMeta
  ): Promise<DispatchResult> {
    const { buckets, config, owners, settings } = this.deps;
    const snapshot = await config.get();

    const access = await evaluateAccess({ message, command, path, owners, config: snapshot });
    if (!access.allowed) {
      if (access.failure === "guild_only") return { kind: "guild_only", command: command.name };
      return { kind: "check_failed", command: command.name, check: access.check.name, reason: access.reason };
    }

    const args = new Args(rest, settings.delimiters);
    const { minArgs: min, maxArgs: max } = command;
    if ((min !== undefined && args.length < min) || (max !== undefined && args.length > max)) {
      return { kind: "bad_args", command: command.name, min, max, got: args.length };
    }

    const bucket = command.bucket !== undefined ? buckets.get(command.bucket) : undefined;
    const bucketKey = bucket?.keyFor({ userId: message.author.id, channelId: message.channelId, guildId: message.guildId });
    let consumedAt: number | null = null;
    if (bucket && bucketKey !== undefined) {
      const taken = bucket.take(bucketKey);
      if (!taken.allowed) {
        return {
          kind: "ratelimited",
          command: command.name,
          bucket: bucket.name,
          remainingMs: taken.remainingMs,
          isFirstTry: taken.isFirstTry,
        };
      }
      consumedAt = taken.consumedAt;
    }

    const invocation = startInvocation(command.name, invokedAs, meta);
    try {
      const outcome = await command.handler({
        message,
        args,
        command,
        invokedAs,
        config,
        platform: this.deps.platform,
        registry: this.deps.registry,
        owners,
        settings,
        traceId: meta.traceId,
        step: invocation.step,
      });

      if (outcome === REVERT_BUCKET) {
        if (bucket && bucketKey !== undefined && consumedAt !== null) bucket.revert(bucketKey, consumedAt);
        return { kind: "refunded", command: command.name, bucket: bucket?.name ?? null, ms: invocation.elapsed() };
      }
      return { kind: "ok", command: command.name, ms: invocation.elapsed() };
    } catch (error) {
      return {
        kind: "error",
        command: command.name,
        phase: invocation.currentPhase(),
        error,
        ms: invocation.elapsed(),
      };
    }
  }

  private async notify(message: IncomingMessage, result: DispatchResult): Promise<void> {
    const text = userFacingText(result);
    if (text === null) return;
    try {
      await message.reply(text);
    } catch (err) {
      logger.warn({ evt: "cmd_reply_fail", traceId: reqCtx().traceId, kind: result.kind, err }, "[dispatch] reply failed");
    }
  }
}
