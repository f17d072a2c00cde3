/**
 * Smyklot - src/lib/cmdWrap.ts
 * WHAT: Invocation tracing and the post-dispatch hook.
 * WHY: Every command run logs the same way, and errors are classified and
 *      reported to Sentry in exactly one place.
 * FLOWS:
 *  - startInvocation(): cmd_start → step(...) per phase → elapsed()
 *  - afterDispatch(result): one log line per outcome; Sentry for reportable errors
 *  - withStep(): mark a phase and run some work under it
 * DOCS:
 *  - pino: https://getpino.io
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger, redact, serializeError } from "./logger.js";
import { addBreadcrumb, captureException, setTag } from "./sentry.js";
import { classifyError, errorContext, shouldReportToSentry } from "./errors.js";
import type { DispatchResult } from "../commands/types.js";

/**
 * A label for where we are in a handler. "crashed in phase 'role_add'"
 * narrows a report down faster than a stack trace through discord.js.
 */
type Phase = string;

export interface DispatchMeta {
  traceId: string;
  userId: string;
  guildId: string | null;
  channelId: string;
}

export interface Invocation {
  readonly traceId: string;
  readonly cmd: string;
  step: (phase: Phase) => void;
  currentPhase: () => Phase;
  /** Milliseconds since cmd_start */
  elapsed: () => number;
}

export function startInvocation(cmd: string, invokedAs: string, meta: DispatchMeta): Invocation {
  const startedAt = Date.now();
  let phase: Phase = "enter";

  logger.info(
    {
      evt: "cmd_start",
      traceId: meta.traceId,
      cmd,
      invokedAs,
      userId: meta.userId,
      guildId: meta.guildId ?? "dm",
    },
    "command start"
  );

  setTag("cmd", cmd);
  setTag("traceId", meta.traceId);
  setTag("phase", phase);

  return {
    traceId: meta.traceId,
    cmd,
    step: (next: Phase) => {
      phase = next;
      logger.debug({ evt: "cmd_step", traceId: meta.traceId, cmd, phase });
      addBreadcrumb({ category: "cmd", message: cmd, data: { phase, traceId: meta.traceId }, level: "info" });
      setTag("phase", phase);
    },
    currentPhase: () => phase,
    elapsed: () => Date.now() - startedAt,
  };
}

/**
 * Logs the outcome of one dispatch. Runs for every result, including gate
 * rejections, so a quiet bot can be told apart from a broken one.
 */
export function afterDispatch(result: DispatchResult, meta: DispatchMeta): void {
  const base = { traceId: meta.traceId, userId: meta.userId, guildId: meta.guildId ?? "dm" };

  switch (result.kind) {
    case "ignored":
      return;

    case "not_found":
      logger.info(
        { ...base, evt: "cmd_not_found", input: redact(result.input), suggestion: result.suggestion },
        "command not found"
      );
      return;

    case "guild_only":
      logger.info({ ...base, evt: "cmd_gate", cmd: result.command, gate: "guild_only" }, "command gated");
      return;

    case "check_failed": {
      const payload = { ...base, evt: "cmd_gate", cmd: result.command, gate: "check", check: result.check };
      switch (result.reason.kind) {
        case "log":
          logger.warn({ ...payload, reason: result.reason.text }, "command check failed");
          return;
        case "both":
          logger.warn({ ...payload, reason: result.reason.log }, "command check failed");
          return;
        case "user":
          logger.info(payload, "command check failed");
          return;
        default:
          logger.debug(payload, "command check failed");
          return;
      }
    }

    case "bad_args":
      logger.info(
        { ...base, evt: "cmd_gate", cmd: result.command, gate: "args", got: result.got, min: result.min, max: result.max },
        "command rejected arguments"
      );
      return;

    case "ratelimited":
      logger.info(
        {
          ...base,
          evt: "cmd_gate",
          cmd: result.command,
          gate: "bucket",
          bucket: result.bucket,
          remainingMs: result.remainingMs,
          isFirstTry: result.isFirstTry,
        },
        "command rate limited"
      );
      return;

    case "ok":
      logger.info({ ...base, evt: "cmd_ok", cmd: result.command, ms: result.ms }, "command ok");
      return;

    case "refunded":
      logger.info(
        { ...base, evt: "cmd_refund", cmd: result.command, bucket: result.bucket, ms: result.ms },
        "command ok, bucket refunded"
      );
      return;

    case "error": {
      const classified = classifyError(result.error);
      // `error`, not `err`: the logger hook would otherwise capture it a second time
      logger.error(
        {
          ...base,
          evt: "cmd_error",
          cmd: result.command,
          phase: result.phase,
          ms: result.ms,
          ...errorContext(classified),
          error: serializeError(result.error),
        },
        `command error: ${classified.message}`
      );
      setTag("errorKind", classified.kind);

      if (shouldReportToSentry(classified)) {
        const err = result.error instanceof Error ? result.error : new Error(String(result.error));
        captureException(err, {
          cmd: result.command,
          phase: result.phase,
          traceId: meta.traceId,
          errorKind: classified.kind,
          errorContext: errorContext(classified),
        });
      }
      return;
    }
  }
}

export async function withStep<T>(
  ctx: { step: (phase: Phase) => void },
  phase: Phase,
  fn: () => Promise<T> | T
): Promise<T> {
  ctx.step(phase);
  return await fn();
}
