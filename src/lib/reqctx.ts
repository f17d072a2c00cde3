/**
 * Smyklot - src/lib/reqctx.ts
 * WHAT: Async-local context for one dispatch: trace id, command and caller.
 * WHY: Helpers deep in a handler can log the trace id without it being passed down.
 * FLOWS: dispatch → runWithCtx({ traceId, userId, ... }) → runWithCtx({ cmd }) → ctx()
 * DOCS:
 *  - Node AsyncLocalStorage: https://nodejs.org/api/async_context.html#class-asynclocalstorage
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { AsyncLocalStorage } from "node:async_hooks";
import { randomBytes } from "node:crypto";

export type ReqContext = {
  traceId: string;
  cmd?: string;
  userId?: string;
  guildId: string | null;
  channelId: string | null;
};

const storage = new AsyncLocalStorage<ReqContext>();

/** 8 random bytes as base64url: 11 characters */
export function newTraceId(): string {
  return randomBytes(8).toString("base64url");
}

/**
 * Runs fn with the parent's context overlaid by meta. discord.js listeners
 * start outside any context, so the dispatcher opens the outer one per message.
 */
export function runWithCtx<T>(meta: Partial<ReqContext>, fn: () => T): T {
  const parent = storage.getStore();
  return storage.run(
    {
      traceId: meta.traceId ?? parent?.traceId ?? newTraceId(),
      cmd: meta.cmd ?? parent?.cmd,
      userId: meta.userId ?? parent?.userId,
      guildId: meta.guildId ?? parent?.guildId ?? null,
      channelId: meta.channelId ?? parent?.channelId ?? null,
    },
    fn
  );
}

export function ctx(): Partial<ReqContext> {
  return storage.getStore() ?? {};
}
