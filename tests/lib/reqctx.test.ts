/**
 * Smyklot - tests/lib/reqctx.test.ts
 * WHAT: Unit tests for the async-local request context.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { ctx, newTraceId, runWithCtx } from "../../src/lib/reqctx.js";

describe("newTraceId", () => {
  it("returns 11 base64url characters", () => {
    expect(newTraceId()).toMatch(/^[\w-]{11}$/);
  });

  it("does not repeat", () => {
    const ids = new Set(Array.from({ length: 100 }, () => newTraceId()));
    expect(ids.size).toBe(100);
  });
});

describe("runWithCtx", () => {
  it("is empty outside any context", () => {
    expect(ctx()).toEqual({});
  });

  it("exposes the bound fields and nulls the missing ids", () => {
    const seen = runWithCtx({ traceId: "t1", userId: "u1" }, () => ctx());
    expect(seen).toEqual({
      traceId: "t1",
      cmd: undefined,
      userId: "u1",
      guildId: null,
      channelId: null,
    });
  });

  it("generates a trace id when none is given", () => {
    const seen = runWithCtx({}, () => ctx());
    expect(seen.traceId).toMatch(/^[\w-]{11}$/);
  });

  it("lets a child inherit and override", () => {
    const seen = runWithCtx({ traceId: "t1", guildId: "g1" }, () => runWithCtx({ cmd: "ping" }, () => ctx()));
    expect(seen).toMatchObject({ traceId: "t1", guildId: "g1", cmd: "ping" });
  });

  it("survives awaits", async () => {
    const seen = await runWithCtx({ traceId: "t-async" }, async () => {
      await new Promise((resolve) => setTimeout(resolve, 1));
      return ctx().traceId;
    });
    expect(seen).toBe("t-async");
    expect(ctx()).toEqual({});
  });
});
