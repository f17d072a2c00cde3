/**
 * Smyklot - tests/commands/access.test.ts
 * WHAT: Unit tests for gate evaluation shared by the dispatcher and help.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";
import { effectiveChecks, evaluateAccess, isGuildOnly } from "../../src/commands/access.js";
import { defineCommand, defineGroup, type Check, type CheckContext, type CheckOutcome } from "../../src/commands/types.js";
import { ownersOnlyCheck } from "../../src/lib/checks.js";
import { OwnerSet } from "../../src/lib/owner.js";
import { createFakeMessage, testConfig } from "../utils/contextFactory.js";

vi.mock("../../src/lib/logger.js", async (importOriginal) => ({
  ...(await importOriginal<typeof import("../../src/lib/logger.js")>()),
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

function check(name: string, pass: boolean, checkInHelp = true) {
  const outcome: CheckOutcome = pass ? { pass: true } : { pass: false, reason: { kind: "user", text: `${name} failed` } };
  const evaluate = vi.fn((_ctx: CheckContext) => outcome);
  const built: Check = { name, category: "permission", checkInHelp, evaluate };
  return Object.assign(built, { evaluate });
}

const noop = async () => undefined;
const owners = new OwnerSet(["owner-1"]);

describe("isGuildOnly", () => {
  it("inherits from any enclosing group", () => {
    const cmd = defineCommand({ name: "x", handler: noop });
    expect(isGuildOnly(cmd, [])).toBe(false);
    expect(isGuildOnly(cmd, [defineGroup({ name: "G", guildOnly: true, commands: [cmd] })])).toBe(true);
  });
});

describe("effectiveChecks", () => {
  it("orders owners-only, group checks, then command checks", () => {
    const groupCheck = check("group", true);
    const commandCheck = check("command", true);
    const cmd = defineCommand({ name: "x", checks: [commandCheck], handler: noop });
    const group = defineGroup({ name: "G", ownersOnly: true, checks: [groupCheck], commands: [cmd] });

    expect(effectiveChecks(cmd, [group])).toEqual([ownersOnlyCheck, groupCheck, commandCheck]);
  });

  it("omits owners-only when nothing asks for it", () => {
    const cmd = defineCommand({ name: "x", handler: noop });
    expect(effectiveChecks(cmd, [])).toEqual([]);
  });
});

describe("evaluateAccess", () => {
  it("stops at guild-only in a DM before running any check", async () => {
    const first = check("first", true);
    const cmd = defineCommand({ name: "x", guildOnly: true, checks: [first], handler: noop });
    const result = await evaluateAccess({
      message: createFakeMessage({ guildId: null }),
      command: cmd,
      path: [],
      owners,
      config: testConfig(),
    });

    expect(result).toEqual({ allowed: false, failure: "guild_only" });
    expect(first.evaluate).not.toHaveBeenCalled();
  });

  it("returns the first failing check and skips the rest", async () => {
    const failing = check("failing", false);
    const later = check("later", true);
    const cmd = defineCommand({ name: "x", checks: [failing, later], handler: noop });
    const result = await evaluateAccess({ message: createFakeMessage(), command: cmd, path: [], owners, config: testConfig() });

    expect(result).toEqual({ allowed: false, failure: "check", check: failing, reason: { kind: "user", text: "failing failed" } });
    expect(later.evaluate).not.toHaveBeenCalled();
  });

  it("skips help-hidden checks only for help", async () => {
    const hidden = check("hidden", false, false);
    const cmd = defineCommand({ name: "x", checks: [hidden], handler: noop });
    const input = { message: createFakeMessage(), command: cmd, path: [], owners, config: testConfig() };

    expect(await evaluateAccess({ ...input, forHelp: true })).toEqual({ allowed: true });
    expect((await evaluateAccess(input)).allowed).toBe(false);
  });

  it("lets owners through owners-only commands", async () => {
    const cmd = defineCommand({ name: "x", ownersOnly: true, handler: noop });
    const result = await evaluateAccess({
      message: createFakeMessage({ authorId: "owner-1" }),
      command: cmd,
      path: [],
      owners,
      config: testConfig(),
    });
    expect(result).toEqual({ allowed: true });
  });
});
