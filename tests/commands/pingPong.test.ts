/**
 * Smyklot - tests/commands/pingPong.test.ts
 * WHAT: Unit tests for the ping/pong/pif/paf replies.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";
import { execute, pingPongCommands } from "../../src/commands/pingPong.js";
import { defineCommand } from "../../src/commands/types.js";
import { createTestCommandContext } from "../utils/contextFactory.js";

vi.mock("../../src/lib/logger.js", async (importOriginal) => ({
  ...(await importOriginal<typeof import("../../src/lib/logger.js")>()),
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

describe("ping/pong commands", () => {
  it.each([
    ["ping", "Pong"],
    ["pong", "Ping"],
    ["pif", "Paf"],
    ["paf", "Pif"],
  ])("%s replies %s", async (name, answer) => {
    const command = pingPongCommands.find((c) => c.name === name);
    expect(command).toBeDefined();
    if (!command) return;

    const ctx = createTestCommandContext({ command });
    await command.handler(ctx);
    expect(ctx.message.replies).toEqual([answer]);
  });

  it("describes each command by its answer", () => {
    expect(pingPongCommands.map((c) => c.description)).toEqual([
      "Replies with Pong",
      "Replies with Ping",
      "Replies with Paf",
      "Replies with Pif",
    ]);
  });

  it("throws for a command without an answer", async () => {
    const stray = defineCommand({ name: "pang", handler: execute });
    await expect(execute(createTestCommandContext({ command: stray }))).rejects.toThrow("No answer registered for pang");
  });
});
