/**
 * Smyklot - tests/commands/help/render.test.ts
 * WHAT: Unit tests for the pure help renderers.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { displayName, entryState, renderCommand, renderTree, type HelpSection } from "../../../src/commands/help/render.js";
import { cat, emojiGroup } from "../../../src/commands/emoji.js";
import { ownersOnlyCheck, hasAnyRole } from "../../../src/lib/checks.js";
import { mute } from "../../../src/commands/mute.js";
import { windows } from "../../../src/commands/systems.js";
import { defineGroup } from "../../../src/commands/types.js";

describe("displayName", () => {
  it("prefixes grouped commands with the group's first prefix", () => {
    expect(displayName(cat, [emojiGroup])).toBe("emoji cat");
    expect(displayName(windows, [defineGroup({ name: "Systems", commands: [windows] })])).toBe("windows");
  });
});

describe("entryState", () => {
  it("maps access results to entry states", () => {
    expect(entryState({ allowed: true })).toBe("ok");
    expect(entryState({ allowed: false, failure: "guild_only" })).toBe("struck");
    expect(
      entryState({ allowed: false, failure: "check", check: hasAnyRole(() => ["r"]), reason: { kind: "user", text: "" } })
    ).toBe("no_role");
    expect(
      entryState({ allowed: false, failure: "check", check: ownersOnlyCheck, reason: { kind: "unknown" } })
    ).toBeNull();
  });
});

describe("renderTree", () => {
  it("renders sections, prefixes and entry states", () => {
    const sections: HelpSection[] = [
      { title: "General", prefixes: [], entries: [{ display: "ping", description: "Replies with Pong", state: "ok" }] },
      {
        title: "Emoji",
        prefixes: ["emoji", "em"],
        entries: [
          { display: "emoji cat", description: "Sends a cat", state: "struck" },
          { display: "emoji dog", description: "", state: "no_role" },
        ],
      },
    ];

    expect(renderTree(sections, "!")).toBe(
      [
        "**Commands**",
        "",
        "__General__",
        "`ping` - Replies with Pong",
        "",
        "__Emoji__ (prefix: `emoji`, `em`)",
        "~~`emoji cat`~~ - Sends a cat",
        "`emoji dog` (no role)",
        "",
        "Use `!help <command>` for details.",
      ].join("\n")
    );
  });
});

describe("renderCommand", () => {
  it("lists aliases, usage, group and rate limit", () => {
    const systems = defineGroup({ name: "Systems", commands: [windows] });
    expect(renderCommand(windows, [systems], "!", "ok")).toBe(
      [
        "**`windows`**",
        "What I think about Windows",
        "Aliases: `winda`, `windows 10`, `windows vista`, `windows xp`",
        "Usage: `!windows`",
        "Group: Systems",
        "Rate limited: `systems`",
      ].join("\n")
    );
  });

  it("marks restrictions and the reader's state", () => {
    const moderation = defineGroup({ name: "Moderation", commands: [mute] });
    expect(renderCommand(mute, [moderation], "?", "struck")).toBe(
      [
        "**`mute`**",
        "Gives a member the mute role",
        "Usage: `?mute <member>`",
        "Group: Moderation",
        "Only in servers",
        "Owners only",
        "Not available in direct messages.",
      ].join("\n")
    );
  });
});
