/**
 * WHAT: Proves the zod environment schema validates the token and fills defaults.
 * HOW: Calls parseEnv() on plain objects; process.env is never touched.
 * DOCS: https://vitest.dev/guide/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { parseEnv, splitDelimiters, splitList, VERSION_PLACEHOLDER } from "../../src/lib/env.js";

describe("parseEnv", () => {
  /** Happy path: only the token, everything else defaulted. */
  it("fills defaults around a bare token", () => {
    const result = parseEnv({ DISCORD_TOKEN: "test-token" });
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.env).toMatchObject({
      DISCORD_TOKEN: "test-token",
      NODE_ENV: "development",
      BOT_VERSION: VERSION_PLACEHOLDER,
      OWNER_IDS: [],
      COMMAND_PREFIXES: ["!"],
      COMMAND_DELIMITERS: [" "],
      PREFIX_WHITESPACE: true,
      MAX_SUGGESTION_DISTANCE: 3,
      MODERATOR_ROLE_IDS: [],
      PRESENCE_TEXT: "Use !help",
    });
    expect(result.env.MUTE_ROLE_ID).toBeUndefined();
  });

  it("rejects a missing token", () => {
    expect(parseEnv({})).toEqual({ ok: false, issues: ["- DISCORD_TOKEN: Required"] });
  });

  /** `DISCORD_TOKEN=` in .env is the same mistake as leaving it out. */
  it("treats an empty token as missing", () => {
    expect(parseEnv({ DISCORD_TOKEN: "  " })).toEqual({ ok: false, issues: ["- DISCORD_TOKEN: Required"] });
  });

  it("parses lists, flags and numbers", () => {
    const result = parseEnv({
      DISCORD_TOKEN: " test-token ",
      OWNER_IDS: "1, 2,,3",
      COMMAND_PREFIXES: "!,?",
      COMMAND_DELIMITERS: " ,\\,",
      PREFIX_WHITESPACE: "no",
      MAX_SUGGESTION_DISTANCE: "5",
      MUTE_ROLE_ID: "",
    });
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.env.DISCORD_TOKEN).toBe("test-token");
    expect(result.env.OWNER_IDS).toEqual(["1", "2", "3"]);
    expect(result.env.COMMAND_PREFIXES).toEqual(["!", "?"]);
    expect(result.env.COMMAND_DELIMITERS).toEqual([" ", ","]);
    expect(result.env.PREFIX_WHITESPACE).toBe(false);
    expect(result.env.MAX_SUGGESTION_DISTANCE).toBe(5);
    expect(result.env.MUTE_ROLE_ID).toBeUndefined();
  });

  it("reports an out-of-range suggestion distance", () => {
    const result = parseEnv({ DISCORD_TOKEN: "test-token", MAX_SUGGESTION_DISTANCE: "11" });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.issues).toHaveLength(1);
    expect(result.issues[0]).toMatch(/^- MAX_SUGGESTION_DISTANCE: /);
  });
});

describe("splitList", () => {
  it("trims entries and drops empty ones", () => {
    expect(splitList(" a, b,,c ")).toEqual(["a", "b", "c"]);
    expect(splitList(undefined)).toEqual([]);
  });
});

describe("splitDelimiters", () => {
  it("keeps whitespace entries", () => {
    expect(splitDelimiters(" ,\t")).toEqual([" ", "\t"]);
  });

  it("falls back to a single space", () => {
    expect(splitDelimiters(undefined)).toEqual([" "]);
    expect(splitDelimiters(",")).toEqual([" "]);
  });
});
