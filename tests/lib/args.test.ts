/**
 * Smyklot - tests/lib/args.test.ts
 * WHAT: Unit tests for the delimiter-aware tokenizer and Args cursor.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { Args, isBoundary, skipDelimiters, tokenize } from "../../src/lib/args.js";

describe("tokenize", () => {
  it("splits on a single space and drops empty tokens", () => {
    expect(tokenize("  a  b ", [" "]).map((t) => t.value)).toEqual(["a", "b"]);
  });

  it("lets the first listed delimiter win at a split point", () => {
    expect(tokenize("a, b", [", ", ","]).map((t) => t.value)).toEqual(["a", "b"]);
    expect(tokenize("a, b", [",", ", "]).map((t) => t.value)).toEqual(["a", " b"]);
  });

  it("records offsets into the original text", () => {
    expect(tokenize("ab cd", [" "])).toEqual([
      { value: "ab", start: 0, end: 2 },
      { value: "cd", start: 3, end: 5 },
    ]);
  });

  it("returns nothing for empty input", () => {
    expect(tokenize("", [" "])).toEqual([]);
  });
});

describe("isBoundary", () => {
  it("is true at the end of text and before a delimiter", () => {
    expect(isBoundary("windows 10", 7, [" "])).toBe(true);
    expect(isBoundary("windows", 7, [" "])).toBe(true);
  });

  it("is false inside a word", () => {
    expect(isBoundary("windowsxp", 7, [" "])).toBe(false);
  });
});

describe("skipDelimiters", () => {
  it("drops leading delimiters", () => {
    expect(skipDelimiters("   ping", [" "])).toBe("ping");
  });

  it("drops other whitespace only when asked", () => {
    expect(skipDelimiters("\tping", [" "])).toBe("\tping");
    expect(skipDelimiters("\t ping", [" "], true)).toBe("ping");
  });
});

describe("Args", () => {
  it("walks tokens with single()", () => {
    const args = new Args("hello big world");
    expect(args.length).toBe(3);
    expect(args.single()).toBe("hello");
    expect(args.remaining()).toBe(2);
    expect(args.current()).toBe("big");
  });

  it("returns the raw remainder from rest()", () => {
    const args = new Args("hello big   world ");
    args.single();
    expect(args.rest()).toBe("big   world");
  });

  it("advances parse() only on success", () => {
    const args = new Args("30 abc");
    const toInt = (t: string) => (/^\d+$/.test(t) ? Number(t) : null);
    expect(args.parse(toInt)).toBe(30);
    expect(args.parse(toInt)).toBeNull();
    expect(args.current()).toBe("abc");
  });

  it("is empty for blank input", () => {
    const args = new Args("   ");
    expect(args.isEmpty()).toBe(true);
    expect(args.single()).toBeUndefined();
    expect(args.rest()).toBe("");
  });

  it("honours custom delimiters", () => {
    expect(new Args("a,b, c", [", ", ","]).all()).toEqual(["a", "b", "c"]);
  });
});
