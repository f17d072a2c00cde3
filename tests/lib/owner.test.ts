/**
 * Smyklot - tests/lib/owner.test.ts
 * WHAT: Unit tests for the owner set.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";
import { OwnerSet } from "../../src/lib/owner.js";
import { logger } from "../../src/lib/logger.js";

vi.mock("../../src/lib/logger.js", () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

describe("OwnerSet", () => {
  it("drops empty ids from the seed", () => {
    const owners = new OwnerSet(["a", "", "b"]);
    expect(owners.size).toBe(2);
    expect(owners.has("a")).toBe(true);
    expect(owners.has("")).toBe(false);
  });

  it("reports whether add() changed anything", () => {
    const owners = new OwnerSet(["a"]);
    expect(owners.add("b")).toBe(true);
    expect(owners.add("b")).toBe(false);
    expect(owners.add("")).toBe(false);
    expect(owners.list()).toEqual(["a", "b"]);
  });

  it("logs only real additions", () => {
    const owners = new OwnerSet();
    owners.add("a");
    owners.add("a");
    expect(logger.info).toHaveBeenCalledTimes(1);
    expect(logger.info).toHaveBeenCalledWith({ userId: "a" }, "[owner] owner added");
  });

  it("is empty by default", () => {
    expect(new OwnerSet().has("anyone")).toBe(false);
  });
});
