/**
 * tests/setup.ts
 * WHAT: Global Vitest setup for deterministic tests.
 * WHY: Timers from one test must never leak into the next.
 *
 * Runs before EVERY test file via setupFiles in vitest.config.ts.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { afterEach, vi } from "vitest";

afterEach(() => {
  // A test using vi.useFakeTimers() would otherwise leak into later tests.
  vi.clearAllTimers();
  vi.useRealTimers();
});
