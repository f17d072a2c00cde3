/**
 * Smyklot - src/lib/rateLimiter.ts
 * WHAT: Named in-memory rate-limit buckets shared by the commands registered under them.
 * WHY: Keeps the emoji/opinion/presence commands from being spammed.
 * FLOWS:
 *   - take(): consume the caller's single slot or report the remaining wait
 *   - revert(key, consumedAt): hand that consumed slot back (handlers that only want failures counted)
 *   - sweep(): drop entries whose window elapsed
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";

const SWEEP_INTERVAL_MS = 10 * 60 * 1000;

export type BucketScope = "user" | "channel" | "guild";

export interface BucketOptions {
  delaySeconds: number;
  /** Who shares a slot. Defaults to each user getting their own. */
  scope?: BucketScope;
}

export interface BucketCaller {
  userId: string;
  channelId: string;
  guildId: string | null;
}

export type TakeResult =
  | { allowed: true; consumedAt: number }
  | { allowed: false; remainingMs: number; isFirstTry: boolean };

type Entry = {
  lastConsumedAt: number;
  /** Restored by revert(); null when the caller had no earlier consumption */
  previousConsumedAt: number | null;
  /** Set on the first rejection, cleared by the next successful take */
  notified: boolean;
};

/**
 * Capacity-1 bucket per scope key, refilled delaySeconds after the last
 * consumption.
 *
 * take() checks and consumes in one synchronous step. There is no await
 * between reading and writing the entry, so two messages racing through the
 * dispatcher can't both observe a free slot.
 */
export class Bucket {
  readonly name: string;
  readonly delayMs: number;
  readonly scope: BucketScope;
  private readonly entries = new Map<string, Entry>();

  constructor(name: string, options: BucketOptions) {
    this.name = name;
    this.delayMs = options.delaySeconds * 1000;
    this.scope = options.scope ?? "user";
  }

  keyFor(caller: BucketCaller): string {
    switch (this.scope) {
      case "channel":
        return caller.channelId;
      case "guild":
        // DMs have no guild; the DM channel is the closest thing to one
        return caller.guildId ?? `dm:${caller.channelId}`;
      default:
        return caller.userId;
    }
  }

  take(key: string, now: number = Date.now()): TakeResult {
    const entry = this.entries.get(key);
    if (entry) {
      const elapsed = now - entry.lastConsumedAt;
      if (elapsed < this.delayMs) {
        const isFirstTry = !entry.notified;
        entry.notified = true;
        const remainingMs = this.delayMs - elapsed;
        logger.debug({ bucket: this.name, key, remainingMs, isFirstTry }, "[rateLimiter] bucket exhausted");
        return { allowed: false, remainingMs, isFirstTry };
      }
    }

    this.entries.set(key, {
      lastConsumedAt: now,
      previousConsumedAt: entry?.lastConsumedAt ?? null,
      notified: false,
    });
    return { allowed: true, consumedAt: now };
  }

  /**
   * Undo the take() that returned consumedAt. Returns false when that
   * consumption is no longer the latest for the key (the window elapsed and
   * another caller took the slot since), so a slow handler never erases a
   * newer consumption.
   */
  revert(key: string, consumedAt: number): boolean {
    const entry = this.entries.get(key);
    if (!entry || entry.lastConsumedAt !== consumedAt) return false;

    if (entry.previousConsumedAt === null) {
      this.entries.delete(key);
    } else {
      entry.lastConsumedAt = entry.previousConsumedAt;
      entry.previousConsumedAt = null;
      entry.notified = false;
    }
    logger.debug({ bucket: this.name, key }, "[rateLimiter] consumption reverted");
    return true;
  }

  sweep(now: number = Date.now()): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (now - entry.lastConsumedAt >= this.delayMs) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }
}

export class BucketRegistry {
  private readonly buckets = new Map<string, Bucket>();

  define(name: string, options: BucketOptions): Bucket {
    if (this.buckets.has(name)) {
      throw new Error(`Bucket already defined: ${name}`);
    }
    const bucket = new Bucket(name, options);
    this.buckets.set(name, bucket);
    return bucket;
  }

  get(name: string): Bucket | undefined {
    return this.buckets.get(name);
  }

  names(): string[] {
    return Array.from(this.buckets.keys());
  }

  sweep(now: number = Date.now()): number {
    let removed = 0;
    for (const bucket of this.buckets.values()) {
      removed += bucket.sweep(now);
    }
    if (removed > 0) {
      logger.debug({ removed }, "[rateLimiter] swept expired bucket entries");
    }
    return removed;
  }

  /**
   * Periodic sweep so one-off callers don't accumulate forever. The timer is
   * unref'd and never keeps the process alive on shutdown.
   */
  startSweeper(intervalMs: number = SWEEP_INTERVAL_MS): () => void {
    const timer = setInterval(() => this.sweep(), intervalMs);
    timer.unref();
    return () => clearInterval(timer);
  }
}

/**
 * Remaining wait as text. Rounded up: "0 seconds" while 900ms remain just
 * invites a retry spam.
 */
export function formatCooldown(remainingMs: number): string {
  const seconds = Math.ceil(remainingMs / 1000);
  if (seconds < 60) {
    return `${seconds} second${seconds === 1 ? "" : "s"}`;
  }
  const minutes = Math.ceil(seconds / 60);
  if (minutes < 60) {
    return `${minutes} minute${minutes === 1 ? "" : "s"}`;
  }
  const hours = Math.floor(minutes / 60);
  const remainingMins = minutes % 60;
  if (remainingMins === 0) {
    return `${hours} hour${hours === 1 ? "" : "s"}`;
  }
  return `${hours}h ${remainingMins}m`;
}

/** Bucket delays used by the command set */
export const BUCKETS = {
  emoji: { delaySeconds: 5 },
  systems: { delaySeconds: 5 },
  activity: { delaySeconds: 10 },
} as const satisfies Record<string, BucketOptions>;
