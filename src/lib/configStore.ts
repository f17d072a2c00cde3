/**
 * Smyklot - src/lib/configStore.ts
 * WHAT: Process-wide bot configuration behind a reader/writer lock.
 * WHY: Every command reads it; nothing may observe a half-written update.
 * FLOWS:
 *  - configFromEnv(env) → new ConfigStore(initial) once at startup
 *  - get() → frozen snapshot (read lock held only while copying)
 *  - withWrite(fn) → mutate a draft under the write lock, publish on success
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Env } from "./env.js";
import { RwLock } from "./rwlock.js";

export interface BotConfig {
  /** Release identifier; may still be the unsubstituted placeholder */
  version: string;
  /** Role granted by mute and revoked by unmute */
  muteRoleId: string | null;
  /** Announcement target. Nothing posts there yet. */
  generalChannelId: string | null;
  /** Roles allowed to list muted members; empty means anyone */
  moderatorRoleIds: readonly string[];
}

export type ConfigSnapshot = Readonly<BotConfig>;

/** Mutable copy handed to withWrite() callbacks */
export type ConfigDraft = Omit<BotConfig, "moderatorRoleIds"> & { moderatorRoleIds: string[] };

function snapshotOf(config: BotConfig): ConfigSnapshot {
  return Object.freeze({
    ...config,
    moderatorRoleIds: Object.freeze([...config.moderatorRoleIds]),
  });
}

function draftOf(config: ConfigSnapshot): ConfigDraft {
  return { ...config, moderatorRoleIds: [...config.moderatorRoleIds] };
}

export function configFromEnv(
  source: Pick<Env, "BOT_VERSION" | "MUTE_ROLE_ID" | "GENERAL_CHANNEL_ID" | "MODERATOR_ROLE_IDS">
): BotConfig {
  return {
    version: source.BOT_VERSION,
    muteRoleId: source.MUTE_ROLE_ID ?? null,
    generalChannelId: source.GENERAL_CHANNEL_ID ?? null,
    moderatorRoleIds: source.MODERATOR_ROLE_IDS,
  };
}

/**
 * Snapshots are frozen, so a reader holding one can never see a later write
 * and never needs the lock after get() returns. Handlers must not call
 * get() inside withWrite(): the write lock is not re-entrant.
 */
export class ConfigStore {
  private current: ConfigSnapshot;
  private readonly lock = new RwLock();

  constructor(initial: BotConfig) {
    this.current = snapshotOf(initial);
  }

  async get(): Promise<ConfigSnapshot> {
    return this.lock.withRead(() => this.current);
  }

  /**
   * If fn throws, the draft is discarded and the previous configuration stays.
   */
  async withWrite<T>(fn: (draft: ConfigDraft) => T | Promise<T>): Promise<T> {
    return this.lock.withWrite(async () => {
      const draft = draftOf(this.current);
      const result = await fn(draft);
      this.current = snapshotOf(draft);
      return result;
    });
  }
}
