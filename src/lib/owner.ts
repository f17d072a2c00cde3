/**
 * Smyklot - src/lib/owner.ts
 * WHAT: The set of users allowed to run owners-only commands.
 * WHY: Seeded from OWNER_IDS, extended at ready time with the application owner.
 * DOCS:
 *  - Environment: OWNER_IDS as comma-separated user IDs
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";

/**
 * SECURITY: members of this set pass every owners-only gate. Keep it minimal.
 */
export class OwnerSet {
  private readonly ids: Set<string>;

  constructor(ids: Iterable<string> = []) {
    this.ids = new Set(Array.from(ids).filter((id) => id.length > 0));
  }

  has(userId: string): boolean {
    return this.ids.has(userId);
  }

  /**
   * Returns false when the id was already present, so callers can log only
   * real additions.
   */
  add(userId: string): boolean {
    if (!userId || this.ids.has(userId)) return false;
    this.ids.add(userId);
    logger.info({ userId }, "[owner] owner added");
    return true;
  }

  list(): string[] {
    return Array.from(this.ids);
  }

  get size(): number {
    return this.ids.size;
  }
}
