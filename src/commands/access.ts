/**
 * Smyklot - src/commands/access.ts
 * WHAT: Evaluates the non-rate-limit gates of a command: guild-only, owners-only, checks.
 * WHY: The dispatcher and help must agree on who may run what.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { ownersOnlyCheck } from "../lib/checks.js";
import type { ConfigSnapshot } from "../lib/configStore.js";
import type { OwnerSet } from "../lib/owner.js";
import type {
  Check,
  CheckFailureReason,
  CommandDescriptor,
  GroupDescriptor,
  IncomingMessage,
} from "./types.js";

export type AccessResult =
  | { allowed: true }
  | { allowed: false; failure: "guild_only" }
  | { allowed: false; failure: "check"; check: Check; reason: CheckFailureReason };

export interface AccessInput {
  message: IncomingMessage;
  command: CommandDescriptor;
  path: readonly GroupDescriptor[];
  owners: OwnerSet;
  config: ConfigSnapshot;
  /** Skip checks that opted out of help visibility */
  forHelp?: boolean;
}

export function isGuildOnly(command: CommandDescriptor, path: readonly GroupDescriptor[]): boolean {
  return command.guildOnly || path.some((g) => g.guildOnly);
}

/**
 * Checks in evaluation order: owners-only first, then group checks from the
 * outermost group in, then the command's own.
 */
export function effectiveChecks(command: CommandDescriptor, path: readonly GroupDescriptor[]): Check[] {
  const ownersOnly = command.ownersOnly || path.some((g) => g.ownersOnly);
  return [
    ...(ownersOnly ? [ownersOnlyCheck] : []),
    ...path.flatMap((g) => g.checks),
    ...command.checks,
  ];
}

/**
 * First failing gate wins; later checks are not evaluated.
 */
export async function evaluateAccess(input: AccessInput): Promise<AccessResult> {
  const { message, command, path, owners, config } = input;

  if (isGuildOnly(command, path) && message.guildId === null) {
    return { allowed: false, failure: "guild_only" };
  }

  for (const check of effectiveChecks(command, path)) {
    if (input.forHelp && !check.checkInHelp) continue;
    const outcome = await check.evaluate({ message, command, owners, config });
    if (!outcome.pass) {
      return { allowed: false, failure: "check", check, reason: outcome.reason };
    }
  }
  return { allowed: true };
}
