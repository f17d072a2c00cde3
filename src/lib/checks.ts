/**
 * Smyklot - src/lib/checks.ts
 * WHAT: Reusable command checks (owners-only, role membership).
 * FLOWS:
 *  - ownersOnlyCheck → applied by the dispatcher to every ownersOnly command or group
 *  - hasAnyRole(select) → role gate reading its role list from the config snapshot
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { ConfigSnapshot } from "./configStore.js";
import type { Check, CheckContext, CheckOutcome } from "../commands/types.js";

export const OWNERS_ONLY_MESSAGE = "This command is reserved for bot owners.";

/**
 * SECURITY: the only thing standing between a user and presence, slow-mode
 * and mute changes. Fails closed on an empty owner set.
 */
export const ownersOnlyCheck: Check = {
  name: "owners_only",
  category: "permission",
  checkInHelp: true,
  evaluate({ message, command, owners }: CheckContext): CheckOutcome {
    if (owners.has(message.author.id)) return { pass: true };
    return {
      pass: false,
      reason: {
        kind: "both",
        user: OWNERS_ONLY_MESSAGE,
        log: `non-owner ${message.author.id} tried owners-only command ${command.name}`,
      },
    };
  },
};

export interface HasAnyRoleOptions {
  name?: string;
  /** Reply shown to members without any of the roles */
  denial?: string;
}

/**
 * Passes when the author has at least one of the selected roles. An empty
 * selection means the gate is not configured, and everybody passes.
 *
 * The role list is read from the config snapshot at evaluation time, so a
 * config write takes effect on the next message.
 */
export function hasAnyRole(
  select: (config: ConfigSnapshot) => readonly string[],
  options: HasAnyRoleOptions = {}
): Check {
  const name = options.name ?? "has_any_role";
  const denial = options.denial ?? "You don't have a role that can use this command.";
  return {
    name,
    category: "role",
    checkInHelp: true,
    evaluate({ message, config }: CheckContext): CheckOutcome {
      const required = select(config);
      if (required.length === 0) return { pass: true };
      if (message.memberRoleIds.some((id) => required.includes(id))) return { pass: true };
      return { pass: false, reason: { kind: "user", text: denial } };
    },
  };
}
