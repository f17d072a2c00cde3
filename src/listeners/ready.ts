/**
 * Smyklot - src/listeners/ready.ts
 * WHAT: Gateway-ready handler: identity log, initial presence, application owners.
 * WHY: The application owner can run owner commands without being listed in OWNER_IDS.
 * DOCS:
 *  - ClientApplication#fetch: https://discord.js.org/#/docs/discord.js/main/class/ClientApplication?scrollTo=fetch
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { Events, type Client, type Team, type User } from "discord.js";
import { logger } from "../lib/logger.js";
import type { OwnerSet } from "../lib/owner.js";
import { addBreadcrumb, setTag } from "../lib/sentry.js";
import type { ChatPlatform } from "../commands/types.js";

export const name = Events.ClientReady;

export interface ReadyDeps {
  owners: OwnerSet;
  platform: ChatPlatform;
  presenceText: string;
}

/** A team-owned application makes every team member an owner */
export function applicationOwnerIds(owner: User | Team | null): string[] {
  if (!owner) return [];
  if ("members" in owner) return Array.from(owner.members.keys());
  return [owner.id];
}

export async function execute(client: Client<true>, deps: ReadyDeps): Promise<void> {
  logger.info(
    { evt: "ready", tag: client.user.tag, id: client.user.id, guilds: client.guilds.cache.size },
    "[ready] connected"
  );
  setTag("bot_id", client.user.id);
  addBreadcrumb({ message: "Bot connected to Discord", category: "bot", level: "info" });

  deps.platform.setActivity(deps.presenceText);

  try {
    const application = await client.application.fetch();
    for (const id of applicationOwnerIds(application.owner)) deps.owners.add(id);
  } catch (err) {
    // OWNER_IDS still applies; only the automatic owner is missing
    logger.warn({ evt: "ready_owner_fetch_fail", err }, "[ready] could not fetch application owner");
  }
  logger.info({ owners: deps.owners.size }, "[ready] owner set loaded");
}
