/**
 * Smyklot - src/commands/activity.ts
 * WHAT: Owner commands that change the bot's presence (activity text, online status).
 * WHY: Lets owners advertise something without a redeploy.
 * FLOWS:
 *  - play: substitute mentions → set or clear the activity → ack
 *  - status: validate → set status → ack
 * DOCS:
 *  - ClientUser#setPresence: https://discord.js.org/#/docs/discord.js/main/class/ClientUser?scrollTo=setPresence
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { withStep } from "../lib/cmdWrap.js";
import { logger, redact } from "../lib/logger.js";
import {
  PRESENCE_STATUSES,
  defineCommand,
  type MentionedUser,
  type PresenceStatus,
} from "./types.js";

const USER_MENTION_RE = /<@!?(\d+)>/g;

/**
 * Replaces <@id> and <@!id> with the mentioned user's display name. Mentions
 * of users the message didn't resolve stay as they are.
 */
export function substituteMentions(text: string, mentions: readonly MentionedUser[]): string {
  return text.replace(USER_MENTION_RE, (raw: string, id: string) => {
    const user = mentions.find((m) => m.id === id);
    return user ? user.displayName : raw;
  });
}

export const play = defineCommand({
  name: "play",
  aliases: ["set"],
  description: "Sets what the bot is playing; no text clears it",
  usage: "[text]",
  ownersOnly: true,
  bucket: "activity",
  handler: async (ctx) => {
    const { message, args, platform } = ctx;
    const text = substituteMentions(args.rest(), message.mentions).trim();

    if (text === "") {
      await withStep(ctx, "clear_activity", () => platform.setActivity(null));
      logger.info({ evt: "activity_cleared", userId: message.author.id }, "[activity] cleared");
      await message.reply("Activity cleared.");
      return;
    }

    await withStep(ctx, "set_activity", () => platform.setActivity(text));
    logger.info({ evt: "activity_set", userId: message.author.id, text: redact(text) }, "[activity] set");
    await message.reply(`Now playing: ${text}`);
  },
});

function isPresenceStatus(value: string): value is PresenceStatus {
  return PRESENCE_STATUSES.some((s) => s === value);
}

export const status = defineCommand({
  name: "status",
  description: "Sets the bot's online status",
  usage: PRESENCE_STATUSES.join("|"),
  ownersOnly: true,
  bucket: "activity",
  minArgs: 1,
  maxArgs: 1,
  handler: async (ctx) => {
    const { message, args, platform } = ctx;
    const requested = args.parse((token) => {
      const lowered = token.toLowerCase();
      return isPresenceStatus(lowered) ? lowered : null;
    });

    if (requested === null) {
      await message.reply(
        `Unknown status \`${args.current() ?? ""}\`. Use one of: ${PRESENCE_STATUSES.join(", ")}.`
      );
      return;
    }

    await withStep(ctx, "set_status", () => platform.setStatus(requested));
    logger.info({ evt: "status_set", userId: message.author.id, status: requested }, "[activity] status set");
    await message.reply(`Status set to \`${requested}\`.`);
  },
});
