/**
 * Smyklot - src/commands/slowmode.ts
 * WHAT: Read or change the current channel's slow-mode interval.
 * FLOWS:
 *  - "!slowmode 30" → setSlowmode → success/failure reply
 *  - "!slowmode" (or anything that isn't a whole number) → report the current value,
 *    or a failure when the channel has none
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { withStep } from "../lib/cmdWrap.js";
import { classifyError, errorContext } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { defineCommand } from "./types.js";

export function parseSeconds(token: string): number | null {
  if (!/^\d+$/.test(token)) return null;
  const value = Number(token);
  return Number.isSafeInteger(value) ? value : null;
}

export const slowMode = defineCommand({
  name: "slow_mode",
  aliases: ["slowmode"],
  description: "Shows or sets this channel's slow mode, in seconds",
  usage: "[seconds]",
  ownersOnly: true,
  guildOnly: true,
  handler: async (ctx) => {
    const { message, args, platform } = ctx;
    const seconds = args.parse(parseSeconds);

    if (seconds !== null) {
      try {
        await withStep(ctx, "set_slowmode", () => platform.setSlowmode(message.channelId, seconds));
      } catch (err) {
        // Reported to the user as a plain failure; the dispatcher never sees it
        const classified = classifyError(err);
        logger.warn(
          { evt: "slowmode_set_fail", channelId: message.channelId, seconds, ...errorContext(classified) },
          "[slowmode] failed to set rate"
        );
        await message.reply(`Failed to set slow mode to \`${seconds}\` seconds.`);
        return;
      }
      logger.info({ evt: "slowmode_set", channelId: message.channelId, seconds }, "[slowmode] rate set");
      await message.reply(`Successfully set slow mode rate to \`${seconds}\` seconds.`);
      return;
    }

    const current = await withStep(ctx, "get_slowmode", () => platform.getSlowmode(message.channelId));
    // null: the channel is gone or has no slow mode to report
    if (current === null) {
      logger.debug({ evt: "slowmode_get_none", channelId: message.channelId }, "[slowmode] no rate for channel");
      await message.reply("Failed to read the slow mode rate of this channel.");
      return;
    }
    await message.reply(`Current slow mode rate is \`${current}\` seconds.`);
  },
});
