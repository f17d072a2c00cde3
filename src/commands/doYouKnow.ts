/**
 * Smyklot - src/commands/doYouKnow.ts
 * WHAT: "Do you know?" with one privileged asker.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { defineCommand } from "./types.js";

const PRIVILEGED_ASKER = "zawiszaty";

export const doYouKnow = defineCommand({
  name: "do_you_know",
  aliases: ["znasz", "know"],
  description: "Ask the bot whether it knows something",
  usage: "<anything>",
  handler: async ({ message }) => {
    const answer = message.author.displayName === PRIVILEGED_ASKER ? "tobie nie powiem" : "pierwsze słyszę";
    await message.reply(answer);
  },
});
