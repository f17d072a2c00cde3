/**
 * Smyklot - src/commands/emoji.ts
 * WHAT: The emoji group: "!emoji cat", "!em dog", and bird as the fallback.
 * WHY: cat, dog and eggplant share the emoji bucket; cat and eggplant hand
 *      their slot back, so only dog is actually rate limited. bird is the
 *      group default and is never throttled.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { REVERT_BUCKET, defineCommand, defineGroup } from "./types.js";

export const BAKLAZAN_EMOJI = "<:baklazan:815856883771506768>";

export const cat = defineCommand({
  name: "cat",
  description: "Sends a cat",
  bucket: "emoji",
  handler: async ({ message }) => {
    await message.send(":cat:");
    return REVERT_BUCKET;
  },
});

export const dog = defineCommand({
  name: "dog",
  description: "Sends a dog",
  bucket: "emoji",
  handler: async ({ message }) => {
    await message.send(":dog:");
  },
});

export const eggplant = defineCommand({
  name: "eggplant",
  aliases: ["af", "afek", "afrael", "bartsmykla", "bakłażan", "baklazan"],
  description: "Sends an eggplant",
  bucket: "emoji",
  handler: async ({ message }) => {
    await message.send(BAKLAZAN_EMOJI);
    return REVERT_BUCKET;
  },
});

export const bird = defineCommand({
  name: "bird",
  description: "Finds animals for you",
  usage: "[animal]",
  handler: async ({ message, args }) => {
    if (args.isEmpty()) {
      await message.send(":bird: can find animals for you.");
      return;
    }
    await message.send(`:bird: could not find animal named: \`${args.rest()}\`.`);
  },
});

export const emojiGroup = defineGroup({
  name: "Emoji",
  prefixes: ["emoji", "em"],
  description: "Animal emoji",
  commands: [cat, dog, eggplant, bird],
  defaultCommand: bird,
});
