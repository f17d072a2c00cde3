/**
 * Smyklot - src/commands/pingPong.ts
 * WHAT: ping/pong/pif/paf, each answering with its partner word.
 * WHY: Cheapest way to see whether the bot is alive and reading messages.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { defineCommand, type CommandContext, type CommandDescriptor } from "./types.js";

const ANSWERS: Record<string, string> = {
  ping: "Pong",
  pong: "Ping",
  pif: "Paf",
  paf: "Pif",
};

/**
 * Keyed by the command's canonical name, so an alias added later answers
 * the same way as its command.
 */
export async function execute(ctx: CommandContext): Promise<void> {
  const answer = ANSWERS[ctx.command.name];
  if (answer === undefined) {
    throw new Error(`No answer registered for ${ctx.command.name}`);
  }
  await ctx.message.reply(answer);
}

export const pingPongCommands: CommandDescriptor[] = Object.keys(ANSWERS).map((name) =>
  defineCommand({
    name,
    description: `Replies with ${ANSWERS[name]}`,
    handler: execute,
  })
);
