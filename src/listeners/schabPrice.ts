/**
 * Smyklot - src/listeners/schabPrice.ts
 * WHAT: Answers "<@bot> po ile schab?" before the dispatcher sees the message.
 * HOW: Exact phrase after the bot mention, surrounding whitespace ignored.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../lib/logger.js";
import type { IncomingMessage } from "../commands/types.js";

export const SCHAB_QUESTION = "po ile schab?";

const FAVOURED_USERNAME = "bartsmykla";

export function isSchabQuestion(content: string, botId: string | null): boolean {
  if (!botId) return false;
  const trimmed = content.trim();
  return [`<@${botId}>`, `<@!${botId}>`].some(
    (mention) => trimmed.startsWith(mention) && trimmed.slice(mention.length).trim() === SCHAB_QUESTION
  );
}

export function schabAnswer(username: string): string {
  return username === FAVOURED_USERNAME ? "dla Ciebie dycha" : "nie stać cię";
}

/**
 * Returns true when the message was the trigger phrase and has been answered.
 */
export async function answerSchab(message: IncomingMessage, botId: string | null): Promise<boolean> {
  if (!isSchabQuestion(message.content, botId)) return false;
  logger.debug({ evt: "schab", userId: message.author.id }, "[schab] trigger phrase");
  await message.reply(schabAnswer(message.author.username));
  return true;
}
