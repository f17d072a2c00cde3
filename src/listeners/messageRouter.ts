/**
 * Smyklot - src/listeners/messageRouter.ts
 * WHAT: messageCreate entry point: trigger phrases first, then the command dispatcher.
 * SECURITY:
 *  - Bot and webhook messages are dropped before anything else looks at them
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { Events, type Message } from "discord.js";
import type { Dispatcher } from "../commands/dispatcher.js";
import type { ChatPlatform, DispatchResult, IncomingMessage } from "../commands/types.js";
import { toIncomingMessage } from "../platform/discord.js";
import { answerSchab } from "./schabPrice.js";

export const name = Events.MessageCreate;

export interface RouterDeps {
  dispatcher: Dispatcher;
  platform: ChatPlatform;
}

export type RouteResult = { kind: "trigger" } | DispatchResult;

export async function route(message: IncomingMessage, deps: RouterDeps): Promise<RouteResult> {
  if (message.author.bot) return { kind: "ignored" };
  if (await answerSchab(message, deps.platform.currentUserId())) return { kind: "trigger" };
  return deps.dispatcher.dispatch(message);
}

export async function execute(message: Message, deps: RouterDeps): Promise<void> {
  if (message.webhookId) return;
  await route(toIncomingMessage(message), deps);
}
