/**
 * Smyklot - src/commands/systems.ts
 * WHAT: Canned opinions about operating systems.
 * FLOWS: shared "systems" bucket → one fixed reply per command
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { defineCommand, type CommandDescriptor } from "./types.js";

function opinion(name: string, aliases: string[], description: string, text: string): CommandDescriptor {
  return defineCommand({
    name,
    aliases,
    description,
    bucket: "systems",
    handler: async ({ message }) => {
      await message.reply(text);
    },
  });
}

export const mac = opinion("mac", ["apple", "macos"], "What I think about macOS", "Jak cię stać na ten szmelc");

export const linux = opinion(
  "linux",
  ["pingwinie", "ubuntu", "i3"],
  "What I think about Linux",
  "Jedyne słuszne rozwiązanie! :sunglasses:"
);

// Multi-word aliases: "windows 10" must win over "windows" at resolution time
export const windows = opinion(
  "windows",
  ["winda", "windows 10", "windows vista", "windows xp"],
  "What I think about Windows",
  "Jak zrestartujesz kompa to pogadamy"
);

export const systemCommands: CommandDescriptor[] = [mac, linux, windows];
