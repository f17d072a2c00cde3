/**
 * Smyklot - src/commands/version.ts
 * WHAT: Reports the running release, or a shrug when the build never stamped one.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { VERSION_PLACEHOLDER } from "../lib/env.js";
import { defineCommand } from "./types.js";

export const UNKNOWN_VERSION = "¯\\_(ツ)_/¯";

export function formatVersion(version: string): string {
  const trimmed = version.trim();
  if (trimmed === "" || trimmed === VERSION_PLACEHOLDER) return UNKNOWN_VERSION;
  return version;
}

export const version = defineCommand({
  name: "version",
  description: "Shows the running version",
  handler: async ({ message, config }) => {
    const { version: current } = await config.get();
    await message.reply(formatVersion(current));
  },
});
