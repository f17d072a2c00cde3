// SPDX-License-Identifier: LicenseRef-ANW-1.0

// Assembles the command tree and the rate-limit buckets it refers to.
// The groups below are the whole command surface of the bot; a command that
// isn't listed in one of them is not reachable, even if its module exports it.
//
// GOTCHA: names and aliases must be unique within a namespace. Prefix-less
// groups share the top-level namespace with each other and with help, so
// adding "set" here to a second group fails at startup, not at runtime.

import { BucketRegistry, BUCKETS, type BucketOptions } from "../lib/rateLimiter.js";
import { play, status } from "./activity.js";
import { doYouKnow } from "./doYouKnow.js";
import { emojiGroup } from "./emoji.js";
import { help } from "./help/index.js";
import { mute, muted, unmute } from "./mute.js";
import { pingPongCommands } from "./pingPong.js";
import { CommandRegistry } from "./registry.js";
import { slowMode } from "./slowmode.js";
import { systemCommands } from "./systems.js";
import { defineGroup, type GroupDescriptor } from "./types.js";
import { version } from "./version.js";

export function buildGroups(): GroupDescriptor[] {
  return [
    defineGroup({
      name: "General",
      description: "Small talk",
      commands: [...pingPongCommands, doYouKnow, version],
    }),
    defineGroup({
      name: "Systems",
      description: "Opinions on operating systems",
      commands: systemCommands,
    }),
    emojiGroup,
    defineGroup({
      name: "Owner",
      description: "Presence and channel settings",
      commands: [play, status, slowMode],
    }),
    defineGroup({
      name: "Moderation",
      description: "Mute role management",
      commands: [mute, unmute, muted],
    }),
  ];
}

export function buildRegistry(groups: GroupDescriptor[] = buildGroups()): CommandRegistry {
  return new CommandRegistry(groups, { help });
}

export function buildBuckets(definitions: Record<string, BucketOptions> = BUCKETS): BucketRegistry {
  const buckets = new BucketRegistry();
  for (const [name, options] of Object.entries(definitions)) {
    buckets.define(name, options);
  }
  return buckets;
}
