/**
 * Smyklot - src/commands/mute.ts
 * WHAT: mute/unmute a member via the configured mute role, and list who is muted.
 * WHY: Owners need a quick moderation lever that works from any channel.
 * FLOWS:
 *  - mute/unmute: resolve member → read mute role → add/remove role → ack
 *  - muted: list members → filter by mute role → reply with names
 * SECURITY:
 *  - mute/unmute are owners-only; muted is gated by the moderator roles
 *  - member lookup is exact; no fuzzy matching on a moderation command
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { hasAnyRole } from "../lib/checks.js";
import { withStep } from "../lib/cmdWrap.js";
import { classifyError, describeForUser, errorContext } from "../lib/errors.js";
import { logger, redact } from "../lib/logger.js";
import {
  defineCommand,
  type ChatPlatform,
  type CommandContext,
  type GuildMemberSummary,
} from "./types.js";

const MENTION_RE = /^<@!?(\d+)>$/;
const SNOWFLAKE_RE = /^\d{15,21}$/;

export const NO_MUTE_ROLE_MESSAGE = "No mute role is configured.";

/**
 * Mention or raw id first; otherwise an exact match on username, display
 * name or tag, in that order of preference.
 */
export async function resolveMember(
  platform: ChatPlatform,
  guildId: string,
  query: string
): Promise<GuildMemberSummary | null> {
  const idMatch = MENTION_RE.exec(query);
  const id = idMatch ? idMatch[1] : SNOWFLAKE_RE.test(query) ? query : null;
  if (id !== null) {
    const byId = await platform.fetchMember(guildId, id);
    if (byId) return byId;
  }

  const members = await platform.listMembers(guildId);
  return (
    members.find((m) => m.username === query) ??
    members.find((m) => m.displayName === query) ??
    members.find((m) => m.tag === query) ??
    null
  );
}

type MuteAction = "mute" | "unmute";

async function changeMute(ctx: CommandContext, action: MuteAction): Promise<void> {
  const { message, args, platform, config } = ctx;
  const guildId = message.guildId;
  if (guildId === null) {
    throw new Error(`${action} reached a DM; it must be registered guild-only`);
  }

  const query = args.rest();
  const member = await withStep(ctx, "resolve_member", () => resolveMember(platform, guildId, query));
  if (!member) {
    await message.reply(`Couldn't find member: ${query}`);
    return;
  }

  const { muteRoleId } = await config.get();
  if (muteRoleId === null) {
    await message.reply(NO_MUTE_ROLE_MESSAGE);
    return;
  }

  try {
    await withStep(ctx, "role_update", () =>
      action === "mute"
        ? platform.addRole(guildId, member.id, muteRoleId)
        : platform.removeRole(guildId, member.id, muteRoleId)
    );
  } catch (err) {
    const classified = classifyError(err);
    logger.warn(
      { evt: `${action}_fail`, guildId, memberId: member.id, ...errorContext(classified) },
      `[mute] ${action} failed`
    );
    await message.reply(`Couldn't ${action} ${member.displayName}: ${describeForUser(classified)}`);
    return;
  }

  logger.info(
    { evt: action, guildId, memberId: member.id, by: message.author.id, name: redact(member.displayName) },
    `[mute] member ${action}d`
  );
  await message.reply(`${member.displayName} was ${action}d`);
}

export const mute = defineCommand({
  name: "mute",
  description: "Gives a member the mute role",
  usage: "<member>",
  ownersOnly: true,
  guildOnly: true,
  minArgs: 1,
  maxArgs: 1,
  handler: (ctx) => changeMute(ctx, "mute"),
});

export const unmute = defineCommand({
  name: "unmute",
  description: "Takes the mute role away from a member",
  usage: "<member>",
  ownersOnly: true,
  guildOnly: true,
  minArgs: 1,
  maxArgs: 1,
  handler: (ctx) => changeMute(ctx, "unmute"),
});

export const muted = defineCommand({
  name: "muted",
  description: "Lists members who currently have the mute role",
  guildOnly: true,
  checks: [
    hasAnyRole((config) => config.moderatorRoleIds, {
      name: "moderator_role",
      denial: "Only moderators can list muted members.",
    }),
  ],
  handler: async (ctx) => {
    const { message, platform, config } = ctx;
    const guildId = message.guildId;
    if (guildId === null) {
      throw new Error("muted reached a DM; it must be registered guild-only");
    }

    const { muteRoleId } = await config.get();
    if (muteRoleId === null) {
      await message.reply(NO_MUTE_ROLE_MESSAGE);
      return;
    }

    const members = await withStep(ctx, "list_members", () => platform.listMembers(guildId));
    const names = members.filter((m) => m.roleIds.includes(muteRoleId)).map((m) => m.displayName);
    await message.reply(
      names.length > 0 ? `Currently muted members: ${names.join(", ")}` : "No members are currently muted."
    );
  },
});
