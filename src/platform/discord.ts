/**
 * Smyklot - src/platform/discord.ts
 * WHAT: Adapts discord.js messages and the client to IncomingMessage/ChatPlatform.
 * WHY: Everything above this file is testable with plain objects.
 * FLOWS:
 *  - toIncomingMessage(message) → snapshot of the fields commands read, plus reply/send
 *  - createDiscordPlatform(client) → presence, member and channel operations over REST/cache
 * DOCS:
 *  - Message: https://discord.js.org/#/docs/discord.js/main/class/Message
 *  - GuildMemberManager#addRole: https://discord.js.org/#/docs/discord.js/main/class/GuildMemberManager?scrollTo=addRole
 *  - TextChannel#setRateLimitPerUser: https://discord.js.org/#/docs/discord.js/main/class/TextChannel?scrollTo=setRateLimitPerUser
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { ActivityType, type Client, type GuildMember, type Message, type MessageMentionOptions } from "discord.js";
import { classifyError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type {
  ChatPlatform,
  GuildMemberSummary,
  IncomingMessage,
  MentionedUser,
  PresenceStatus,
} from "../commands/types.js";

/** Unknown Member, Unknown User: the id is not in the guild */
const NOT_A_MEMBER_CODES = [10007, 10013];

// Replies never ping anyone, including the author
const NO_PINGS: MessageMentionOptions = { parse: [], repliedUser: false };

export function toIncomingMessage(message: Message): IncomingMessage {
  const mentions: MentionedUser[] = message.mentions.users.map((user) => ({
    id: user.id,
    username: user.username,
    displayName: message.mentions.members?.get(user.id)?.displayName ?? user.displayName,
  }));

  return {
    id: message.id,
    content: message.content,
    author: {
      id: message.author.id,
      username: message.author.username,
      displayName: message.author.displayName,
      tag: message.author.tag,
      bot: message.author.bot,
    },
    guildId: message.guildId,
    channelId: message.channelId,
    memberRoleIds: message.member ? Array.from(message.member.roles.cache.keys()) : [],
    mentions,
    reply: async (text: string) => {
      await message.reply({ content: text, allowedMentions: NO_PINGS });
    },
    send: async (text: string) => {
      if (!message.channel.isSendable()) {
        throw new Error(`Channel ${message.channelId} does not accept messages`);
      }
      await message.channel.send({ content: text, allowedMentions: NO_PINGS });
    },
  };
}

export function summarizeMember(member: GuildMember): GuildMemberSummary {
  return {
    id: member.id,
    username: member.user.username,
    displayName: member.displayName,
    tag: member.user.tag,
    roleIds: Array.from(member.roles.cache.keys()),
  };
}

export function createDiscordPlatform(client: Client): ChatPlatform {
  const clientUser = () => {
    if (!client.user) throw new Error("Discord client is not ready");
    return client.user;
  };

  return {
    currentUserId: () => client.user?.id ?? null,

    setActivity: (text: string | null) => {
      clientUser().setPresence({
        activities: text === null ? [] : [{ name: text, type: ActivityType.Playing }],
      });
    },

    setStatus: (status: PresenceStatus) => {
      clientUser().setStatus(status);
    },

    listMembers: async (guildId: string) => {
      const guild = await client.guilds.fetch(guildId);
      // Full fetch needs the GuildMembers intent; the cache alone misses offline members
      const members = await guild.members.fetch();
      return members.map(summarizeMember);
    },

    fetchMember: async (guildId: string, userId: string) => {
      const guild = await client.guilds.fetch(guildId);
      try {
        return summarizeMember(await guild.members.fetch(userId));
      } catch (err) {
        const classified = classifyError(err);
        if (classified.kind === "discord_api" && NOT_A_MEMBER_CODES.includes(classified.code)) {
          logger.debug({ guildId, userId, code: classified.code }, "[platform] user is not a member");
          return null;
        }
        throw err;
      }
    },

    addRole: async (guildId: string, memberId: string, roleId: string) => {
      const guild = await client.guilds.fetch(guildId);
      await guild.members.addRole({ user: memberId, role: roleId });
    },

    removeRole: async (guildId: string, memberId: string, roleId: string) => {
      const guild = await client.guilds.fetch(guildId);
      await guild.members.removeRole({ user: memberId, role: roleId });
    },

    getSlowmode: async (channelId: string) => {
      const channel = await client.channels.fetch(channelId);
      if (!channel || !("rateLimitPerUser" in channel)) return null;
      return channel.rateLimitPerUser ?? 0;
    },

    setSlowmode: async (channelId: string, seconds: number) => {
      const channel = await client.channels.fetch(channelId);
      if (!channel || !("setRateLimitPerUser" in channel)) {
        throw new Error(`Channel ${channelId} does not support slow mode`);
      }
      await channel.setRateLimitPerUser(seconds);
    },
  };
}
