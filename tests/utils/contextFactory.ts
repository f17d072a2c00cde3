/**
 * Smyklot - tests/utils/contextFactory.ts
 * WHAT: In-process fakes for IncomingMessage/ChatPlatform, plus CommandContext and Dispatcher factories.
 * WHY: Handlers and the dispatcher run against these; no gateway, no REST.
 * USAGE:
 *  import { createFakeMessage, createTestCommandContext } from "../utils/contextFactory.js";
 *  const ctx = createTestCommandContext({ command: mute, rest: "alice" });
 *  await mute.handler(ctx);
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { vi } from "vitest";
import { Args } from "../../src/lib/args.js";
import { ConfigStore, type BotConfig } from "../../src/lib/configStore.js";
import { OwnerSet } from "../../src/lib/owner.js";
import { BucketRegistry, BUCKETS, type BucketOptions } from "../../src/lib/rateLimiter.js";
import { buildBuckets, buildRegistry } from "../../src/commands/buildCommands.js";
import { Dispatcher } from "../../src/commands/dispatcher.js";
import type { CommandRegistry } from "../../src/commands/registry.js";
import type {
  ChatPlatform,
  CommandContext,
  CommandDescriptor,
  DispatchSettings,
  GuildMemberSummary,
  IncomingMessage,
  MentionedUser,
  PresenceStatus,
} from "../../src/commands/types.js";

// ===== Messages =====

export interface FakeMessageInit {
  content?: string;
  authorId?: string;
  username?: string;
  displayName?: string;
  bot?: boolean;
  guildId?: string | null;
  channelId?: string;
  roleIds?: string[];
  mentions?: MentionedUser[];
}

export interface FakeMessage extends IncomingMessage {
  /** Texts passed to reply(), in order */
  replies: string[];
  /** Texts passed to send(), in order */
  sent: string[];
}

export function createFakeMessage(init: FakeMessageInit = {}): FakeMessage {
  const replies: string[] = [];
  const sent: string[] = [];
  const username = init.username ?? "tester";
  return {
    id: "message-1",
    content: init.content ?? "",
    author: {
      id: init.authorId ?? "user-1",
      username,
      displayName: init.displayName ?? username,
      tag: username,
      bot: init.bot ?? false,
    },
    guildId: init.guildId === undefined ? "guild-1" : init.guildId,
    channelId: init.channelId ?? "channel-1",
    memberRoleIds: init.roleIds ?? [],
    mentions: init.mentions ?? [],
    replies,
    sent,
    reply: vi.fn(async (text: string) => {
      replies.push(text);
    }),
    send: vi.fn(async (text: string) => {
      sent.push(text);
    }),
  };
}

// ===== Platform =====

export interface FakeMember extends GuildMemberSummary {
  roleIds: string[];
}

export function createMember(id: string, username: string, init: Partial<FakeMember> = {}): FakeMember {
  return { id, username, displayName: username, tag: username, roleIds: [], ...init };
}

export interface FakePlatformInit {
  botId?: string | null;
  members?: FakeMember[];
  slowmode?: Record<string, number>;
}

export interface FakePlatformState {
  botId: string | null;
  /** undefined: never set */
  activity: string | null | undefined;
  status: PresenceStatus | null;
  members: FakeMember[];
  slowmode: Map<string, number>;
}

export function createFakePlatform(init: FakePlatformInit = {}) {
  const state: FakePlatformState = {
    botId: init.botId === undefined ? "bot-1" : init.botId,
    activity: undefined,
    status: null,
    members: init.members ?? [],
    slowmode: new Map(Object.entries(init.slowmode ?? {})),
  };

  const findMember = (memberId: string) => {
    const member = state.members.find((m) => m.id === memberId);
    if (!member) throw new Error(`Unknown Member: ${memberId}`);
    return member;
  };

  const platform = {
    state,
    currentUserId: vi.fn(() => state.botId),
    setActivity: vi.fn((text: string | null) => {
      state.activity = text;
    }),
    setStatus: vi.fn((status: PresenceStatus) => {
      state.status = status;
    }),
    listMembers: vi.fn(async (_guildId: string): Promise<GuildMemberSummary[]> => state.members.map((m) => ({ ...m }))),
    fetchMember: vi.fn(
      async (_guildId: string, userId: string): Promise<GuildMemberSummary | null> =>
        state.members.find((m) => m.id === userId) ?? null
    ),
    addRole: vi.fn(async (_guildId: string, memberId: string, roleId: string) => {
      const member = findMember(memberId);
      member.roleIds = [...member.roleIds, roleId];
    }),
    removeRole: vi.fn(async (_guildId: string, memberId: string, roleId: string) => {
      const member = findMember(memberId);
      member.roleIds = member.roleIds.filter((id) => id !== roleId);
    }),
    getSlowmode: vi.fn(async (channelId: string): Promise<number | null> => state.slowmode.get(channelId) ?? null),
    setSlowmode: vi.fn(async (channelId: string, seconds: number) => {
      state.slowmode.set(channelId, seconds);
    }),
  } satisfies ChatPlatform & { state: FakePlatformState };

  return platform;
}

export type FakePlatform = ReturnType<typeof createFakePlatform>;

// ===== Shared state =====

export const OWNER_ID = "owner-1";
export const MUTE_ROLE_ID = "role-muted";

export function testConfig(overrides: Partial<BotConfig> = {}): BotConfig {
  return {
    version: "1.2.3",
    muteRoleId: MUTE_ROLE_ID,
    generalChannelId: null,
    moderatorRoleIds: [],
    ...overrides,
  };
}

export function testSettings(overrides: Partial<DispatchSettings> = {}): DispatchSettings {
  return {
    prefixes: ["!"],
    delimiters: [" "],
    allowWhitespace: true,
    maxSuggestionDistance: 3,
    ignoreBots: true,
    ...overrides,
  };
}

// ===== Command context =====

export interface TestContextOptions {
  command: CommandDescriptor;
  /** Argument text after the command name */
  rest?: string;
  invokedAs?: string;
  message?: FakeMessage;
  platform?: FakePlatform;
  config?: Partial<BotConfig>;
  owners?: string[];
  registry?: CommandRegistry;
  settings?: Partial<DispatchSettings>;
}

/**
 * Creates a CommandContext for calling a handler directly, bypassing the
 * dispatcher's gates. `phases` records every step() call.
 */
export type TestCommandContext = CommandContext & {
  message: FakeMessage;
  platform: FakePlatform;
  phases: string[];
};

export function createTestCommandContext(options: TestContextOptions): TestCommandContext {
  const phases: string[] = [];
  const settings = testSettings(options.settings);
  return {
    message: options.message ?? createFakeMessage(),
    args: new Args(options.rest ?? "", settings.delimiters),
    command: options.command,
    invokedAs: options.invokedAs ?? options.command.name,
    config: new ConfigStore(testConfig(options.config)),
    platform: options.platform ?? createFakePlatform(),
    registry: options.registry ?? buildRegistry(),
    owners: new OwnerSet(options.owners ?? [OWNER_ID]),
    settings,
    traceId: "test-trace",
    step: (phase: string) => {
      phases.push(phase);
    },
    phases,
  };
}

// ===== Dispatcher =====

export interface TestDispatcherOptions {
  registry?: CommandRegistry;
  buckets?: Record<string, BucketOptions>;
  platform?: FakePlatform;
  config?: Partial<BotConfig>;
  owners?: string[];
  settings?: Partial<DispatchSettings>;
}

export function createTestDispatcher(options: TestDispatcherOptions = {}) {
  const registry = options.registry ?? buildRegistry();
  const buckets: BucketRegistry = buildBuckets(options.buckets ?? BUCKETS);
  const platform = options.platform ?? createFakePlatform();
  const config = new ConfigStore(testConfig(options.config));
  const owners = new OwnerSet(options.owners ?? [OWNER_ID]);
  const settings = testSettings(options.settings);
  const dispatcher = new Dispatcher({ registry, buckets, config, platform, owners, settings });
  return { dispatcher, registry, buckets, platform, config, owners, settings };
}
