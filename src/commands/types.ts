/**
 * Smyklot - src/commands/types.ts
 * WHAT: Shapes shared by the registry, dispatcher, checks and handlers.
 * WHY: Command metadata is plain data built once at startup, so routing is
 *      testable without a gateway connection.
 * FLOWS:
 *  - defineCommand()/defineGroup() → descriptors with defaults filled in
 *  - IncomingMessage/ChatPlatform → implemented by src/platform/discord.ts and by test fakes
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Args } from "../lib/args.js";
import type { ConfigSnapshot, ConfigStore } from "../lib/configStore.js";
import type { OwnerSet } from "../lib/owner.js";
import type { CommandRegistry } from "./registry.js";

// ===== Platform collaborators =====

export interface MessageAuthor {
  id: string;
  username: string;
  /** Nickname-free display name (global name, falling back to username) */
  displayName: string;
  tag: string;
  bot: boolean;
}

export interface MentionedUser {
  id: string;
  username: string;
  displayName: string;
}

export interface IncomingMessage {
  id: string;
  content: string;
  author: MessageAuthor;
  /** null in DMs */
  guildId: string | null;
  channelId: string;
  /** Role IDs of the author in this guild; empty in DMs */
  memberRoleIds: readonly string[];
  mentions: readonly MentionedUser[];
  reply(text: string): Promise<void>;
  send(text: string): Promise<void>;
}

export interface GuildMemberSummary {
  id: string;
  username: string;
  /** Guild nickname, falling back to the user's display name */
  displayName: string;
  tag: string;
  roleIds: readonly string[];
}

export type PresenceStatus = "online" | "idle" | "dnd" | "invisible";

export const PRESENCE_STATUSES: readonly PresenceStatus[] = ["online", "idle", "dnd", "invisible"];

export interface ChatPlatform {
  /** null before the gateway reports ready */
  currentUserId(): string | null;
  /** null clears the activity */
  setActivity(text: string | null): void;
  setStatus(status: PresenceStatus): void;
  listMembers(guildId: string): Promise<GuildMemberSummary[]>;
  /** null when the user is not a member of the guild */
  fetchMember(guildId: string, userId: string): Promise<GuildMemberSummary | null>;
  addRole(guildId: string, memberId: string, roleId: string): Promise<void>;
  removeRole(guildId: string, memberId: string, roleId: string): Promise<void>;
  /** Slow-mode interval in seconds, or null when the channel can't be found */
  getSlowmode(channelId: string): Promise<number | null>;
  setSlowmode(channelId: string, seconds: number): Promise<void>;
}

// ===== Checks =====

/**
 * Where a failed check's explanation goes: the user, the log, both, or
 * nowhere (unknown).
 */
export type CheckFailureReason =
  | { kind: "user"; text: string }
  | { kind: "log"; text: string }
  | { kind: "both"; user: string; log: string }
  | { kind: "unknown" };

export type CheckOutcome = { pass: true } | { pass: false; reason: CheckFailureReason };

/**
 * Help uses the category to pick a presentation: failed permission checks
 * hide the command, failed role checks mark it.
 */
export type CheckCategory = "permission" | "role";

export interface CheckContext {
  message: IncomingMessage;
  command: CommandDescriptor;
  owners: OwnerSet;
  config: ConfigSnapshot;
}

export interface Check {
  name: string;
  category: CheckCategory;
  /** false skips this check when help decides visibility */
  checkInHelp: boolean;
  evaluate(ctx: CheckContext): CheckOutcome | Promise<CheckOutcome>;
}

// ===== Commands =====

/** Returned by a handler to give its bucket slot back */
export const REVERT_BUCKET = "revert_bucket" as const;

export type CommandOutcome = typeof REVERT_BUCKET | void;

export interface DispatchSettings {
  prefixes: readonly string[];
  delimiters: readonly string[];
  /** Allow blanks between a literal prefix and the command name */
  allowWhitespace: boolean;
  maxSuggestionDistance: number;
  ignoreBots: boolean;
}

export interface CommandContext {
  message: IncomingMessage;
  args: Args;
  command: CommandDescriptor;
  /** The name or alias the user typed */
  invokedAs: string;
  config: ConfigStore;
  platform: ChatPlatform;
  registry: CommandRegistry;
  owners: OwnerSet;
  settings: DispatchSettings;
  traceId: string;
  /** Mark the current execution phase; shows up in error logs */
  step: (phase: string) => void;
}

export type CommandHandler = (ctx: CommandContext) => Promise<CommandOutcome>;

export interface CommandDescriptor {
  name: string;
  aliases: readonly string[];
  description?: string;
  usage?: string;
  bucket?: string;
  checks: readonly Check[];
  guildOnly: boolean;
  ownersOnly: boolean;
  minArgs?: number;
  maxArgs?: number;
  handler: CommandHandler;
}

export type CommandDefinition = Omit<CommandDescriptor, "aliases" | "checks" | "guildOnly" | "ownersOnly"> &
  Partial<Pick<CommandDescriptor, "aliases" | "checks" | "guildOnly" | "ownersOnly">>;

export function defineCommand(def: CommandDefinition): CommandDescriptor {
  return {
    aliases: [],
    checks: [],
    guildOnly: false,
    ownersOnly: false,
    ...def,
  };
}

export interface GroupDescriptor {
  name: string;
  /** Empty: the group's commands live in the parent namespace */
  prefixes: readonly string[];
  description?: string;
  commands: readonly CommandDescriptor[];
  subGroups: readonly GroupDescriptor[];
  /** Runs when the prefix matched but no sub-command did */
  defaultCommand?: CommandDescriptor;
  /** Group-wide gates, applied before the command's own */
  ownersOnly: boolean;
  guildOnly: boolean;
  checks: readonly Check[];
}

export type GroupDefinition = Pick<GroupDescriptor, "name" | "commands"> &
  Partial<Omit<GroupDescriptor, "name" | "commands">>;

export function defineGroup(def: GroupDefinition): GroupDescriptor {
  return {
    prefixes: [],
    subGroups: [],
    ownersOnly: false,
    guildOnly: false,
    checks: [],
    ...def,
  };
}

// ===== Dispatch outcomes =====

export type DispatchResult =
  | { kind: "ignored" }
  | { kind: "not_found"; input: string; suggestion: string | null }
  | { kind: "guild_only"; command: string }
  | { kind: "check_failed"; command: string; check: string; reason: CheckFailureReason }
  | { kind: "bad_args"; command: string; min?: number; max?: number; got: number }
  | { kind: "ratelimited"; command: string; bucket: string; remainingMs: number; isFirstTry: boolean }
  | { kind: "ok"; command: string; ms: number }
  | { kind: "refunded"; command: string; bucket: string | null; ms: number }
  | { kind: "error"; command: string; phase: string; error: unknown; ms: number };
