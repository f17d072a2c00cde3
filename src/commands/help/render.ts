/**
 * Smyklot - src/commands/help/render.ts
 * WHAT: Builds the help tree and command detail text.
 * WHY: Kept free of message I/O so visibility rules are testable on their own.
 * FLOWS:
 *  - collectSections(registry, access) → per-group entries with a visibility state
 *  - renderTree(sections, prefix) / renderCommand(...) / renderGroup(...) → reply text
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { AccessResult } from "../access.js";
import { isGuildOnly } from "../access.js";
import type { CommandRegistry } from "../registry.js";
import type { CommandDescriptor, GroupDescriptor } from "../types.js";

/**
 * ok: listed normally. no_role: listed, marked. struck: guild-only command
 * seen from a DM. Commands failing a permission check never get an entry.
 */
export type EntryState = "ok" | "no_role" | "struck";

export interface HelpEntry {
  display: string;
  description: string;
  state: EntryState;
}

export interface HelpSection {
  title: string;
  prefixes: readonly string[];
  entries: HelpEntry[];
}

export type AccessProbe = (command: CommandDescriptor, path: readonly GroupDescriptor[]) => Promise<AccessResult>;

/** "emoji cat" for a command reached through the emoji group */
export function displayName(command: CommandDescriptor, path: readonly GroupDescriptor[]): string {
  const prefixes = path.flatMap((g) => (g.prefixes.length > 0 ? [g.prefixes[0]] : []));
  return [...prefixes, command.name].join(" ");
}

export function entryState(access: AccessResult): EntryState | null {
  if (access.allowed) return "ok";
  if (access.failure === "guild_only") return "struck";
  return access.check.category === "role" ? "no_role" : null;
}

export async function collectSections(registry: CommandRegistry, probe: AccessProbe): Promise<HelpSection[]> {
  const sections: HelpSection[] = [];
  for (const { group, path } of registry.allGroups()) {
    const commands = [...group.commands];
    if (group.defaultCommand && !commands.includes(group.defaultCommand)) commands.push(group.defaultCommand);

    const entries: HelpEntry[] = [];
    for (const command of commands) {
      const state = entryState(await probe(command, path));
      if (state === null) continue;
      entries.push({ display: displayName(command, path), description: command.description ?? "", state });
    }
    if (entries.length > 0) {
      sections.push({ title: group.name, prefixes: group.prefixes, entries });
    }
  }
  return sections;
}

function renderEntry(entry: HelpEntry): string {
  const name = `\`${entry.display}\``;
  const description = entry.description ? ` - ${entry.description}` : "";
  switch (entry.state) {
    case "struck":
      return `~~${name}~~${description}`;
    case "no_role":
      return `${name}${description} (no role)`;
    default:
      return `${name}${description}`;
  }
}

export function renderTree(sections: readonly HelpSection[], commandPrefix: string, helpName = "help"): string {
  const lines: string[] = ["**Commands**"];
  for (const section of sections) {
    const prefixes = section.prefixes.length > 0 ? ` (prefix: ${section.prefixes.map((p) => `\`${p}\``).join(", ")})` : "";
    lines.push("", `__${section.title}__${prefixes}`);
    lines.push(...section.entries.map(renderEntry));
  }
  lines.push("", `Use \`${commandPrefix}${helpName} <command>\` for details.`);
  return lines.join("\n");
}

export function renderCommand(
  command: CommandDescriptor,
  path: readonly GroupDescriptor[],
  commandPrefix: string,
  state: EntryState
): string {
  const name = displayName(command, path);
  const lines = [`**\`${name}\`**`];
  if (command.description) lines.push(command.description);
  if (command.aliases.length > 0) {
    lines.push(`Aliases: ${command.aliases.map((a) => `\`${a}\``).join(", ")}`);
  }
  lines.push(`Usage: \`${commandPrefix}${name}${command.usage ? ` ${command.usage}` : ""}\``);

  const group = path.at(-1);
  if (group) lines.push(`Group: ${group.name}`);
  if (isGuildOnly(command, path)) lines.push("Only in servers");
  if (command.ownersOnly || path.some((g) => g.ownersOnly)) lines.push("Owners only");
  if (command.bucket) lines.push(`Rate limited: \`${command.bucket}\``);
  if (state === "no_role") lines.push("You don't have a role that can use this command.");
  if (state === "struck") lines.push("Not available in direct messages.");
  return lines.join("\n");
}

export function renderGroup(group: GroupDescriptor, section: HelpSection | undefined, commandPrefix: string): string {
  const lines = [`**${group.name}**`];
  if (group.description) lines.push(group.description);
  if (group.prefixes.length > 0) {
    lines.push(`Prefixes: ${group.prefixes.map((p) => `\`${p}\``).join(", ")}`);
  }
  if (group.defaultCommand) lines.push(`Default command: \`${group.defaultCommand.name}\``);
  if (section) {
    lines.push(...section.entries.map(renderEntry));
  } else {
    lines.push("No commands you can use here.");
  }
  lines.push(`Use \`${commandPrefix}help <command>\` for details.`);
  return lines.join("\n");
}
