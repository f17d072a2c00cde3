/**
 * Smyklot - src/commands/registry.ts
 * WHAT: The command tree and name resolution.
 * WHY: Groups nest, prefixes and aliases may contain delimiters ("windows 10"),
 *      and a group may fall back to a default command. One place owns all of it.
 * FLOWS:
 *  - new CommandRegistry(groups, { help }) → validates name collisions per namespace
 *  - resolve(body, delimiters) → command + the groups it was reached through, or not_found
 *  - lookup(query) → used by help to find a command or group by any of its names
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { isBoundary, skipDelimiters, tokenize } from "../lib/args.js";
import type { CommandDescriptor, GroupDescriptor } from "./types.js";

type Target =
  | { kind: "command"; command: CommandDescriptor; path: readonly GroupDescriptor[] }
  | { kind: "group"; group: GroupDescriptor; path: readonly GroupDescriptor[] };

type Entry = { names: readonly string[]; target: Target };

/**
 * A namespace is what the user can type at one level: commands of the
 * groups living at that level (prefix-less groups are flattened in) plus
 * the prefixes of the groups nested one level down.
 */
type Namespace = { label: string; entries: Entry[] };

export type Resolution =
  | {
      kind: "command";
      command: CommandDescriptor;
      /** Groups the command was reached through, outermost first */
      path: readonly GroupDescriptor[];
      invokedAs: string;
      /** Argument text, leading delimiters removed */
      rest: string;
    }
  | {
      kind: "not_found";
      /** The word that failed to match */
      token: string;
      /** Names that were valid at the failing level */
      candidates: string[];
      /** Text to put before a suggested name, e.g. "emoji " */
      prefix: string;
    };

export type Lookup =
  | { kind: "command"; command: CommandDescriptor; path: readonly GroupDescriptor[] }
  | { kind: "group"; group: GroupDescriptor; path: readonly GroupDescriptor[] };

function commandNames(command: CommandDescriptor): string[] {
  return [command.name, ...command.aliases];
}

function collectEntries(groups: readonly GroupDescriptor[], parentPath: readonly GroupDescriptor[]): Entry[] {
  const entries: Entry[] = [];
  for (const group of groups) {
    const path = [...parentPath, group];
    if (group.prefixes.length > 0) {
      entries.push({ names: group.prefixes, target: { kind: "group", group, path } });
      continue;
    }
    for (const command of group.commands) {
      entries.push({ names: commandNames(command), target: { kind: "command", command, path } });
    }
    entries.push(...collectEntries(group.subGroups, path));
  }
  return entries;
}

function groupNamespace(group: GroupDescriptor, path: readonly GroupDescriptor[]): Namespace {
  const entries: Entry[] = group.commands.map((command) => ({
    names: commandNames(command),
    target: { kind: "command", command, path },
  }));
  entries.push(...collectEntries(group.subGroups, path));
  return { label: group.name, entries };
}

function assertUnique(namespace: Namespace): void {
  const seen = new Map<string, string>();
  for (const entry of namespace.entries) {
    const owner = entry.target.kind === "command" ? entry.target.command.name : entry.target.group.name;
    for (const name of entry.names) {
      const previous = seen.get(name);
      if (previous !== undefined) {
        throw new Error(
          `Duplicate command name "${name}" in ${namespace.label} (used by ${previous} and ${owner})`
        );
      }
      seen.set(name, owner);
    }
  }
}

/**
 * Longest name that matches at the start of `text` and ends on a
 * delimiter boundary. "windows 10" beats "windows", and "pingx" does not
 * match "ping".
 */
function matchLongest(
  text: string,
  entries: readonly Entry[],
  delimiters: readonly string[]
): { entry: Entry; name: string } | null {
  let best: { entry: Entry; name: string } | null = null;
  for (const entry of entries) {
    for (const name of entry.names) {
      if (!text.startsWith(name) || !isBoundary(text, name.length, delimiters)) continue;
      if (!best || name.length > best.name.length) best = { entry, name };
    }
  }
  return best;
}

export interface RegistryOptions {
  /** Top-level help command; reachable but not part of any group */
  help?: CommandDescriptor;
}

export class CommandRegistry {
  readonly groups: readonly GroupDescriptor[];
  readonly help: CommandDescriptor | null;
  private readonly root: Namespace;

  constructor(groups: readonly GroupDescriptor[], options: RegistryOptions = {}) {
    this.groups = groups;
    this.help = options.help ?? null;

    const entries = collectEntries(groups, []);
    if (this.help) {
      entries.unshift({ names: commandNames(this.help), target: { kind: "command", command: this.help, path: [] } });
    }
    this.root = { label: "the top level", entries };

    assertUnique(this.root);
    for (const { group, path } of this.allGroups()) {
      if (group.prefixes.length > 0) assertUnique(groupNamespace(group, path));
    }
  }

  resolve(body: string, delimiters: readonly string[]): Resolution {
    let namespace = this.root;
    let text = body;
    let prefix = "";

    for (;;) {
      const match = matchLongest(text, namespace.entries, delimiters);
      if (!match) {
        return {
          kind: "not_found",
          token: tokenize(text, delimiters)[0]?.value ?? "",
          candidates: namespace.entries.flatMap((e) => e.names),
          prefix,
        };
      }

      const rest = skipDelimiters(text.slice(match.name.length), delimiters);
      const { target } = match.entry;
      if (target.kind === "command") {
        return { kind: "command", command: target.command, path: target.path, invokedAs: match.name, rest };
      }

      const inner = groupNamespace(target.group, target.path);
      const innerMatch = rest.length > 0 ? matchLongest(rest, inner.entries, delimiters) : null;
      if (!innerMatch && target.group.defaultCommand) {
        return {
          kind: "command",
          command: target.group.defaultCommand,
          path: target.path,
          invokedAs: match.name,
          rest,
        };
      }

      namespace = inner;
      text = rest;
      prefix = `${prefix}${match.name} `;
    }
  }

  /**
   * Find a command or group by a name the user would type. Accepts a full
   * path ("emoji cat") or a bare name or alias anywhere in the tree ("cat").
   */
  lookup(query: string, delimiters: readonly string[]): Lookup | null {
    const trimmed = query.trim();
    if (!trimmed) return null;

    const group = this.allGroups().find(
      ({ group: g }) => g.name === trimmed || g.prefixes.includes(trimmed)
    );
    if (group) return { kind: "group", group: group.group, path: group.path };

    const resolved = this.resolve(trimmed, delimiters);
    if (resolved.kind === "command" && resolved.rest === "") {
      return { kind: "command", command: resolved.command, path: resolved.path };
    }

    for (const { command, path } of this.commands()) {
      if (commandNames(command).includes(trimmed)) return { kind: "command", command, path };
    }
    return null;
  }

  /** Every reachable command with the groups above it, help first */
  commands(): Array<{ command: CommandDescriptor; path: readonly GroupDescriptor[] }> {
    const out: Array<{ command: CommandDescriptor; path: readonly GroupDescriptor[] }> = [];
    if (this.help) out.push({ command: this.help, path: [] });
    for (const { group, path } of this.allGroups()) {
      for (const command of group.commands) out.push({ command, path });
      if (group.defaultCommand && !group.commands.includes(group.defaultCommand)) {
        out.push({ command: group.defaultCommand, path });
      }
    }
    return out;
  }

  /** Depth-first, parents before children */
  allGroups(): Array<{ group: GroupDescriptor; path: readonly GroupDescriptor[] }> {
    const out: Array<{ group: GroupDescriptor; path: readonly GroupDescriptor[] }> = [];
    const walk = (groups: readonly GroupDescriptor[], parent: readonly GroupDescriptor[]) => {
      for (const group of groups) {
        const path = [...parent, group];
        out.push({ group, path });
        walk(group.subGroups, path);
      }
    };
    walk(this.groups, []);
    return out;
  }
}
