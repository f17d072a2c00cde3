/**
 * Smyklot - src/commands/help/index.ts
 * WHAT: The help command: the whole tree, one group, or one command's details.
 * WHY: Visibility follows the same gates the dispatcher enforces, so help
 *      never advertises a command the reader can't see.
 * FLOWS:
 *  - "!help" → collectSections → renderTree
 *  - "!help emoji" → renderGroup
 *  - "!help cat" → renderCommand, or a suggestion / not-found
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { nearest } from "../../lib/editDistance.js";
import { evaluateAccess } from "../access.js";
import { defineCommand, type CommandContext } from "../types.js";
import {
  collectSections,
  displayName,
  entryState,
  renderCommand,
  renderGroup,
  renderTree,
  type AccessProbe,
} from "./render.js";

async function visibleNames(ctx: CommandContext, probe: AccessProbe): Promise<string[]> {
  const names: string[] = [];
  for (const { command, path } of ctx.registry.commands()) {
    if (entryState(await probe(command, path)) === null) continue;
    names.push(displayName(command, path), command.name, ...command.aliases);
  }
  return Array.from(new Set(names));
}

export async function execute(ctx: CommandContext): Promise<void> {
  const { message, args, registry, owners, config, settings } = ctx;
  const snapshot = await config.get();
  const probe: AccessProbe = (command, path) =>
    evaluateAccess({ message, command, path, owners, config: snapshot, forHelp: true });
  const commandPrefix = settings.prefixes[0] ?? "";
  const query = args.rest();

  if (query === "") {
    ctx.step("render_tree");
    const sections = await collectSections(registry, probe);
    await message.reply(renderTree(sections, commandPrefix, ctx.command.name));
    return;
  }

  ctx.step("lookup");
  const found = registry.lookup(query, settings.delimiters);

  if (found?.kind === "group") {
    const sections = await collectSections(registry, probe);
    const section = sections.find((s) => s.title === found.group.name);
    await message.reply(renderGroup(found.group, section, commandPrefix));
    return;
  }

  if (found?.kind === "command") {
    const state = entryState(await probe(found.command, found.path));
    if (state !== null) {
      await message.reply(renderCommand(found.command, found.path, commandPrefix, state));
      return;
    }
  }

  const suggestion = nearest(query, await visibleNames(ctx, probe), settings.maxSuggestionDistance);
  await message.reply(
    suggestion ? `Did you mean \`${suggestion.name}\`?` : `Could not find command \`${query}\`.`
  );
}

export const help = defineCommand({
  name: "help",
  aliases: ["commands"],
  description: "Lists commands, or explains one",
  usage: "[command]",
  handler: execute,
});
