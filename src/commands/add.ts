/**
 * `dalias add` command: add a scoped alias, or pick one from shell history.
 */

import type { Command } from "commander";
import type { AliasStore } from "../alias/store";
import type { Scope } from "../alias/types";
import { describeScope } from "../alias/scope";
import { resolveSettings } from "../config/settings";
import {
  DEFAULT_HISTORY_LIMIT,
  readHistoryEntries,
  resolveHistoryPath,
} from "../history/reader";
import { selectWithFzf } from "../history/selector";
import { promptNonEmpty } from "../util/prompt";
import { assertAliasName, type ScopeFlags, scopeFromFlags, withStore } from "./common";

export interface AddOptions extends ScopeFlags {
  limit?: string;
}

export function handleAdd(
  store: AliasStore,
  name: string,
  command: string,
  scope: Scope,
): string {
  assertAliasName(name);
  store.add(name, command, scope);
  return `Added alias '${name}' for '${command}' (${describeScope(scope)})`;
}

/**
 * Let the user pick a command from history with fzf, then add it.
 * The alias name is prompted for when not given.
 */
export async function handleHistoryAdd(
  store: AliasStore,
  name: string | undefined,
  scope: Scope,
  limit: number = DEFAULT_HISTORY_LIMIT,
): Promise<string> {
  const settings = resolveSettings();
  const historyPath = resolveHistoryPath({
    historyFile: settings.historyFile,
    shellHistFile: settings.shellHistFile,
  });
  const entries = readHistoryEntries(historyPath, limit);
  if (entries.length === 0) {
    return "No history entries found";
  }

  const command = selectWithFzf(entries, settings.fzfBin);
  const aliasName = name ?? await promptNonEmpty(`Alias name (command: ${command}): `);
  return handleAdd(store, aliasName, command, scope);
}

export function registerAddCommand(program: Command): void {
  program
    .command("add [name] [command]")
    .description("Add an alias; with no command, pick one from shell history")
    .option("-s, --scope [dir]", "Only active in this directory (default: current)")
    .option("-r, --recursive", "Also active in subdirectories of the scope")
    .option(
      "--limit <n>",
      "History entries offered to the picker",
      String(DEFAULT_HISTORY_LIMIT),
    )
    .action(async (name: string | undefined, command: string | undefined, options: AddOptions) => {
      const scope = scopeFromFlags(options);
      const message = await withStore(store =>
        name !== undefined && command !== undefined
          ? handleAdd(store, name, command, scope)
          : handleHistoryAdd(store, name, scope, Number(options.limit)),
      );
      console.error(message);
    });
}
