/**
 * `dalias list` command: print aliases active here, or all of them.
 */

import type { Command } from "commander";
import type { AliasStore } from "../alias/store";
import { describeScope, scopeMatches, sortByPrecedence } from "../alias/scope";
import { currentDirectory, withStore } from "./common";

export interface ListOptions {
  all?: boolean;
}

export function handleList(
  store: AliasStore,
  options: { all?: boolean; cwd: string; },
): string {
  const lines: string[] = [];
  for (const [name, definitions] of store.list()) {
    for (const definition of sortByPrecedence(definitions)) {
      if (!options.all && !scopeMatches(definition.scope, options.cwd)) continue;
      lines.push(`${name} = '${definition.command}' (${describeScope(definition.scope)})`);
    }
  }
  return lines.length > 0 ? lines.join("\n") : "No aliases found";
}

export function registerListCommand(program: Command): void {
  program
    .command("list")
    .alias("ls")
    .description("List aliases active in the current directory")
    .option("-a, --all", "Include aliases scoped to other directories")
    .action(async (options: ListOptions) => {
      const output = await withStore(store =>
        handleList(store, { all: options.all, cwd: currentDirectory() }),
      );
      console.log(output);
    });
}
