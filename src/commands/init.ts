/**
 * `dalias init` command: print shell integration code.
 *
 *   eval "$(dalias init)"          profile hook (bootstrap)
 *   eval "$(dalias init --dump)"   alias functions for the current store
 */

import type { Command } from "commander";
import type { AliasStore } from "../alias/store";
import { resolveSettings } from "../config/settings";
import { parseFunctionsMarker, renderBootstrap, renderDump } from "../generator/script";
import { withStore } from "./common";

export interface InitOptions {
  dump?: boolean;
}

export function handleDump(store: AliasStore, previousMarker: string): string {
  return renderDump(store.list(), {
    previousFunctions: parseFunctionsMarker(previousMarker),
  });
}

export function registerInitCommand(program: Command): void {
  program
    .command("init")
    .description("Print shell integration code (eval it in your shell profile)")
    .option("--dump", "Print the alias functions instead of the profile hook")
    .action(async (options: InitOptions) => {
      if (!options.dump) {
        console.log(renderBootstrap());
        return;
      }
      const { previousFunctions } = resolveSettings();
      const output = await withStore(store => handleDump(store, previousFunctions));
      console.log(output);
    });
}
