/**
 * Commander program: subcommands plus the implicit list/add/remove forms.
 */

import { Command } from "commander";
import { registerAddCommand, handleAdd } from "./commands/add";
import { registerRemoveCommand, handleRemove } from "./commands/remove";
import { registerListCommand, handleList } from "./commands/list";
import { registerInitCommand } from "./commands/init";
import { registerInstallCommand } from "./commands/install";
import { currentDirectory, withStore } from "./commands/common";
import { GLOBAL_SCOPE } from "./alias/scope";
import { setVerbose } from "./util/logger";

const VERSION = "0.1.0";

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("dalias")
    .description("Directory-scoped shell aliases, installed as shell functions")
    .version(VERSION)
    .option("--verbose", "Verbose logging to stderr")
    .argument("[name]", "Alias name (implicit add/remove)")
    .argument("[command]", "Command for implicit add")
    .hook("preAction", thisCommand => {
      const opts = thisCommand.opts();
      if (opts.verbose) {
        setVerbose(true);
      }
    })
    .action(async (name: string | undefined, command: string | undefined) => {
      if (name === undefined) {
        const output = await withStore(store =>
          handleList(store, { cwd: currentDirectory() }),
        );
        console.log(output);
        return;
      }
      const message = await withStore(store =>
        command === undefined
          ? handleRemove(store, name)
          : handleAdd(store, name, command, GLOBAL_SCOPE),
      );
      console.error(message);
    });

  registerAddCommand(program);
  registerRemoveCommand(program);
  registerListCommand(program);
  registerInitCommand(program);
  registerInstallCommand(program);

  return program;
}
