/**
 * `dalias install` / `dalias uninstall`: manage the shell profile hook.
 */

import type { Command } from "commander";
import { detectShell, installHook, uninstallHook } from "../install/installer";

interface ShellOptions {
  shell?: string;
}

function pickShell(options: ShellOptions): string {
  const shell = options.shell ?? detectShell();
  if (shell === "unknown") {
    throw new Error("Could not detect shell. Use --shell to specify: bash or zsh");
  }
  return shell;
}

export function registerInstallCommand(program: Command): void {
  program
    .command("install")
    .description("Add the dalias hook to your shell profile")
    .option("--shell <type>", "Override shell detection (bash, zsh)")
    .action((options: ShellOptions) => {
      const result = installHook(pickShell(options));
      console.error(result.message);
    });

  program
    .command("uninstall")
    .description("Remove the dalias hook from your shell profile")
    .option("--shell <type>", "Override shell detection (bash, zsh)")
    .action((options: ShellOptions) => {
      const shell = pickShell(options);
      if (uninstallHook(shell)) {
        console.error(`Removed dalias hook for ${shell}.`);
      } else {
        console.error(`No dalias hook found for ${shell}.`);
      }
    });
}
