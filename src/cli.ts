#!/usr/bin/env node
/**
 * dalias: directory-scoped shell aliases
 *
 * Usage:
 *   dalias add <name> <command> [--scope [dir]] [--recursive]
 *   dalias add                      Pick a command from shell history
 *   dalias remove <name> [--scope [dir]] | --all [--force]
 *   dalias list [--all]
 *   dalias init [--dump]            Shell integration code
 *   dalias install|uninstall        Manage the shell profile hook
 *   dalias <name> <command>         Shorthand for add
 *   dalias <name>                   Shorthand for remove
 *   dalias                          Shorthand for list
 */

import { buildProgram } from "./program";
import { loadEnvFile, resolveSettings } from "./config/settings";
import { error, setVerbose } from "./util/logger";

async function main(): Promise<void> {
  loadEnvFile();
  if (resolveSettings().verbose) {
    setVerbose(true);
  }
  await buildProgram().parseAsync();
}

main().catch(err => {
  error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
