/**
 * Shared helpers for dalias commands: store access and scope flags.
 */

import { realpathSync } from "node:fs";
import { AliasStore } from "../alias/store";
import type { Scope } from "../alias/types";
import {
  exactScope,
  GLOBAL_SCOPE,
  recursiveScope,
  resolveScopePath,
} from "../alias/scope";
import { isReservedWord, isValidAliasName } from "../alias/name";
import { resolveSettings } from "../config/settings";
import { SqliteEngine } from "../storage/sqlite";
import { InvalidAliasNameError } from "../util/errors";

/** Commander value of `--scope [dir]`: true when given without a directory. */
export interface ScopeFlags {
  scope?: string | boolean;
  recursive?: boolean;
}

/** Open the store at the configured path, run `fn`, and always close it. */
export async function withStore<T>(
  fn: (store: AliasStore) => T | Promise<T>,
): Promise<T> {
  const { databasePath } = resolveSettings();
  const store = new AliasStore(SqliteEngine.open(databasePath));
  try {
    return await fn(store);
  } finally {
    store.close();
  }
}

/** Canonical current directory, as scopes store it. */
export function currentDirectory(): string {
  return realpathSync(process.cwd());
}

/**
 * Turn `--scope [dir]` / `--recursive` into a Scope.
 * No flags means global; `--scope` alone or `--recursive` alone means the
 * current directory; `--scope global` names the global scope explicitly.
 */
export function scopeFromFlags(flags: ScopeFlags, cwd: string = process.cwd()): Scope {
  const { scope, recursive = false } = flags;

  if (scope === undefined || scope === false) {
    return recursive ? recursiveScope(resolveScopePath(".", cwd)) : GLOBAL_SCOPE;
  }
  if (typeof scope === "string" && scope.toLowerCase() === "global") {
    return GLOBAL_SCOPE;
  }

  const dir = resolveScopePath(scope === true ? "." : scope, cwd);
  return recursive ? recursiveScope(dir) : exactScope(dir);
}

export function assertAliasName(name: string): void {
  if (isReservedWord(name)) {
    throw new InvalidAliasNameError(name, "It is a shell reserved word");
  }
  if (!isValidAliasName(name)) {
    throw new InvalidAliasNameError(name);
  }
}
