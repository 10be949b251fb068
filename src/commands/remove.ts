/**
 * `dalias remove` command: remove an alias, one of its scopes,
 * or everything (optionally limited to one scope).
 */

import type { Command } from "commander";
import type { AliasStore } from "../alias/store";
import type { Scope } from "../alias/types";
import { describeScope } from "../alias/scope";
import {
  AliasNotFoundError,
  CancelledError,
  ScopeNotFoundError,
} from "../util/errors";
import { confirm } from "../util/prompt";
import { type ScopeFlags, scopeFromFlags, withStore } from "./common";

export interface RemoveOptions extends ScopeFlags {
  all?: boolean;
  force?: boolean;
}

export function handleRemove(store: AliasStore, name: string): string {
  const removed = store.remove(name);
  if (!removed) throw new AliasNotFoundError(name);
  return `Removed alias '${name}' (${removed.length} definitions)`;
}

export function handleRemoveScope(store: AliasStore, name: string, scope: Scope): string {
  const removed = store.removeScope(name, scope);
  if (!removed) throw new ScopeNotFoundError(name, describeScope(scope));
  return `Removed alias '${name}' from scope '${describeScope(scope)}' ('${removed.command}')`;
}

/**
 * Remove every alias, or every definition in `scope`. Asks first unless
 * `force` is set; declining raises CancelledError.
 */
export async function handleRemoveAll(
  store: AliasStore,
  scope: Scope | null,
  force: boolean,
  ask: (question: string) => Promise<boolean> = confirm,
): Promise<string> {
  if (!force) {
    const question = scope
      ? `Remove all definitions in scope '${describeScope(scope)}'?`
      : `Remove all ${store.list().size} alias(es)?`;
    if (!await ask(question)) throw new CancelledError();
  }

  if (scope) {
    const removed = store.removeAllInScope(scope);
    return `Removed ${removed.size} alias(es) from scope '${describeScope(scope)}'`;
  }
  return `Removed ${store.removeAll()} alias(es)`;
}

function hasScopeFlags(options: ScopeFlags): boolean {
  return (options.scope !== undefined && options.scope !== false) || options.recursive === true;
}

export function registerRemoveCommand(program: Command): void {
  program
    .command("remove [name]")
    .alias("rm")
    .description("Remove an alias, one of its scopes, or all aliases")
    .option("-s, --scope [dir]", "Only the definition for this scope ('global' or a directory)")
    .option("-r, --recursive", "The scope is a recursive one")
    .option("-a, --all", "Remove every alias (or every definition in --scope)")
    .option("-f, --force", "Do not ask for confirmation with --all")
    .action(async (name: string | undefined, options: RemoveOptions) => {
      const message = await withStore(store => {
        const scope = hasScopeFlags(options) ? scopeFromFlags(options) : null;
        if (options.all) {
          return handleRemoveAll(store, scope, options.force === true);
        }
        if (name === undefined) {
          throw new Error("Missing alias name. Use --all to remove every alias");
        }
        return scope ? handleRemoveScope(store, name, scope) : handleRemove(store, name);
      });
      console.error(message);
    });
}
