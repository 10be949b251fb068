/**
 * Scope construction, equality, matching and generation precedence.
 */

import { realpathSync, statSync } from "node:fs";
import { isAbsolute, resolve } from "node:path";
import type { AliasDefinition, Scope } from "./types";
import { InvalidScopeError } from "../util/errors";

export const GLOBAL_SCOPE: Scope = { type: "global" };

export function exactScope(path: string): Scope {
  return { type: "exact", path: stripTrailingSeparator(path) };
}

export function recursiveScope(path: string): Scope {
  return { type: "recursive", path: stripTrailingSeparator(path) };
}

function stripTrailingSeparator(path: string): string {
  return path.length > 1 ? path.replace(/\/+$/, "") || "/" : path;
}

/**
 * Canonicalize a user-supplied directory: resolve it against `cwd`,
 * follow symlinks, and require that it is an existing directory.
 */
export function resolveScopePath(dir: string, cwd: string = process.cwd()): string {
  const absolute = isAbsolute(dir) ? dir : resolve(cwd, dir);
  let canonical: string;
  try {
    canonical = realpathSync(absolute);
  } catch {
    throw new InvalidScopeError(dir, "no such directory");
  }
  if (!statSync(canonical).isDirectory()) {
    throw new InvalidScopeError(dir, "not a directory");
  }
  return stripTrailingSeparator(canonical);
}

/** Stable key used to deduplicate definitions by scope. */
export function scopeKey(scope: Scope): string {
  switch (scope.type) {
    case "global":
      return "global";
    case "exact":
      return `exact:${scope.path}`;
    case "recursive":
      return `recursive:${scope.path}`;
  }
}

export function scopesEqual(a: Scope, b: Scope): boolean {
  return scopeKey(a) === scopeKey(b);
}

export function scopeMatches(scope: Scope, dir: string): boolean {
  switch (scope.type) {
    case "global":
      return true;
    case "exact":
      return dir === scope.path;
    case "recursive":
      return dir.startsWith(scope.path);
  }
}

export function describeScope(scope: Scope): string {
  switch (scope.type) {
    case "global":
      return "Global";
    case "exact":
      return `Exact: ${scope.path}`;
    case "recursive":
      return `Recursive: ${scope.path}`;
  }
}

const RANK: Record<Scope["type"], number> = {
  exact: 0,
  recursive: 1,
  global: 2,
};

/**
 * Precedence comparator: exact before recursive before global,
 * and the longer path first within exact or recursive.
 */
export function compareScopes(a: Scope, b: Scope): number {
  const rank = RANK[a.type] - RANK[b.type];
  if (rank !== 0) return rank;
  if (a.type === "global" || b.type === "global") return 0;
  if (a.path.length !== b.path.length) return b.path.length - a.path.length;
  if (a.path === b.path) return 0;
  return a.path < b.path ? -1 : 1;
}

export function sortByPrecedence(definitions: AliasDefinition[]): AliasDefinition[] {
  return [...definitions].sort((a, b) => compareScopes(a.scope, b.scope));
}
