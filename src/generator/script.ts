/**
 * Shell source generation.
 *
 * Bootstrap mode prints the profile snippet that re-evaluates the dump before
 * every prompt. Dump mode turns the alias listing into shell functions that
 * pick a definition by the current directory.
 */

import type { AliasDefinition, AliasListing, Scope } from "../alias/types";
import { sortByPrecedence } from "../alias/scope";
import { isValidAliasName } from "../alias/name";
import { rewritePlaceholders, usesPositionalArgs } from "./scanner";
import { shellWord, singleQuote } from "./quote";
import { warn } from "../util/logger";

/** Environment variable holding the names generated by the last dump. */
export const FUNCTIONS_MARKER = "DALIAS_FUNCTIONS";

const INDENT = "    ";
const FORWARD_ARGS = "\"$@\"";

export interface BootstrapOptions {
  /** Command used to re-run the generator. */
  executable?: string;
}

export interface DumpOptions {
  /** Function names recorded by the previous dump, cleared when now stale. */
  previousFunctions?: string[];
}

/**
 * zsh gets a precmd hook and bash a PROMPT_COMMAND entry. Any other shell
 * falls back to a single refresh when the profile is sourced.
 */
export function renderBootstrap(options: BootstrapOptions = {}): string {
  const exe = shellWord(options.executable ?? "dalias");
  return [
    "# dalias shell integration. Load it from your shell profile with:",
    "#   eval \"$(dalias init)\"",
    "_dalias_refresh() {",
    `${INDENT}eval "$(command ${exe} init --dump)"`,
    "}",
    "if [ -n \"${ZSH_VERSION-}\" ]; then",
    `${INDENT}autoload -Uz add-zsh-hook`,
    `${INDENT}add-zsh-hook precmd _dalias_refresh`,
    "elif [ -n \"${BASH_VERSION-}\" ]; then",
    `${INDENT}case ";\${PROMPT_COMMAND-};" in`,
    `${INDENT}${INDENT}*";_dalias_refresh;"*) ;;`,
    `${INDENT}${INDENT}*) PROMPT_COMMAND="_dalias_refresh\${PROMPT_COMMAND:+;$PROMPT_COMMAND}" ;;`,
    `${INDENT}esac`,
    "fi",
    "_dalias_refresh",
  ].join("\n");
}

export function renderDump(listing: AliasListing, options: DumpOptions = {}): string {
  const lines: string[] = [...suspendAliasExpansion()];
  const generated: string[] = [];

  for (const [name, definitions] of listing) {
    if (definitions.length === 0) continue;
    if (!isValidAliasName(name)) {
      warn(`Skipping alias '${name}': not usable as a shell function name`);
      continue;
    }
    lines.push(...renderFunction(name, definitions));
    generated.push(name);
  }

  const current = new Set(generated);
  for (const stale of options.previousFunctions ?? []) {
    if (current.has(stale) || !isValidAliasName(stale)) continue;
    lines.push(`unset -f ${stale} 2>/dev/null`);
  }

  lines.push(`export ${FUNCTIONS_MARKER}=${singleQuote(generated.join(" "))}`);
  lines.push(...restoreAliasExpansion());
  return lines.join("\n");
}

/** Parse the marker value back into function names. */
export function parseFunctionsMarker(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(/\s+/).filter(name => name.length > 0);
}

/**
 * Final command line of a branch: placeholders rewritten, args forwarded if
 * unused. A command starting with the alias's own name runs the real
 * command instead of recursing into the function.
 */
export function renderCommand(command: string, name?: string): string {
  const rewritten = rewritePlaceholders(command);
  const body = name !== undefined && startsWithWord(rewritten, name)
    ? `command ${rewritten.trimStart()}`
    : rewritten;
  return usesPositionalArgs(body) ? body : `${body} ${FORWARD_ARGS}`;
}

function startsWithWord(command: string, word: string): boolean {
  const trimmed = command.trimStart();
  if (!trimmed.startsWith(word)) return false;
  const next = trimmed.charAt(word.length);
  return next === "" || next === " " || next === "\t";
}

type BranchState = "noBranch" | "inChain";

type DirectoryDefinition = AliasDefinition & {
  scope: Exclude<Scope, { type: "global"; }>;
};

function isDirectoryDefinition(d: AliasDefinition): d is DirectoryDefinition {
  return d.scope.type !== "global";
}

export function renderFunction(name: string, definitions: AliasDefinition[]): string[] {
  const ordered = sortByPrecedence(definitions);
  const global = ordered.find(d => d.scope.type === "global");
  const scoped = ordered.filter(isDirectoryDefinition);

  const lines = [
    `unalias ${name} 2>/dev/null`,
    `unset -f ${name} 2>/dev/null`,
    `${name}() {`,
  ];

  let state: BranchState = "noBranch";
  if (scoped.length > 0) {
    // Scope paths are canonical, so compare against the physical directory.
    lines.push(`${INDENT}local current_dir="$(pwd -P)"`);
  }

  for (const definition of scoped) {
    const keyword = state === "noBranch" ? "if" : "elif";
    lines.push(`${INDENT}${keyword} ${directoryTest(definition)}; then`);
    lines.push(`${INDENT}${INDENT}${renderCommand(definition.command, name)}`);
    state = "inChain";
  }

  const fallback = global
    ? renderCommand(global.command, name)
    : `command ${name} ${FORWARD_ARGS}`;

  if (state === "inChain") {
    lines.push(`${INDENT}else`);
    lines.push(`${INDENT}${INDENT}${fallback}`);
    lines.push(`${INDENT}fi`);
  } else {
    lines.push(`${INDENT}${fallback}`);
  }

  lines.push("}");
  return lines;
}

/** POSIX tests only: `[[` is missing outside bash and zsh. */
function directoryTest({ scope }: DirectoryDefinition): string {
  const path = singleQuote(scope.path);
  switch (scope.type) {
    case "exact":
      return `[ "$current_dir" = ${path} ]`;
    case "recursive":
      return `case "$current_dir" in ${path}*) true ;; *) false ;; esac`;
  }
}

function suspendAliasExpansion(): string[] {
  return [
    "__dalias_aliases=",
    "if [ -n \"${ZSH_VERSION-}\" ]; then",
    `${INDENT}if [[ -o aliases ]]; then __dalias_aliases=zsh; fi`,
    `${INDENT}setopt no_aliases`,
    "elif [ -n \"${BASH_VERSION-}\" ]; then",
    `${INDENT}if shopt -q expand_aliases; then __dalias_aliases=bash; fi`,
    `${INDENT}shopt -u expand_aliases`,
    "fi",
  ];
}

function restoreAliasExpansion(): string[] {
  return [
    "if [ \"$__dalias_aliases\" = zsh ]; then",
    `${INDENT}setopt aliases`,
    "elif [ \"$__dalias_aliases\" = bash ]; then",
    `${INDENT}shopt -s expand_aliases`,
    "fi",
    "unset __dalias_aliases",
  ];
}
