/**
 * Shell history reading: locate the history file and extract recent,
 * de-duplicated commands (newest first).
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";
import { ConfigError } from "../util/errors";
import { log } from "../util/logger";

export const DEFAULT_HISTORY_LIMIT = 200;

export interface HistorySources {
  historyFile?: string;
  shellHistFile?: string;
}

/**
 * Precedence: DALIAS_HISTORY_FILE, HISTFILE, ~/.zsh_history, ~/.bash_history.
 */
export function resolveHistoryPath(sources: HistorySources = {}): string {
  if (sources.historyFile) return sources.historyFile;
  if (sources.shellHistFile) return sources.shellHistFile;

  const home = homedir();
  for (const candidate of [".zsh_history", ".bash_history"]) {
    const path = join(home, candidate);
    if (existsSync(path)) return path;
  }

  throw new ConfigError("History file not found. Set HISTFILE or DALIAS_HISTORY_FILE");
}

/**
 * Extract the command from one history line.
 * zsh extended lines look like `: 1700000000:0;git status`; bash writes
 * `#1700000000` timestamp lines, which carry no command.
 */
export function parseHistoryLine(line: string): string | null {
  if (line.startsWith(": ")) {
    const separator = line.indexOf(";");
    if (separator !== -1) return line.slice(separator + 1);
  }

  if (line.startsWith("#") && /^[0-9]*$/.test(line.slice(1))) {
    return null;
  }

  return line;
}

export function readHistoryEntries(
  path: string,
  limit: number = DEFAULT_HISTORY_LIMIT,
): string[] {
  // History files may hold bytes that are not valid UTF-8; decode lossily.
  const content = readFileSync(path).toString("utf-8");
  const max = limit > 0 ? limit : DEFAULT_HISTORY_LIMIT;

  const entries: string[] = [];
  const seen = new Set<string>();
  const lines = content.split(/\r?\n/);

  for (let i = lines.length - 1; i >= 0 && entries.length < max; i--) {
    const command = parseHistoryLine(lines[i] ?? "")?.trim();
    if (!command || seen.has(command)) continue;
    seen.add(command);
    entries.push(command);
  }

  log(`Read ${entries.length} history entries from ${path}`);
  return entries;
}
