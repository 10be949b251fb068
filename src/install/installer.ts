/**
 * Profile installer: adds the `eval "$(dalias init)"` hook to the
 * user's shell rc file.
 */

import {
  appendFileSync,
  existsSync,
  mkdirSync,
  readFileSync,
  writeFileSync,
} from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";
import { log } from "../util/logger";

export type ShellType = "bash" | "zsh" | "unknown";

export const HOOK_LINE = "eval \"$(dalias init)\"";
export const HOOK_COMMENT = "# dalias alias manager";

export function detectShell(): ShellType {
  const shell = process.env.SHELL ?? "";
  if (shell.endsWith("/zsh")) return "zsh";
  if (shell.endsWith("/bash")) return "bash";
  return "unknown";
}

export function getRcFile(shell: string): string {
  switch (shell) {
    case "zsh":
      return join(homedir(), ".zshrc");
    case "bash":
      return join(homedir(), ".bashrc");
    default:
      throw new Error(`Unsupported shell: ${shell}. Supported: bash, zsh`);
  }
}

export function installHook(
  shell: string,
): { path: string; installed: boolean; message: string; } {
  const rcFile = getRcFile(shell);

  let content = "";
  if (existsSync(rcFile)) {
    content = readFileSync(rcFile, "utf-8");
  }
  if (content.includes(HOOK_LINE)) {
    return { path: rcFile, installed: false, message: `Already installed in ${rcFile}` };
  }

  const separator = content === "" ? "" : content.endsWith("\n") ? "\n" : "\n\n";
  writeFileSync(rcFile, `${content}${separator}${HOOK_COMMENT}\n${HOOK_LINE}\n`, "utf-8");
  logAction(`Installed ${shell} hook into ${rcFile}`);

  return {
    path: rcFile,
    installed: true,
    message: `Installed to ${rcFile}.\nRun: source ${rcFile}`,
  };
}

export function uninstallHook(shell: string): boolean {
  const rcFile = getRcFile(shell);
  if (!existsSync(rcFile)) return false;

  const content = readFileSync(rcFile, "utf-8");
  if (!content.includes(HOOK_LINE)) return false;

  const updated = content
    .split("\n")
    .filter(l => l !== HOOK_LINE && l !== HOOK_COMMENT)
    .join("\n");
  writeFileSync(rcFile, updated, "utf-8");
  logAction(`Uninstalled ${shell} hook from ${rcFile}`);
  return true;
}

function logAction(message: string): void {
  try {
    const logDir = join(homedir(), ".dalias");
    mkdirSync(logDir, { recursive: true });
    const logFile = join(logDir, "install.log");
    const timestamp = new Date().toISOString();
    appendFileSync(logFile, `${timestamp} ${message}\n`, "utf-8");
  } catch (err) {
    log(`Could not write install log: ${err instanceof Error ? err.message : String(err)}`);
  }
}
