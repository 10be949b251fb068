/**
 * Hand history entries to an external fuzzy finder (fzf by default)
 * and return the line the user picked.
 */

import { spawnSync } from "node:child_process";
import { CancelledError, ConfigError } from "../util/errors";

export const FZF_ARGS = [
  "--exit-0",
  "--reverse",
  "--height=40%",
  "--prompt=dalias> ",
] as const;

export function selectWithFzf(entries: string[], fzfBin: string = "fzf"): string {
  if (entries.length === 0) throw new CancelledError();

  // stderr stays on the terminal: fzf draws its UI there.
  const result = spawnSync(fzfBin, [...FZF_ARGS], {
    input: entries.join("\n"),
    encoding: "utf-8",
    stdio: ["pipe", "pipe", "inherit"],
  });

  if (result.error) {
    if ("code" in result.error && result.error.code === "ENOENT") {
      throw new ConfigError(`fzf not found: ${fzfBin}`);
    }
    throw result.error;
  }
  if (result.status !== 0) throw new CancelledError();

  const selected = result.stdout.trim();
  if (!selected) throw new CancelledError();
  return selected;
}
