/**
 * Resolve runtime settings from ~/.dalias/.env and the process environment.
 */

import { config as loadDotenv } from "dotenv";
import { join } from "node:path";
import { homedir } from "node:os";
import { settingsEnvSchema } from "./schema";
import { ConfigError } from "../util/errors";

export interface Settings {
  dataDir: string;
  databasePath: string;
  historyFile?: string;
  shellHistFile?: string;
  fzfBin: string;
  verbose: boolean;
  previousFunctions: string;
}

export function getConfigDir(): string {
  return join(homedir(), ".dalias");
}

/** Load ~/.dalias/.env into process.env; existing variables win. */
export function loadEnvFile(): void {
  loadDotenv({ path: join(getConfigDir(), ".env"), quiet: true });
}

export function resolveSettings(
  env: Record<string, string | undefined> = process.env,
): Settings {
  const result = settingsEnvSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    const variable = issue?.path.join(".") ?? "environment";
    throw new ConfigError(`${variable}: ${issue?.message ?? "invalid value"}`);
  }

  const parsed = result.data;
  const dataDir = parsed.DALIAS_DATA_DIR ?? getConfigDir();
  return {
    dataDir,
    databasePath: join(dataDir, "aliases.db"),
    historyFile: parsed.DALIAS_HISTORY_FILE,
    shellHistFile: parsed.HISTFILE,
    fzfBin: parsed.DALIAS_FZF_BIN,
    verbose: parsed.DALIAS_VERBOSE,
    previousFunctions: parsed.DALIAS_FUNCTIONS,
  };
}
