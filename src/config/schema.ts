/**
 * Zod schema for dalias settings read from the environment.
 */

import { z } from "zod";

const flagSchema = z
  .enum(["1", "0", "true", "false", "yes", "no", ""])
  .optional()
  .transform(value => value === "1" || value === "true" || value === "yes");

const optionalPath = z
  .string()
  .optional()
  .transform(value => (value && value.trim() !== "" ? value : undefined));

export const settingsEnvSchema = z.object({
  DALIAS_DATA_DIR: optionalPath,
  DALIAS_HISTORY_FILE: optionalPath,
  HISTFILE: optionalPath,
  DALIAS_FZF_BIN: z.string().min(1).default("fzf"),
  DALIAS_VERBOSE: flagSchema,
  DALIAS_FUNCTIONS: z.string().default(""),
});

export type SettingsEnv = z.infer<typeof settingsEnvSchema>;
