import { z } from "zod";

import { InvalidConfigurationError } from "../errors.js";
import { LOG_LEVELS } from "../logger.js";
import { SEARCH_STRATEGIES } from "../spelling/candidateIndex.js";
import { readOptionalEnum, readOptionalInt, readOptionalString, type EnvSource } from "./env.js";

/** Default acceptance threshold for spelling candidates. */
export const DEFAULT_MAX_EDITS = 2;

const SettingsSchema = z
  .object({
    maxEdits: z.number().int().nonnegative(),
    searchStrategy: z.enum(SEARCH_STRATEGIES),
    vocabularyPath: z.string().min(1).nullable(),
    logLevel: z.enum(LOG_LEVELS),
    logFile: z.string().min(1).nullable(),
  })
  .strict();

/** Process-level defaults shared by the CLI and library callers. */
export type Settings = z.infer<typeof SettingsSchema>;

export const DEFAULT_SETTINGS: Readonly<Settings> = Object.freeze({
  maxEdits: DEFAULT_MAX_EDITS,
  searchStrategy: "length-bucket",
  vocabularyPath: null,
  logLevel: "warn",
  logFile: null,
});

/**
 * Builds the settings from `SPELLWRIGHT_*` environment variables:
 *
 * - `SPELLWRIGHT_MAX_EDITS`: non-negative integer threshold.
 * - `SPELLWRIGHT_SEARCH_STRATEGY`: `linear` or `length-bucket`.
 * - `SPELLWRIGHT_VOCABULARY_PATH`: word list replacing the bundled one.
 * - `SPELLWRIGHT_LOG_LEVEL`: `debug`, `info`, `warn` or `error`.
 * - `SPELLWRIGHT_LOG_FILE`: file mirroring the JSON log lines.
 */
export function loadSettings(env: EnvSource = process.env): Settings {
  const candidate = {
    maxEdits: readOptionalInt(env, "SPELLWRIGHT_MAX_EDITS", { min: 0 }) ?? DEFAULT_SETTINGS.maxEdits,
    searchStrategy: readOptionalEnum(env, "SPELLWRIGHT_SEARCH_STRATEGY", SEARCH_STRATEGIES) ?? DEFAULT_SETTINGS.searchStrategy,
    vocabularyPath: readOptionalString(env, "SPELLWRIGHT_VOCABULARY_PATH") ?? DEFAULT_SETTINGS.vocabularyPath,
    logLevel: readOptionalEnum(env, "SPELLWRIGHT_LOG_LEVEL", LOG_LEVELS) ?? DEFAULT_SETTINGS.logLevel,
    logFile: readOptionalString(env, "SPELLWRIGHT_LOG_FILE") ?? DEFAULT_SETTINGS.logFile,
  };
  const parsed = SettingsSchema.safeParse(candidate);
  if (!parsed.success) {
    throw InvalidConfigurationError.fromZod("settings", parsed.error);
  }
  return parsed.data;
}
