/**
 * Environment configuration for services embedding the recognizer.
 */

import { z } from "zod";
import { canonicalLanguage } from "./languages.js";
import { LogLevel, parseLogLevel } from "./logger.js";

const TRUTHY = new Set(["true", "1", "yes"]);

const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) =>
      value === undefined ? fallback : TRUTHY.has(value.trim().toLowerCase())
    );

const languageList = z
  .string()
  .default("portuguese,english")
  .transform((value) =>
    value
      .split(",")
      .map((language) => language.trim())
      .filter((language) => language.length > 0)
      .map(canonicalLanguage)
  );

export const EnvSchema = z.object({
  MWE_DATABASE_PATH: z.string().min(1).default("data/portuguese/mwe_database.json"),
  LEMMA_DICT_PATH: z.string().min(1).default("data/portuguese/lemma_dict.json"),
  MWE_ENABLED: booleanFlag(true),
  DEFAULT_LANGUAGE: z.string().min(1).default("portuguese").transform(canonicalLanguage),
  SUPPORTED_LANGUAGES: languageList,
  MWE_MAX_LENGTH: z.coerce.number().int().positive().default(10),
  LOG_LEVEL: z.string().default("info").transform(parseLogLevel),
});

export interface MweConfig {
  mweDatabasePath: string;
  lemmaDictPath: string;
  mweEnabled: boolean;
  defaultLanguage: string;
  /** Always contains the default language */
  supportedLanguages: string[];
  maxLength: number;
  logLevel: LogLevel;
}

/**
 * Read configuration from environment variables.
 *
 * @throws Error listing every variable that could not be parsed
 *
 * @example
 * ```ts
 * const config = loadConfig({ MWE_MAX_LENGTH: "6", DEFAULT_LANGUAGE: "pt" });
 * config.maxLength; // 6
 * config.defaultLanguage; // "portuguese"
 * ```
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): MweConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid MWE configuration: ${problems}`);
  }

  const settings = parsed.data;
  const supported = settings.SUPPORTED_LANGUAGES.includes(settings.DEFAULT_LANGUAGE)
    ? settings.SUPPORTED_LANGUAGES
    : [settings.DEFAULT_LANGUAGE, ...settings.SUPPORTED_LANGUAGES];

  return {
    mweDatabasePath: settings.MWE_DATABASE_PATH,
    lemmaDictPath: settings.LEMMA_DICT_PATH,
    mweEnabled: settings.MWE_ENABLED,
    defaultLanguage: settings.DEFAULT_LANGUAGE,
    supportedLanguages: [...new Set(supported)],
    maxLength: settings.MWE_MAX_LENGTH,
    logLevel: settings.LOG_LEVEL,
  };
}
