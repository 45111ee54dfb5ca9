/**
 * Language identifiers.
 *
 * Recognizers are keyed by the canonical name; ISO 639-1 codes are accepted
 * as aliases wherever a language is passed in.
 */

export const LANGUAGE_ALIASES: Record<string, string> = {
  pt: "portuguese",
  en: "english",
  es: "spanish",
  fr: "french",
  it: "italian",
};

/**
 * Resolve an alias to its canonical language name.
 *
 * @example
 * ```ts
 * canonicalLanguage("PT"); // "portuguese"
 * canonicalLanguage("portuguese"); // "portuguese"
 * canonicalLanguage("klingon"); // "klingon"
 * ```
 */
export function canonicalLanguage(language: string): string {
  const key = language.trim().toLowerCase();
  return LANGUAGE_ALIASES[key] ?? key;
}

export function isPortuguese(language: string): boolean {
  return canonicalLanguage(language) === "portuguese";
}
