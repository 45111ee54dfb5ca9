/**
 * Lemma normalization for matching dictionary entries against live text.
 *
 * Lookup order:
 * 1. Override dictionary (wordform → lemma), when the caller supplies one
 * 2. Language-specific suffix rules
 * 3. The lowercased word itself
 *
 * The rules are deliberately shallow: both sides of a match (dictionary
 * entries and sentence tokens) go through the same function, so a rule only
 * has to map inflected forms onto a shared key, not onto a real lemma.
 */

import { isPortuguese } from "./languages.js";
import type { OverrideDictionary } from "./types.js";

/**
 * A suffix rewrite. Rules are tried in order and the first one whose suffix
 * and guard both match wins.
 */
interface SuffixRule {
  suffix: string;
  rewrite: (word: string) => string;
  /** Word must be strictly longer than this */
  minLength?: number;
}

const PORTUGUESE_VOWELS = new Set("aeiouáéíóú");

const replaceSuffix =
  (length: number, replacement: string) =>
  (word: string): string =>
    word.slice(0, word.length - length) + replacement;

/**
 * Portuguese plural and gerund endings (most specific first).
 * "-es" alone is never stripped: "-res", "-ses" and "-zes" are listed
 * explicitly so they win over the generic "-s".
 */
const PORTUGUESE_RULES: SuffixRule[] = [
  { suffix: "ões", rewrite: replaceSuffix(3, "ão") }, // limões → limão
  { suffix: "ães", rewrite: replaceSuffix(3, "ão") }, // pães → pão
  { suffix: "ãos", rewrite: replaceSuffix(3, "ão") }, // mãos → mão
  {
    suffix: "eis",
    // vowel before the ending takes "-l", anything else "-il" (fáceis → fácil)
    rewrite: (word) =>
      word.length > 4 && PORTUGUESE_VOWELS.has(word[word.length - 4])
        ? replaceSuffix(3, "l")(word)
        : replaceSuffix(3, "il")(word),
  },
  { suffix: "óis", rewrite: replaceSuffix(3, "ol") }, // sóis → sol
  { suffix: "res", rewrite: replaceSuffix(2, "") }, // flores → flor
  { suffix: "ses", rewrite: replaceSuffix(2, "") }, // meses → mes
  { suffix: "zes", rewrite: replaceSuffix(2, "") }, // luzes → luz
  { suffix: "ns", rewrite: replaceSuffix(2, "m") }, // jardins → jardim
  { suffix: "s", rewrite: replaceSuffix(1, ""), minLength: 2 }, // cafés → café
  { suffix: "ando", rewrite: replaceSuffix(4, "ar") }, // falando → falar
  { suffix: "endo", rewrite: replaceSuffix(4, "er") }, // comendo → comer
  { suffix: "indo", rewrite: replaceSuffix(4, "er") },
];

function applyRules(word: string, rules: SuffixRule[]): string {
  for (const rule of rules) {
    if (!word.endsWith(rule.suffix)) continue;
    if (rule.minLength !== undefined && word.length <= rule.minLength) continue;
    return rule.rewrite(word);
  }
  return word;
}

/**
 * Map a surface wordform to the key used for trie lookup.
 *
 * @param word - Surface form (any case)
 * @param language - Language name or alias
 * @param overrides - Optional lowercase wordform → lemma table
 *
 * @example
 * ```ts
 * normalizeWord("Cafés", "portuguese"); // "café"
 * normalizeWord("foram", "pt", new Map([["foram", "ser"]])); // "ser"
 * normalizeWord("Houses", "english"); // "houses"
 * ```
 */
export function normalizeWord(
  word: string,
  language: string,
  overrides?: OverrideDictionary
): string {
  if (!word) {
    return word;
  }

  const lower = word.toLowerCase();

  const override = overrides?.get(lower);
  if (override !== undefined) {
    return override;
  }

  if (isPortuguese(language)) {
    return applyRules(lower, PORTUGUESE_RULES);
  }

  return lower;
}

/**
 * Resolve the lookup key for a sentence token: its own lemma when the
 * upstream pipeline supplied a non-empty one, otherwise `normalizeWord`.
 */
export function tokenLemma(
  token: { text: string; lemma?: string },
  language: string,
  overrides?: OverrideDictionary
): string {
  if (token.lemma) {
    return token.lemma.toLowerCase();
  }
  return normalizeWord(token.text, language, overrides);
}
