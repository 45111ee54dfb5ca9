/**
 * Orthographic contractions.
 *
 * Portuguese fuses prepositions with the following article ("de" + "a" →
 * "da"). Upstream tokenizers usually split these into separate words, so
 * dictionary surface forms are expanded the same way before they are
 * inserted into the trie.
 */

import { isPortuguese } from "./languages.js";

/**
 * Portuguese preposition + article contractions.
 * Keys are lowercase.
 */
export const PORTUGUESE_CONTRACTIONS: ReadonlyMap<string, readonly string[]> =
  new Map([
    // de + article
    ["da", ["de", "a"]],
    ["do", ["de", "o"]],
    ["das", ["de", "as"]],
    ["dos", ["de", "os"]],
    ["dum", ["de", "um"]],
    ["duma", ["de", "uma"]],
    ["duns", ["de", "uns"]],
    ["dumas", ["de", "umas"]],
    // em + article
    ["na", ["em", "a"]],
    ["no", ["em", "o"]],
    ["nas", ["em", "as"]],
    ["nos", ["em", "os"]],
    ["num", ["em", "um"]],
    ["numa", ["em", "uma"]],
    ["nuns", ["em", "uns"]],
    ["numas", ["em", "umas"]],
    // a + article
    ["ao", ["a", "o"]],
    ["aos", ["a", "os"]],
    ["à", ["a", "a"]],
    ["às", ["a", "as"]],
    // por + article
    ["pela", ["por", "a"]],
    ["pelo", ["por", "o"]],
    ["pelas", ["por", "as"]],
    ["pelos", ["por", "os"]],
  ]);

/**
 * Expand a word into the words it contracts.
 * Unknown words (and every word in a language without a table) come back
 * as a one-element array holding the word unchanged.
 *
 * @example
 * ```ts
 * expandContraction("Da", "portuguese"); // ["de", "a"]
 * expandContraction("manhã", "portuguese"); // ["manhã"]
 * expandContraction("da", "english"); // ["da"]
 * ```
 */
export function expandContraction(word: string, language: string): string[] {
  if (!isPortuguese(language)) {
    return [word];
  }
  const expansion = PORTUGUESE_CONTRACTIONS.get(word.toLowerCase());
  return expansion ? [...expansion] : [word];
}

/**
 * Expand every word of a sequence, flattening the result.
 */
export function expandContractions(words: string[], language: string): string[] {
  return words.flatMap((word) => expandContraction(word, language));
}
