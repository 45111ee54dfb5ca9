/**
 * Longest-match-first span detection.
 *
 * Scans left to right. At every position not already covered it walks the
 * trie token by token and keeps the longest terminal seen on that walk;
 * a match consumes its tokens and the scan resumes after it.
 */

import { tokenLemma } from "./normalizers.js";
import type { ExpressionTrie, TrieNode } from "./trie.js";
import type { MatchRecord, MatchSpan, OverrideDictionary } from "./types.js";

export const DEFAULT_MAX_LENGTH = 10;

export interface MatchOptions {
  /** Language for fallback normalization */
  language: string;
  /** Longest expression to consider, in tokens (default: 10) */
  maxLength?: number;
  /** Must be the table the trie was built with */
  overrides?: OverrideDictionary;
}

/**
 * Find non-overlapping expression spans in a token sequence.
 *
 * @param tokens - Sentence tokens; `lemma` is used when present and non-empty
 * @param trie - Trie built from the expression dictionary
 * @returns Spans in left-to-right order
 *
 * @example
 * ```ts
 * const tokens = ["Tomei", "café", "da", "manhã"].map((text) => ({ text }));
 * matchSpans(tokens, trie, { language: "portuguese" });
 * // [{ start: 1, end: 4, record: { lemma: "café da manhã", ... } }]
 * ```
 */
export function matchSpans(
  tokens: ReadonlyArray<{ text: string; lemma?: string }>,
  trie: ExpressionTrie,
  options: MatchOptions
): MatchSpan[] {
  const { language, maxLength = DEFAULT_MAX_LENGTH, overrides } = options;
  const spans: MatchSpan[] = [];

  if (tokens.length === 0 || trie.isEmpty) {
    return spans;
  }

  const consumed = new Set<number>();
  // Lemmas are resolved lazily and reused across overlapping walks
  const lemmas = new Map<number, string>();
  const lemmaAt = (index: number): string => {
    let lemma = lemmas.get(index);
    if (lemma === undefined) {
      lemma = tokenLemma(tokens[index], language, overrides);
      lemmas.set(index, lemma);
    }
    return lemma;
  };

  let i = 0;
  while (i < tokens.length) {
    if (consumed.has(i)) {
      i++;
      continue;
    }

    let best: MatchRecord | undefined;
    let bestLength = 0;
    let node: TrieNode | undefined = trie.root;
    const limit = Math.min(i + maxLength, tokens.length);

    for (let j = i; j < limit; j++) {
      // Never extend into tokens claimed by an earlier match
      if (consumed.has(j)) break;

      node = trie.child(node, lemmaAt(j));
      if (!node) break;

      if (node.terminal) {
        best = node.terminal;
        bestLength = j - i + 1;
      }
    }

    if (best) {
      const end = i + bestLength;
      spans.push({ start: i, end, record: best });
      for (let k = i; k < end; k++) {
        consumed.add(k);
      }
      i = end;
    } else {
      i++;
    }
  }

  return spans;
}
