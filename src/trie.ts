/**
 * Lemma-sequence trie over an expression dictionary.
 *
 * Every surface form is split on whitespace, contractions are expanded and
 * each word is normalized; the resulting lemma sequence is a path from the
 * root, and the node at its end carries the expression's `MatchRecord`.
 *
 * When expansion changed the word sequence, the entry is also indexed under
 * its unexpanded words. Input from a tokenizer that splits contractions
 * ("café de a manhã") and from one that keeps them ("café da manhã") both
 * reach a terminal.
 */

import { expandContractions } from "./contractions.js";
import { normalizeWord } from "./normalizers.js";
import type {
  ExpressionDictionary,
  MatchRecord,
  OverrideDictionary,
} from "./types.js";

export interface TrieNode {
  readonly children: ReadonlyMap<string, TrieNode>;
  readonly terminal?: MatchRecord;
}

interface BuildNode {
  children: Map<string, BuildNode>;
  terminal?: MatchRecord;
}

/**
 * Two surface forms that normalized to the same lemma sequence.
 */
export interface TrieCollision {
  path: string[];
  kept: string;
  discarded: string;
}

function createNode(): BuildNode {
  return { children: new Map() };
}

/**
 * Pick the record that owns a shared terminal.
 * Longer surface forms win; equal lengths go to the one that sorts first,
 * so the outcome does not depend on dictionary iteration order.
 */
function preferRecord(a: MatchRecord, b: MatchRecord): MatchRecord {
  if (a.original.length !== b.original.length) {
    return a.original.length > b.original.length ? a : b;
  }
  return a.original <= b.original ? a : b;
}

/**
 * Lemma paths under which a surface form is indexed.
 */
export function lemmaPaths(
  surface: string,
  language: string,
  overrides?: OverrideDictionary
): string[][] {
  const words = surface.split(/\s+/).filter((w) => w.length > 0);
  if (words.length === 0) {
    return [];
  }

  const normalize = (word: string) => normalizeWord(word, language, overrides);
  const expanded = expandContractions(words, language);
  const paths = [expanded.map(normalize)];

  // Expansion only ever adds words, so equal lengths mean nothing changed
  if (expanded.length !== words.length) {
    paths.push(words.map(normalize));
  }
  return paths;
}

export class ExpressionTrie {
  private readonly rootNode: TrieNode;
  private readonly terminalCount: number;

  /** Collisions resolved while building */
  readonly collisions: readonly TrieCollision[];

  private constructor(
    root: TrieNode,
    terminalCount: number,
    collisions: TrieCollision[]
  ) {
    this.rootNode = root;
    this.terminalCount = terminalCount;
    this.collisions = collisions;
  }

  /**
   * Build a trie from a dictionary.
   *
   * @param dictionary - Surface form → expression metadata
   * @param language - Language for contraction expansion and normalization
   * @param overrides - Wordform → lemma table consulted before suffix rules
   *
   * @example
   * ```ts
   * const trie = ExpressionTrie.build(
   *   new Map([["café da manhã", { lemma: "café da manhã", pos: "NOUN", type: "fixed" }]]),
   *   "portuguese"
   * );
   * trie.find(["café", "de", "a", "manhã"])?.lemma; // "café da manhã"
   * trie.find(["café", "da", "manhã"])?.lemma; // "café da manhã"
   * ```
   */
  static build(
    dictionary: ExpressionDictionary,
    language: string,
    overrides?: OverrideDictionary
  ): ExpressionTrie {
    const root = createNode();
    const collisions: TrieCollision[] = [];
    let terminalCount = 0;

    for (const [surface, info] of dictionary) {
      for (const path of lemmaPaths(surface, language, overrides)) {
        let node = root;
        for (const lemma of path) {
          let next = node.children.get(lemma);
          if (!next) {
            next = createNode();
            node.children.set(lemma, next);
          }
          node = next;
        }

        const record: MatchRecord = {
          original: surface,
          lemma: info.lemma,
          pos: info.pos,
          type: info.type,
          length: path.length,
        };

        const existing = node.terminal;
        if (!existing) {
          node.terminal = record;
          terminalCount++;
          continue;
        }
        if (existing.original === surface) {
          continue;
        }

        const kept = preferRecord(existing, record);
        collisions.push({
          path,
          kept: kept.original,
          discarded: kept === record ? existing.original : record.original,
        });
        node.terminal = kept;
      }
    }

    return new ExpressionTrie(root, terminalCount, collisions);
  }

  /**
   * An empty trie (matches nothing).
   */
  static empty(): ExpressionTrie {
    return new ExpressionTrie(createNode(), 0, []);
  }

  get root(): TrieNode {
    return this.rootNode;
  }

  /**
   * Number of terminal nodes (indexed paths, not dictionary entries).
   */
  get size(): number {
    return this.terminalCount;
  }

  get isEmpty(): boolean {
    return this.terminalCount === 0;
  }

  child(node: TrieNode, lemma: string): TrieNode | undefined {
    return node.children.get(lemma);
  }

  /**
   * Look up the record stored at the end of an exact lemma path.
   */
  find(lemmas: string[]): MatchRecord | undefined {
    let node: TrieNode | undefined = this.rootNode;
    for (const lemma of lemmas) {
      node = node.children.get(lemma);
      if (!node) return undefined;
    }
    return node.terminal;
  }
}
