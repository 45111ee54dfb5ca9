/**
 * Multiword expression recognizer for one language.
 *
 * Owns a mutable expression dictionary and the trie derived from it. The
 * pair lives in an immutable `RecognizerState`; `add` and `remove` build a
 * new state and swap it in with one assignment, so a caller holding a
 * `snapshot()` (or a match in progress) never sees a half-built trie.
 *
 * @example
 * ```ts
 * const recognizer = new MweRecognizer("portuguese", {
 *   dictionary: { kind: "file", path: "data/portuguese/mwe_database.json" },
 *   overrides: { kind: "file", path: "data/portuguese/lemma_dict.json" },
 * });
 *
 * recognizer.recognize([{ text: "Tomei" }, { text: "café" }, { text: "da" }, { text: "manhã" }]);
 * // tokens 1-3 carry mweSpan [1, 4], mweLemma "café da manhã", ...
 * ```
 */

import { annotateTokens, assertDisjointSpans } from "./annotate.js";
import { canonicalLanguage } from "./languages.js";
import {
  loadExpressionDictionary,
  loadOverrideDictionary,
  toExpressionInfo,
  type DictionarySource,
  type OverrideSource,
  type RawExpressionInfo,
} from "./loaders.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { DEFAULT_MAX_LENGTH, matchSpans } from "./matcher.js";
import { computeStatistics } from "./statistics.js";
import { ExpressionTrie } from "./trie.js";
import type {
  Annotated,
  DictionaryStatistics,
  ExpressionDictionary,
  ExpressionInfo,
  MatchSpan,
  OverrideDictionary,
  Sentence,
  Token,
} from "./types.js";

const MODULE = "recognizer";

export interface RecognizerOptions {
  /** Expression dictionary source (default: none, recognizer disabled) */
  dictionary?: DictionarySource;
  /** Wordform → lemma overrides consulted before suffix rules */
  overrides?: OverrideSource;
  /** Longest expression to consider, in tokens (default: 10) */
  maxLength?: number;
  logger?: Logger;
}

/**
 * Dictionary and trie that belong together. Never mutated.
 */
export interface RecognizerState {
  readonly dictionary: ExpressionDictionary;
  readonly trie: ExpressionTrie;
}

export class MweRecognizer {
  readonly language: string;
  readonly maxLength: number;
  /** Problems met while loading sources */
  readonly warnings: string[] = [];

  private readonly overrides: OverrideDictionary;
  private readonly logger: Logger;
  private state: RecognizerState;

  constructor(language: string, options: RecognizerOptions = {}) {
    const {
      dictionary: dictionarySource,
      overrides: overrideSource,
      maxLength = DEFAULT_MAX_LENGTH,
      logger = createConsoleLogger(),
    } = options;

    this.language = canonicalLanguage(language);
    this.maxLength = maxLength;
    this.logger = logger;

    const dictionary = loadExpressionDictionary(dictionarySource);
    const overrides = loadOverrideDictionary(overrideSource);
    for (const warning of [dictionary.warning, overrides.warning]) {
      if (warning) {
        this.warnings.push(warning);
        this.logger.warn(MODULE, warning);
      }
    }

    this.overrides = overrides.data;
    this.state = this.buildState(dictionary.data);

    if (this.enabled) {
      const lemmaInfo =
        this.overrides.size > 0
          ? ` with ${this.overrides.size} lemma mappings`
          : "";
      this.logger.info(
        MODULE,
        `Loaded MWE recognizer for ${this.language}: ${this.size} expressions${lemmaInfo}`
      );
    }
  }

  /**
   * True while the dictionary holds at least one expression.
   */
  get enabled(): boolean {
    return this.state.dictionary.size > 0;
  }

  /**
   * Number of expressions in the dictionary.
   */
  get size(): number {
    return this.state.dictionary.size;
  }

  /**
   * Number of wordform → lemma overrides.
   */
  get overrideCount(): number {
    return this.overrides.size;
  }

  /**
   * Current dictionary and trie. Later mutations do not affect it.
   */
  snapshot(): RecognizerState {
    return this.state;
  }

  has(surfaceForm: string): boolean {
    return this.state.dictionary.has(surfaceForm);
  }

  /**
   * Find expression spans without annotating.
   */
  match(tokens: readonly Token[]): MatchSpan[] {
    const { trie } = this.state;
    return matchSpans(tokens, trie, {
      language: this.language,
      maxLength: this.maxLength,
      overrides: this.overrides,
    });
  }

  /**
   * Annotate the tokens of one sentence.
   * Returns the input array itself when nothing matches.
   */
  recognize<T extends Token>(tokens: T[]): Annotated<T>[] {
    if (!this.enabled || tokens.length === 0) {
      return tokens;
    }

    const spans = this.match(tokens);
    if (spans.length === 0) {
      return tokens;
    }

    assertDisjointSpans(spans);
    return annotateTokens(tokens, spans);
  }

  /**
   * Annotate every sentence of a document.
   *
   * A token's `expanded` words are matched on their own, then the top-level
   * tokens are matched; the two passes do not interact, and expressions
   * crossing from expanded words into neighbouring tokens are not found.
   * Sentences without `tokens` are passed through.
   */
  recognizeDocument<S extends Sentence>(document: S[]): S[] {
    if (!this.enabled || document.length === 0) {
      return document;
    }

    return document.map((sentence) => {
      const { tokens } = sentence;
      if (!tokens) {
        return sentence;
      }

      const withExpanded = tokens.map((token) =>
        token.expanded && token.expanded.length > 0
          ? { ...token, expanded: this.recognize(token.expanded) }
          : token
      );

      return { ...sentence, tokens: this.recognize(withExpanded) };
    });
  }

  /**
   * Add (or replace) an expression and rebuild the trie.
   *
   * @example
   * ```ts
   * recognizer.add("de acordo com", { pos: "ADP" });
   * // lemma defaults to the surface form, type to "fixed"
   * ```
   */
  add(surfaceForm: string, info: RawExpressionInfo = {}): void {
    const dictionary = new Map(this.state.dictionary);
    dictionary.set(surfaceForm, toExpressionInfo(surfaceForm, info));
    this.state = this.buildState(dictionary);
  }

  /**
   * Remove an expression and rebuild the trie.
   *
   * @returns Whether the surface form was present
   */
  remove(surfaceForm: string): boolean {
    if (!this.state.dictionary.has(surfaceForm)) {
      return false;
    }
    const dictionary = new Map(this.state.dictionary);
    dictionary.delete(surfaceForm);
    this.state = this.buildState(dictionary);
    return true;
  }

  /**
   * Entry metadata for a surface form.
   */
  get(surfaceForm: string): ExpressionInfo | undefined {
    return this.state.dictionary.get(surfaceForm);
  }

  statistics(): DictionaryStatistics {
    return computeStatistics(this.state.dictionary);
  }

  private buildState(dictionary: Map<string, ExpressionInfo>): RecognizerState {
    const trie =
      dictionary.size > 0
        ? ExpressionTrie.build(dictionary, this.language, this.overrides)
        : ExpressionTrie.empty();

    for (const collision of trie.collisions) {
      this.logger.warn(
        MODULE,
        `"${collision.discarded}" and "${collision.kept}" share lemma path ` +
          `"${collision.path.join(" ")}"; keeping "${collision.kept}"`
      );
    }

    return { dictionary, trie };
  }
}
