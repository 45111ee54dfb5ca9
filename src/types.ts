/**
 * Shared type definitions to avoid circular imports.
 */

/**
 * Multiword expression types.
 *
 * Mirrors the UD relations used for multiword units:
 * - fixed: grammaticalized expressions ("de acordo com")
 * - flat: headless names and dates ("São Paulo")
 * - compound: lexicalized compounds ("guarda chuva")
 */
export type ExpressionType = "fixed" | "flat" | "compound" | "other";

export const EXPRESSION_TYPES: readonly ExpressionType[] = [
  "fixed",
  "flat",
  "compound",
  "other",
];

/**
 * Metadata stored for a surface form in the expression dictionary.
 */
export interface ExpressionInfo {
  lemma: string;
  pos: string;
  type: ExpressionType;
}

/**
 * Live expression dictionary, keyed by surface form.
 */
export type ExpressionDictionary = ReadonlyMap<string, ExpressionInfo>;

/**
 * Wordform → lemma overrides. Keys and values are lowercase.
 */
export type OverrideDictionary = ReadonlyMap<string, string>;

/**
 * Terminal payload of a trie path.
 */
export interface MatchRecord {
  /** Surface form as written in the dictionary */
  original: string;
  lemma: string;
  pos: string;
  type: ExpressionType;
  /** Number of lemma tokens on the path */
  length: number;
}

/**
 * Half-open token range [start, end) matched to one expression.
 */
export interface MatchSpan {
  start: number;
  end: number;
  record: MatchRecord;
}

/**
 * Fields added to every token covered by a match.
 */
export interface MweFields {
  mweSpan: [number, number];
  mweLemma: string;
  mwePos: string;
  mweType: ExpressionType;
  /** Index of the first token of the span */
  mweHead: number;
  /** Offset from the span start (0 for the head) */
  mwePosition: number;
}

/**
 * Token as produced by the upstream pipeline.
 *
 * `expanded` holds the words of a multi-word token (e.g. "da" → "de", "a")
 * when the upstream step splits contractions below the token level.
 */
export interface Token extends Partial<MweFields> {
  text: string;
  lemma?: string;
  expanded?: Token[];
}

/**
 * A caller's token type after annotation.
 */
export type Annotated<T extends Token> = T & Partial<MweFields>;

/**
 * Sentence as produced by the upstream pipeline.
 */
export interface Sentence<T extends Token = Token> {
  tokens?: T[];
}

/**
 * One detected expression, collected from annotated tokens.
 */
export interface MweAnnotation {
  span: [number, number];
  /** Member token texts joined by spaces */
  text: string;
  lemma: string;
  pos: string;
  type: ExpressionType;
  tokens: string[];
}

/**
 * Aggregate counts over an expression dictionary.
 */
export interface DictionaryStatistics {
  total: number;
  /** Number of surface words → entry count */
  lengthDistribution: Record<number, number>;
  posDistribution: Record<string, number>;
  typeDistribution: Record<string, number>;
}
