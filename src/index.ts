export type {
  Annotated,
  DictionaryStatistics,
  ExpressionDictionary,
  ExpressionInfo,
  ExpressionType,
  MatchRecord,
  MatchSpan,
  MweAnnotation,
  MweFields,
  OverrideDictionary,
  Sentence,
  Token,
} from "./types.js";
export { EXPRESSION_TYPES } from "./types.js";
export { LANGUAGE_ALIASES, canonicalLanguage, isPortuguese } from "./languages.js";
export { normalizeWord, tokenLemma } from "./normalizers.js";
export {
  PORTUGUESE_CONTRACTIONS,
  expandContraction,
  expandContractions,
} from "./contractions.js";
export {
  ExpressionTrie,
  lemmaPaths,
  type TrieCollision,
  type TrieNode,
} from "./trie.js";
export { DEFAULT_MAX_LENGTH, matchSpans, type MatchOptions } from "./matcher.js";
export {
  annotateTokens,
  assertDisjointSpans,
  extractAnnotations,
} from "./annotate.js";
export { computeStatistics } from "./statistics.js";
export { SpanOverlapError } from "./errors.js";
export {
  loadExpressionDictionary,
  loadOverrideDictionary,
  toExpressionInfo,
  toExpressionType,
  ExpressionDocumentSchema,
  OverrideDocumentSchema,
  type DictionarySource,
  type OverrideSource,
  type LoadResult,
  type RawExpressionInfo,
} from "./loaders.js";
export {
  LogLevel,
  createConsoleLogger,
  parseLogLevel,
  silentLogger,
  type ConsoleLoggerOptions,
  type Logger,
} from "./logger.js";
export { EnvSchema, loadConfig, type MweConfig } from "./config.js";
export {
  MweRecognizer,
  type RecognizerOptions,
  type RecognizerState,
} from "./recognizer.js";
export { RecognizerRegistry } from "./registry.js";
