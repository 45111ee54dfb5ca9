/**
 * Per-language recognizers owned by the embedding service.
 *
 * A registry is built once at startup and passed to request handlers;
 * there is no module-level recognizer state.
 */

import type { MweConfig } from "./config.js";
import { canonicalLanguage } from "./languages.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { MweRecognizer } from "./recognizer.js";
import type { Annotated, Token } from "./types.js";

export class RecognizerRegistry {
  private readonly recognizers = new Map<string, MweRecognizer>();

  /**
   * Build recognizers for every supported language.
   *
   * The configured dictionary files belong to the default language; other
   * supported languages get an empty (disabled) recognizer until
   * expressions are added at runtime. With `mweEnabled` off, nothing is
   * loaded.
   */
  static fromConfig(
    config: MweConfig,
    logger: Logger = createConsoleLogger({ level: config.logLevel })
  ): RecognizerRegistry {
    const registry = new RecognizerRegistry();

    for (const language of config.supportedLanguages) {
      const withSources = config.mweEnabled && language === config.defaultLanguage;
      registry.register(
        language,
        new MweRecognizer(language, {
          dictionary: withSources
            ? { kind: "file", path: config.mweDatabasePath }
            : undefined,
          overrides: withSources
            ? { kind: "file", path: config.lemmaDictPath }
            : undefined,
          maxLength: config.maxLength,
          logger,
        })
      );
    }

    return registry;
  }

  register(language: string, recognizer: MweRecognizer): this {
    this.recognizers.set(canonicalLanguage(language), recognizer);
    return this;
  }

  get(language: string): MweRecognizer | undefined {
    return this.recognizers.get(canonicalLanguage(language));
  }

  has(language: string): boolean {
    return this.recognizers.has(canonicalLanguage(language));
  }

  languages(): string[] {
    return [...this.recognizers.keys()];
  }

  /**
   * Annotate a sentence with the recognizer for `language`.
   * Tokens come back unchanged when no recognizer is registered.
   */
  recognize<T extends Token>(language: string, tokens: T[]): Annotated<T>[] {
    const recognizer = this.get(language);
    return recognizer ? recognizer.recognize(tokens) : tokens;
  }
}
