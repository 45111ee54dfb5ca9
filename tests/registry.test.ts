import { describe, it, expect } from "vitest";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import {
  MweRecognizer,
  RecognizerRegistry,
  loadConfig,
  silentLogger,
  type Token,
} from "../src/index.js";

const fixtures = join(dirname(fileURLToPath(import.meta.url)), "fixtures");

const words = (sentence: string): Token[] =>
  sentence.split(" ").map((text) => ({ text }));

function fixtureConfig(env: Record<string, string> = {}) {
  return loadConfig({
    MWE_DATABASE_PATH: join(fixtures, "expressions.json"),
    LEMMA_DICT_PATH: join(fixtures, "overrides.json"),
    ...env,
  });
}

describe("RecognizerRegistry", () => {
  it("should load dictionaries for the default language only", () => {
    const registry = RecognizerRegistry.fromConfig(fixtureConfig(), silentLogger);

    expect(registry.languages()).toEqual(["portuguese", "english"]);
    expect(registry.get("pt")?.size).toBe(4);
    expect(registry.get("pt")?.overrideCount).toBe(2);
    expect(registry.get("english")?.enabled).toBe(false);
  });

  it("should load nothing when disabled", () => {
    const registry = RecognizerRegistry.fromConfig(
      fixtureConfig({ MWE_ENABLED: "false" }),
      silentLogger
    );

    expect(registry.has("portuguese")).toBe(true);
    expect(registry.get("portuguese")?.enabled).toBe(false);
  });

  it("should pass the maximum length to recognizers", () => {
    const registry = RecognizerRegistry.fromConfig(
      fixtureConfig({ MWE_MAX_LENGTH: "2" }),
      silentLogger
    );
    expect(registry.get("portuguese")?.maxLength).toBe(2);
    // Three-word expressions no longer fit
    expect(registry.get("portuguese")?.match(words("café da manhã"))).toEqual([]);
  });

  it("should recognize with the recognizer for a language alias", () => {
    const registry = RecognizerRegistry.fromConfig(fixtureConfig(), silentLogger);
    const tokens = registry.recognize("PT", words("Comi pé de moleque"));

    expect(tokens[1].mweSpan).toEqual([1, 4]);
    expect(tokens[1].mweType).toBe("other");
  });

  it("should return tokens unchanged for an unknown language", () => {
    const registry = new RecognizerRegistry();
    const tokens = words("café da manhã");

    expect(registry.has("german")).toBe(false);
    expect(registry.recognize("german", tokens)).toBe(tokens);
  });

  it("should register recognizers under their canonical name", () => {
    const recognizer = new MweRecognizer("es", { logger: silentLogger });
    const registry = new RecognizerRegistry().register("ES", recognizer);

    expect(registry.get("spanish")).toBe(recognizer);
    expect(registry.languages()).toEqual(["spanish"]);
  });
});
