import { describe, it, expect } from "vitest";
import { LogLevel, loadConfig } from "../src/index.js";

describe("loadConfig", () => {
  it("should use defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      mweDatabasePath: "data/portuguese/mwe_database.json",
      lemmaDictPath: "data/portuguese/lemma_dict.json",
      mweEnabled: true,
      defaultLanguage: "portuguese",
      supportedLanguages: ["portuguese", "english"],
      maxLength: 10,
      logLevel: LogLevel.INFO,
    });
  });

  it("should parse the enabled flag", () => {
    expect(loadConfig({ MWE_ENABLED: "no" }).mweEnabled).toBe(false);
    expect(loadConfig({ MWE_ENABLED: "false" }).mweEnabled).toBe(false);
    expect(loadConfig({ MWE_ENABLED: "YES" }).mweEnabled).toBe(true);
    expect(loadConfig({ MWE_ENABLED: "1" }).mweEnabled).toBe(true);
  });

  it("should parse the maximum length", () => {
    expect(loadConfig({ MWE_MAX_LENGTH: "6" }).maxLength).toBe(6);
  });

  it("should reject a non-numeric maximum length", () => {
    expect(() => loadConfig({ MWE_MAX_LENGTH: "abc" })).toThrow(
      /^Invalid MWE configuration: MWE_MAX_LENGTH:/
    );
  });

  it("should reject a zero maximum length", () => {
    expect(() => loadConfig({ MWE_MAX_LENGTH: "0" })).toThrow(
      /^Invalid MWE configuration: MWE_MAX_LENGTH:/
    );
  });

  it("should put the default language first when it is not listed", () => {
    const config = loadConfig({ DEFAULT_LANGUAGE: "pt", SUPPORTED_LANGUAGES: "en" });
    expect(config.defaultLanguage).toBe("portuguese");
    expect(config.supportedLanguages).toEqual(["portuguese", "english"]);
  });

  it("should canonicalize and dedupe supported languages", () => {
    const config = loadConfig({ SUPPORTED_LANGUAGES: "pt, en , portuguese" });
    expect(config.supportedLanguages).toEqual(["portuguese", "english"]);
  });

  it("should parse the log level", () => {
    expect(loadConfig({ LOG_LEVEL: "debug" }).logLevel).toBe(LogLevel.DEBUG);
    expect(loadConfig({ LOG_LEVEL: "WARNING" }).logLevel).toBe(LogLevel.WARN);
  });
});
