import { describe, it, expect } from "vitest";
import { computeStatistics, type ExpressionInfo } from "../src/index.js";

describe("computeStatistics", () => {
  it("should count entries by length, POS and type", () => {
    const dictionary = new Map<string, ExpressionInfo>([
      ["café da manhã", { lemma: "café da manhã", pos: "NOUN", type: "fixed" }],
      ["de acordo com", { lemma: "de acordo com", pos: "ADP", type: "fixed" }],
      ["São Paulo", { lemma: "São Paulo", pos: "PROPN", type: "flat" }],
      ["pé de moleque", { lemma: "pé-de-moleque", pos: "NOUN", type: "other" }],
    ]);

    expect(computeStatistics(dictionary)).toEqual({
      total: 4,
      lengthDistribution: { 2: 1, 3: 3 },
      posDistribution: { NOUN: 2, ADP: 1, PROPN: 1 },
      typeDistribution: { fixed: 2, flat: 1, other: 1 },
    });
  });

  it("should count surface words, not expanded contractions", () => {
    const dictionary = new Map<string, ExpressionInfo>([
      ["ao longo de", { lemma: "ao longo de", pos: "ADP", type: "fixed" }],
    ]);
    expect(computeStatistics(dictionary).lengthDistribution).toEqual({ 3: 1 });
  });

  it("should return zeros for an empty dictionary", () => {
    expect(computeStatistics(new Map())).toEqual({
      total: 0,
      lengthDistribution: {},
      posDistribution: {},
      typeDistribution: {},
    });
  });
});
