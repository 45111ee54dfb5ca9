import { describe, it, expect } from "vitest";
import {
  SpanOverlapError,
  annotateTokens,
  assertDisjointSpans,
  extractAnnotations,
  type MatchRecord,
  type MatchSpan,
} from "../src/index.js";

const breakfast: MatchRecord = {
  original: "café da manhã",
  lemma: "café da manhã",
  pos: "NOUN",
  type: "fixed",
  length: 3,
};

const please: MatchRecord = {
  original: "por favor",
  lemma: "por favor",
  pos: "ADV",
  type: "fixed",
  length: 2,
};

interface IdToken {
  id: number;
  text: string;
}

const sentence: IdToken[] = [
  { id: 1, text: "Tomei" },
  { id: 2, text: "café" },
  { id: 3, text: "da" },
  { id: 4, text: "manhã" },
];

describe("annotateTokens", () => {
  it("should mark every token of a span", () => {
    const marked = annotateTokens(sentence, [{ start: 1, end: 4, record: breakfast }]);

    expect(marked).toHaveLength(4);
    expect(marked[1]).toEqual({
      id: 2,
      text: "café",
      mweSpan: [1, 4],
      mweLemma: "café da manhã",
      mwePos: "NOUN",
      mweType: "fixed",
      mweHead: 1,
      mwePosition: 0,
    });
    expect(marked[2].mwePosition).toBe(1);
    expect(marked[3].mwePosition).toBe(2);
    expect(marked[3].mweHead).toBe(1);
    expect(marked[3].mweSpan).toEqual([1, 4]);
  });

  it("should leave tokens outside spans without MWE fields", () => {
    const marked = annotateTokens(sentence, [{ start: 1, end: 4, record: breakfast }]);
    expect(marked[0]).toEqual({ id: 1, text: "Tomei" });
    expect("mweSpan" in marked[0]).toBe(false);
  });

  it("should not modify the input tokens", () => {
    const marked = annotateTokens(sentence, [{ start: 1, end: 4, record: breakfast }]);
    expect(marked).not.toBe(sentence);
    expect(marked[0]).not.toBe(sentence[0]);
    expect(sentence[1]).toEqual({ id: 2, text: "café" });
  });

  it("should let the first containing span win", () => {
    const marked = annotateTokens(sentence, [
      { start: 1, end: 3, record: please },
      { start: 2, end: 4, record: breakfast },
    ]);
    expect(marked[2].mweLemma).toBe("por favor");
    expect(marked[3].mweLemma).toBe("café da manhã");
    expect(marked[3].mwePosition).toBe(1);
  });
});

describe("assertDisjointSpans", () => {
  it("should accept sorted disjoint spans", () => {
    expect(() =>
      assertDisjointSpans([
        { start: 0, end: 2, record: please },
        { start: 2, end: 5, record: breakfast },
      ])
    ).not.toThrow();
    expect(() => assertDisjointSpans([])).not.toThrow();
  });

  it("should throw on overlapping spans", () => {
    const spans: MatchSpan[] = [
      { start: 1, end: 3, record: please },
      { start: 2, end: 4, record: breakfast },
    ];
    expect(() => assertDisjointSpans(spans)).toThrow(SpanOverlapError);
    expect(() => assertDisjointSpans(spans)).toThrow(
      'Overlapping MWE spans: [1, 3) "por favor" and [2, 4) "café da manhã"'
    );
  });

  it("should throw on spans out of order", () => {
    expect(() =>
      assertDisjointSpans([
        { start: 3, end: 5, record: please },
        { start: 0, end: 2, record: breakfast },
      ])
    ).toThrow(SpanOverlapError);
  });
});

describe("extractAnnotations", () => {
  it("should summarize each expression once", () => {
    const tokens = annotateTokens(
      [
        { text: "Por" },
        { text: "favor" },
        { text: "tomei" },
        { text: "café" },
        { text: "da" },
        { text: "manhã" },
      ],
      [
        { start: 0, end: 2, record: please },
        { start: 3, end: 6, record: breakfast },
      ]
    );

    expect(extractAnnotations(tokens)).toEqual([
      {
        span: [0, 2],
        text: "Por favor",
        lemma: "por favor",
        pos: "ADV",
        type: "fixed",
        tokens: ["Por", "favor"],
      },
      {
        span: [3, 6],
        text: "café da manhã",
        lemma: "café da manhã",
        pos: "NOUN",
        type: "fixed",
        tokens: ["café", "da", "manhã"],
      },
    ]);
  });

  it("should return nothing for unannotated tokens", () => {
    expect(extractAnnotations([{ text: "nada" }])).toEqual([]);
  });
});
