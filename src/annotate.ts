/**
 * Token annotation from matched spans.
 */

import { SpanOverlapError } from "./errors.js";
import type {
  Annotated,
  MatchSpan,
  MweAnnotation,
  MweFields,
  Token,
} from "./types.js";

/**
 * Throw `SpanOverlapError` unless spans are sorted and pairwise disjoint.
 */
export function assertDisjointSpans(spans: readonly MatchSpan[]): void {
  for (let i = 1; i < spans.length; i++) {
    if (spans[i - 1].end > spans[i].start) {
      throw new SpanOverlapError(spans[i - 1], spans[i]);
    }
  }
}

function fieldsFor(index: number, span: MatchSpan): MweFields {
  return {
    mweSpan: [span.start, span.end],
    mweLemma: span.record.lemma,
    mwePos: span.record.pos,
    mweType: span.record.type,
    mweHead: span.start,
    mwePosition: index - span.start,
  };
}

/**
 * Copy tokens, adding MWE fields to those covered by a span.
 *
 * Tokens are shallow-copied; the input array and its tokens are not
 * modified. If spans overlap, the first span containing an index wins.
 *
 * @example
 * ```ts
 * annotateTokens(tokens, [{ start: 1, end: 4, record }])[2];
 * // { text: "da", mweSpan: [1, 4], mweLemma: "café da manhã",
 * //   mwePos: "NOUN", mweType: "fixed", mweHead: 1, mwePosition: 1 }
 * ```
 */
export function annotateTokens<T extends Token>(
  tokens: readonly T[],
  spans: readonly MatchSpan[]
): Annotated<T>[] {
  return tokens.map((token, index) => {
    const span = spans.find((s) => s.start <= index && index < s.end);
    return span ? { ...token, ...fieldsFor(index, span) } : { ...token };
  });
}

/**
 * Collect one summary per matched expression from annotated tokens.
 *
 * Tokens of the same expression share an `mweSpan`; the summary is emitted
 * at the first token seen for each span.
 */
export function extractAnnotations(tokens: readonly Token[]): MweAnnotation[] {
  const annotations: MweAnnotation[] = [];
  const seen = new Set<string>();

  for (const token of tokens) {
    const { mweSpan } = token;
    if (!mweSpan) continue;

    const key = `${mweSpan[0]}:${mweSpan[1]}`;
    if (seen.has(key)) continue;
    seen.add(key);

    const members = tokens
      .filter(
        (t) =>
          t.mweSpan !== undefined &&
          t.mweSpan[0] === mweSpan[0] &&
          t.mweSpan[1] === mweSpan[1]
      )
      .map((t) => t.text);

    annotations.push({
      span: [mweSpan[0], mweSpan[1]],
      text: members.join(" "),
      lemma: token.mweLemma ?? "",
      pos: token.mwePos ?? "",
      type: token.mweType ?? "other",
      tokens: members,
    });
  }

  return annotations;
}
