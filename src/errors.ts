import type { MatchSpan } from "./types.js";

/**
 * Raised when spans handed to the annotator overlap or are out of order.
 * The matcher never produces such spans; seeing this means a bug upstream.
 */
export class SpanOverlapError extends Error {
  readonly previous: MatchSpan;
  readonly current: MatchSpan;

  constructor(previous: MatchSpan, current: MatchSpan) {
    super(
      `Overlapping MWE spans: [${previous.start}, ${previous.end}) "${previous.record.original}" ` +
        `and [${current.start}, ${current.end}) "${current.record.original}"`
    );
    this.name = "SpanOverlapError";
    this.previous = previous;
    this.current = current;
  }
}
