/**
 * Incremental flattening of segment trees.
 *
 * Appending one segment at a time would otherwise nest every new piece one
 * level deeper. Here adjacent texts are merged into a single string and
 * sequences are spliced into each other, so a shader body stays a single
 * flat sequence no matter how many lines it has.
 */

import type { Segment, SequenceSegment } from "./types.ts";

export function text(value: string): Segment {
  return { kind: "text", text: value };
}

export function sequence(segments: Segment[]): SequenceSegment {
  return { kind: "sequence", segments };
}

/** Both texts, or either side already a sequence. */
export function canConcatFast(left: Segment, right: Segment): boolean {
  return (
    left.kind === "sequence" ||
    right.kind === "sequence" ||
    (left.kind === "text" && right.kind === "text")
  );
}

/**
 * Returns the segment for "`left` followed by `right`". `left` is updated
 * in place when it is a text or a sequence, and `right` is reused when it
 * is a sequence; neither should be used afterwards except through the
 * returned segment.
 */
export function concatSegment(left: Segment, right: Segment): Segment {
  if (left.kind === "sequence") {
    appendToSequence(left, right);
    return left;
  }

  if (left.kind === "text" && right.kind === "text") {
    left.text += right.text;
    return left;
  }

  if (right.kind === "sequence") {
    right.segments.unshift(left);
    return right;
  }

  return sequence([left, right]);
}

function appendToSequence(target: SequenceSegment, segment: Segment): void {
  if (segment.kind === "sequence") {
    for (const child of segment.segments) appendToSequence(target, child);
    return;
  }

  const lastIndex = target.segments.length - 1;
  const last = target.segments[lastIndex];

  if (last !== undefined && canConcatFast(last, segment)) {
    target.segments[lastIndex] = concatSegment(last, segment);
    return;
  }

  target.segments.push(segment);
}
