import type { Expression } from "../expression/types.ts";
import type { ShaderPath, VariableName } from "../types.ts";

export interface IncludeSegment {
  readonly kind: "include";
  readonly path: ShaderPath;
}

export interface ConditionalSegment {
  readonly kind: "conditional";
  readonly condition: Expression;
  readonly ifTrue: Segment;
  readonly ifFalse?: Segment;
}

/** Never holds two adjacent texts or a directly nested sequence. */
export interface SequenceSegment {
  readonly kind: "sequence";
  readonly segments: Segment[];
}

export interface ConstantSegment {
  readonly kind: "constant";
  readonly name: VariableName;
}

/** `text` grows in place while the tree is built. */
export interface TextSegment {
  readonly kind: "text";
  text: string;
}

export type Segment =
  | IncludeSegment
  | ConditionalSegment
  | SequenceSegment
  | ConstantSegment
  | TextSegment;

/** A finished tree. Parsed shaders hand out this view, frozen. */
export type ReadonlySegment =
  | IncludeSegment
  | ConstantSegment
  | { readonly kind: "text"; readonly text: string }
  | { readonly kind: "sequence"; readonly segments: readonly ReadonlySegment[] }
  | {
      readonly kind: "conditional";
      readonly condition: Expression;
      readonly ifTrue: ReadonlySegment;
      readonly ifFalse?: ReadonlySegment;
    };

/**
 * Why a parse of a line run stopped. `none` is never produced by the
 * parser; it is kept for callers that build segments by hand.
 */
export type SegmentEndReason = "none" | "endOfFile" | "elseSeen" | "endSeen";

export interface ParsedSegment {
  readonly segment: Segment;
  readonly endReason: SegmentEndReason;
}
