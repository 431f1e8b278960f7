export type {
  Segment,
  IncludeSegment,
  ConditionalSegment,
  SequenceSegment,
  ConstantSegment,
  TextSegment,
  ReadonlySegment,
  SegmentEndReason,
  ParsedSegment,
} from "./types.ts";
export { LineCursor } from "./line-cursor.ts";
export { parseSegment, parseShaderSource } from "./parser.ts";
export { concatSegment, canConcatFast, text, sequence } from "./concat.ts";
export {
  writeSegment,
  renderSegment,
  type IncludeResolver,
  type WriteContext,
} from "./writer.ts";
