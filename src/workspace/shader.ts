import { parseShaderSource } from "../segment/parser.ts";
import type { ReadonlySegment, Segment } from "../segment/types.ts";
import { type WriteContext, renderSegment } from "../segment/writer.ts";
import type { ShaderSource } from "../types.ts";

/** A parsed shader. The segment tree is frozen once parsing finishes. */
export class Shader {
  readonly segment: ReadonlySegment;
  /** Length of the source text, a rough size for the rendered output. */
  readonly sizeHint: number;

  private constructor(segment: ReadonlySegment, sizeHint: number) {
    this.segment = segment;
    this.sizeHint = sizeHint;
  }

  static parse(source: ShaderSource): Shader {
    return new Shader(freezeSegment(parseShaderSource(source)), source.length);
  }

  render(context: WriteContext): string {
    return renderSegment(this.segment, context);
  }
}

function freezeSegment(segment: Segment): ReadonlySegment {
  switch (segment.kind) {
    case "sequence":
      for (const child of segment.segments) freezeSegment(child);
      Object.freeze(segment.segments);
      break;
    case "conditional":
      freezeSegment(segment.ifTrue);
      if (segment.ifFalse !== undefined) freezeSegment(segment.ifFalse);
      break;
  }
  return Object.freeze(segment);
}
