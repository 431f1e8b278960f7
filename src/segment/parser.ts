/**
 * Line-oriented directive parser.
 *
 * Lines starting with `//:` carry one operation:
 *   //:include <path>
 *   //:const <name>
 *   //:if <expression> ... [//:else ...] //:end
 * Every other line is output text. Lines arrive trimmed of surrounding
 * whitespace, and blank lines never reach the parser.
 */

import {
  InvalidIfBlockError,
  LeftoverLinesError,
  UnknownOperationError,
} from "../errors.ts";
import { parseExpression } from "../expression/parser.ts";
import { DIRECTIVE_MARKER, type ShaderSource } from "../types.ts";
import { concatSegment, sequence, text } from "./concat.ts";
import { LineCursor } from "./line-cursor.ts";
import type { ParsedSegment, Segment } from "./types.ts";

/**
 * Parses lines until the input runs out or an `else`/`end` directive closes
 * the current block. Nested `if` blocks recurse.
 */
export function parseSegment(lines: LineCursor): ParsedSegment {
  let segment: Segment = sequence([]);

  for (let raw = lines.next(); raw !== undefined; raw = lines.next()) {
    const line = raw.trim();

    if (!line.startsWith(DIRECTIVE_MARKER)) {
      segment = concatSegment(segment, text(`${line}\n`));
      continue;
    }

    const { operation, parameter } = splitDirective(line.slice(DIRECTIVE_MARKER.length));

    switch (operation) {
      case "include":
        segment = concatSegment(segment, { kind: "include", path: parameter });
        break;
      case "const":
        segment = concatSegment(segment, { kind: "constant", name: parameter });
        break;
      case "if":
        segment = concatSegment(segment, parseConditional(parameter, lines));
        break;
      case "else":
        return { segment, endReason: "elseSeen" };
      case "end":
        return { segment, endReason: "endSeen" };
      default:
        throw new UnknownOperationError(operation);
    }
  }

  return { segment, endReason: "endOfFile" };
}

/**
 * Parses a whole shader body. A stray top-level `else` or `end` is
 * reported together with every line after it.
 */
export function parseShaderSource(source: ShaderSource): Segment {
  const lines = LineCursor.fromSource(source);
  const { segment, endReason } = parseSegment(lines);

  if (endReason === "elseSeen" || endReason === "endSeen") {
    lines.back();
    throw new LeftoverLinesError(lines.rest());
  }
  if (!lines.done) throw new LeftoverLinesError(lines.rest());

  return segment;
}

function parseConditional(parameter: string, lines: LineCursor): Segment {
  const condition = parseExpression(parameter);
  const body = parseSegment(lines);

  switch (body.endReason) {
    case "endSeen":
    case "endOfFile":
      return { kind: "conditional", condition, ifTrue: body.segment };
    case "elseSeen": {
      const alternative = parseSegment(lines);
      if (alternative.endReason !== "endSeen" && alternative.endReason !== "endOfFile") {
        throw new InvalidIfBlockError("An else branch must close with end");
      }
      return {
        kind: "conditional",
        condition,
        ifTrue: body.segment,
        ifFalse: alternative.segment,
      };
    }
    default:
      throw new InvalidIfBlockError();
  }
}

/** Keyword up to the first space; the rest of the line is the parameter. */
function splitDirective(directive: string): { operation: string; parameter: string } {
  const space = directive.indexOf(" ");
  if (space === -1) return { operation: directive, parameter: "" };
  return { operation: directive.slice(0, space), parameter: directive.slice(space + 1) };
}
