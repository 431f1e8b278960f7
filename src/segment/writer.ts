import { UndefinedVariableError } from "../errors.ts";
import { evaluateExpression } from "../expression/evaluate.ts";
import { formatLiteral, isTruthy } from "../expression/literal.ts";
import type { VariableLookup } from "../expression/types.ts";
import type { ShaderPath, VariableName } from "../types.ts";
import type { ReadonlySegment } from "./types.ts";

export interface IncludeResolver {
  /** Fully expanded text of the shader at `path`, nested includes resolved. */
  resolveInclude(path: ShaderPath): string;
}

export interface WriteContext extends IncludeResolver {
  readonly lookup: VariableLookup;
}

/** Appends the rendered text of `segment` to `output`. */
export function writeSegment(
  segment: ReadonlySegment,
  output: string[],
  context: WriteContext,
): void {
  switch (segment.kind) {
    case "include":
      output.push(context.resolveInclude(segment.path), "\n");
      return;
    case "conditional": {
      const branch = isTruthy(evaluateExpression(segment.condition, context.lookup))
        ? segment.ifTrue
        : segment.ifFalse;
      if (branch !== undefined) writeSegment(branch, output, context);
      return;
    }
    case "sequence":
      for (const child of segment.segments) writeSegment(child, output, context);
      return;
    case "constant":
      output.push(constantDeclaration(segment.name, context.lookup));
      return;
    case "text":
      output.push(segment.text);
      return;
  }
}

export function renderSegment(segment: ReadonlySegment, context: WriteContext): string {
  const output: string[] = [];
  writeSegment(segment, output, context);
  return output.join("");
}

function constantDeclaration(name: VariableName, lookup: VariableLookup): string {
  const value = lookup.get(name);
  if (value === undefined) throw new UndefinedVariableError(name);
  return `const ${name} = ${formatLiteral(value)};\n`;
}
