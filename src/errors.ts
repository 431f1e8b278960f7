export class ShaderDirectiveError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ShaderDirectiveError";
  }
}

// ── Parsing ─────────────────────────────────────────────────────

export class ParseError extends ShaderDirectiveError {
  constructor(message: string) {
    super(message);
    this.name = "ParseError";
  }
}

export class UnknownOperationError extends ParseError {
  readonly operation: string;

  constructor(operation: string) {
    super(`Unknown directive operation: "${operation}"`);
    this.name = "UnknownOperationError";
    this.operation = operation;
  }
}

export class InvalidIfBlockError extends ParseError {
  constructor(message = "Malformed if/else/end block") {
    super(message);
    this.name = "InvalidIfBlockError";
  }
}

export class NoExpressionError extends ParseError {
  constructor() {
    super("Expected an expression");
    this.name = "NoExpressionError";
  }
}

export class NoClosingParenthesisError extends ParseError {
  constructor() {
    super("Missing closing parenthesis");
    this.name = "NoClosingParenthesisError";
  }
}

export class DuplicatePeriodError extends ParseError {
  constructor() {
    super("Number literal contains more than one period");
    this.name = "DuplicatePeriodError";
  }
}

export class InvalidBaseError extends ParseError {
  constructor(prefix: string) {
    super(`Invalid radix prefix "${prefix}" in number literal`);
    this.name = "InvalidBaseError";
  }
}

export class NumberFormatError extends ParseError {
  readonly text: string;
  readonly radix: number;

  constructor(text: string, radix: number, reason: string) {
    super(`Cannot convert "${text}" (base ${radix}): ${reason}`);
    this.name = "NumberFormatError";
    this.text = text;
    this.radix = radix;
  }
}

export class LeftoverCharsError extends ParseError {
  readonly leftover: string;

  constructor(leftover: string) {
    super(`Unexpected characters after expression: "${leftover}"`);
    this.name = "LeftoverCharsError";
    this.leftover = leftover;
  }
}

export class LeftoverLinesError extends ParseError {
  readonly lines: readonly string[];

  constructor(lines: readonly string[]) {
    super(`Unexpected lines after shader body:\n${lines.join("\n")}`);
    this.name = "LeftoverLinesError";
    this.lines = lines;
  }
}

// ── Evaluation ──────────────────────────────────────────────────

export class EvaluationError extends ShaderDirectiveError {
  constructor(message: string) {
    super(message);
    this.name = "EvaluationError";
  }
}

export class UndefinedVariableError extends EvaluationError {
  readonly variable: string;

  constructor(variable: string) {
    super(`Undefined variable: ${variable}`);
    this.name = "UndefinedVariableError";
    this.variable = variable;
  }
}

export class InvalidExpressionError extends EvaluationError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidExpressionError";
  }
}

// ── Workspace ───────────────────────────────────────────────────

export class WorkspaceError extends ShaderDirectiveError {
  constructor(message: string) {
    super(message);
    this.name = "WorkspaceError";
  }
}

export class ShaderNotFoundError extends WorkspaceError {
  readonly path: string;

  constructor(path: string) {
    super(`Shader not found: ${path}`);
    this.name = "ShaderNotFoundError";
    this.path = path;
  }
}

export class CircularIncludeError extends WorkspaceError {
  readonly chain: readonly string[];

  constructor(chain: readonly string[]) {
    super(`Circular include: ${chain.join(" -> ")}`);
    this.name = "CircularIncludeError";
    this.chain = chain;
  }
}
