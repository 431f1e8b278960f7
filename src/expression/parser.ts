/**
 * Recursive-descent parser for directive expressions.
 *
 * There is no tokenizer pass: the parser reads characters straight off a
 * CharCursor. Every binary operator takes the whole remainder of the input
 * as its right operand, so `a - b - c` parses as `a - (b - c)` and there is
 * no operator precedence. Unary operators bind to a single term.
 */

import {
  DuplicatePeriodError,
  InvalidBaseError,
  LeftoverCharsError,
  NoClosingParenthesisError,
  NoExpressionError,
  NumberFormatError,
} from "../errors.ts";
import { CharCursor } from "./cursor.ts";
import { INT64_MAX, bool, float, integer } from "./literal.ts";
import type {
  BinaryOperator,
  Comparison,
  Expression,
  UnaryOperator,
} from "./types.ts";

const DIGIT = /^[0-9]$/;
const HEX_LETTER = /^[a-f]$/;
const IDENTIFIER_START = /^[\p{L}_]$/u;
const IDENTIFIER_PART = /^[\p{L}\p{N}_]$/u;

const RADIX_PREFIXES: Readonly<Record<string, number>> = { b: 2, o: 8, x: 16 };

const UNARY_OPERATORS: Readonly<Record<string, UnaryOperator>> = {
  "!": "not",
  "~": "bitwiseNot",
  "-": "negate",
};

type BinaryToken =
  | { readonly kind: "operator"; readonly operator: BinaryOperator }
  | { readonly kind: "comparison"; readonly comparison: Comparison };

// ── Entry Point ─────────────────────────────────────────────────

/**
 * Parses a single expression. Whitespace anywhere in the source is ignored,
 * and the whole input must be consumed.
 */
export function parseExpression(source: string): Expression {
  const cursor = new CharCursor(source.replace(/\s+/g, ""));
  const expression = parseOne(cursor, false);

  if (expression === undefined) throw new NoExpressionError();
  if (!cursor.done) throw new LeftoverCharsError(cursor.rest());

  return expression;
}

// ── Terms ───────────────────────────────────────────────────────

/**
 * Parses one term and, unless `shallow`, a binary continuation.
 * Returns undefined when the input does not start an expression.
 */
function parseOne(cursor: CharCursor, shallow: boolean): Expression | undefined {
  const term = parseTerm(cursor);
  if (term === undefined || shallow) return term;

  const token = scanBinaryToken(cursor);
  if (token === undefined) return term;

  const right = requireExpression(cursor, false);

  if (token.kind === "operator") {
    return { kind: "operator", left: term, operator: token.operator, right };
  }
  return { kind: "comparison", left: term, comparison: token.comparison, right };
}

function requireExpression(cursor: CharCursor, shallow: boolean): Expression {
  const expression = parseOne(cursor, shallow);
  if (expression === undefined) throw new NoExpressionError();
  return expression;
}

function parseTerm(cursor: CharCursor): Expression | undefined {
  const ch = cursor.peek();
  if (ch === undefined) return undefined;

  const unary = UNARY_OPERATORS[ch];
  if (unary !== undefined) {
    cursor.next();
    return { kind: "unary", operator: unary, operand: requireExpression(cursor, true) };
  }

  if (ch === "(") {
    cursor.next();
    const inner = requireExpression(cursor, false);
    if (!cursor.eat(")")) throw new NoClosingParenthesisError();
    return { kind: "parenthesized", inner };
  }

  if (DIGIT.test(ch)) return parseNumber(cursor);
  if (IDENTIFIER_START.test(ch)) return parseIdentifier(cursor);

  return undefined;
}

function parseIdentifier(cursor: CharCursor): Expression {
  let name = "";

  for (let ch = cursor.peek(); ch !== undefined && IDENTIFIER_PART.test(ch); ch = cursor.peek()) {
    name += ch;
    cursor.next();
  }

  if (name === "true") return { kind: "literal", literal: bool(true) };
  if (name === "false") return { kind: "literal", literal: bool(false) };
  return { kind: "reference", name };
}

// ── Numbers ─────────────────────────────────────────────────────

/**
 * Number literal: decimal digits with `_` separators, at most one period,
 * or a `0b`/`0o`/`0x` radix prefix on a leading zero.
 */
function parseNumber(cursor: CharCursor): Expression {
  let digits = "";
  let radix = 10;
  let prefixed = false;
  let period = false;

  for (let ch = cursor.peek(); ch !== undefined; ch = cursor.peek()) {
    const lower = ch.toLowerCase();

    if (DIGIT.test(lower) || (radix === 16 && HEX_LETTER.test(lower))) {
      digits += lower;
    } else if (lower === "_") {
      // separator
    } else if (lower === ".") {
      if (period) throw new DuplicatePeriodError();
      period = true;
      digits += lower;
    } else if (lower in RADIX_PREFIXES) {
      if (digits !== "0" || prefixed) throw new InvalidBaseError(ch);
      radix = RADIX_PREFIXES[lower] ?? 10;
      prefixed = true;
      digits = "";
    } else {
      break;
    }

    cursor.next();
  }

  if (period) return { kind: "literal", literal: float(toFloat(digits, radix)) };
  return { kind: "literal", literal: integer(toInteger(digits, radix)) };
}

function toFloat(digits: string, radix: number): number {
  if (radix !== 10) {
    throw new NumberFormatError(digits, radix, "float literals must be decimal");
  }

  const value = Number(digits);
  if (Number.isNaN(value)) {
    throw new NumberFormatError(digits, radix, "invalid float literal");
  }
  return value;
}

function toInteger(digits: string, radix: number): bigint {
  if (digits.length === 0) {
    throw new NumberFormatError(digits, radix, "no digits");
  }

  let value = 0n;
  for (const ch of digits) {
    const digit = Number.parseInt(ch, 16);
    if (digit >= radix) {
      throw new NumberFormatError(digits, radix, `invalid digit "${ch}"`);
    }
    value = value * BigInt(radix) + BigInt(digit);
  }

  if (value > INT64_MAX) {
    throw new NumberFormatError(digits, radix, "number too large for a 64-bit integer");
  }
  return value;
}

// ── Binary Operators ────────────────────────────────────────────

/**
 * Reads a binary operator token on a fork, committing only when one is
 * found. A lone `!` or `=` is left in place for the caller to reject.
 */
function scanBinaryToken(cursor: CharCursor): BinaryToken | undefined {
  const ahead = cursor.fork();
  const token = readBinaryToken(ahead);
  if (token !== undefined) cursor.commit(ahead);
  return token;
}

function readBinaryToken(ahead: CharCursor): BinaryToken | undefined {
  switch (ahead.next()) {
    case "+":
      return { kind: "operator", operator: "add" };
    case "-":
      return { kind: "operator", operator: "subtract" };
    case "*":
      return { kind: "operator", operator: "multiply" };
    case "/":
      return { kind: "operator", operator: "divide" };
    case "&":
      if (ahead.eat("&")) return { kind: "comparison", comparison: "and" };
      return { kind: "operator", operator: "bitwiseAnd" };
    case "|":
      if (ahead.eat("|")) return { kind: "comparison", comparison: "or" };
      return { kind: "operator", operator: "bitwiseOr" };
    case ">":
      if (ahead.eat("=")) return { kind: "comparison", comparison: "greaterOrEqual" };
      return { kind: "comparison", comparison: "greaterThan" };
    case "<":
      if (ahead.eat("=")) return { kind: "comparison", comparison: "lessOrEqual" };
      return { kind: "comparison", comparison: "lessThan" };
    case "!":
      if (ahead.eat("=")) return { kind: "comparison", comparison: "notEqual" };
      return undefined;
    case "=":
      if (ahead.eat("=")) return { kind: "comparison", comparison: "equal" };
      return undefined;
    default:
      return undefined;
  }
}
