import { InvalidExpressionError, UndefinedVariableError } from "../errors.ts";
import {
  type Literal,
  bool,
  compareLiterals,
  float,
  integer,
  literalEquals,
} from "./literal.ts";
import type {
  BinaryOperator,
  Comparison,
  Expression,
  UnaryOperator,
  VariableLookup,
} from "./types.ts";

/**
 * Evaluates an expression tree against an environment.
 *
 * Operand kinds must match exactly; there is no implicit conversion between
 * integers, floats and bools. Integer division by zero is not caught and
 * surfaces as the runtime's RangeError.
 */
export function evaluateExpression(
  expression: Expression,
  lookup: VariableLookup,
): Literal {
  switch (expression.kind) {
    case "literal":
      return expression.literal;
    case "reference": {
      const value = lookup.get(expression.name);
      if (value === undefined) throw new UndefinedVariableError(expression.name);
      return value;
    }
    case "operator":
      return applyOperator(
        expression.operator,
        evaluateExpression(expression.left, lookup),
        evaluateExpression(expression.right, lookup),
      );
    case "unary":
      return applyUnary(expression.operator, evaluateExpression(expression.operand, lookup));
    case "comparison":
      return applyComparison(
        expression.comparison,
        evaluateExpression(expression.left, lookup),
        expression.right,
        lookup,
      );
    case "parenthesized":
      return evaluateExpression(expression.inner, lookup);
  }
}

// ── Arithmetic ──────────────────────────────────────────────────

function applyOperator(operator: BinaryOperator, left: Literal, right: Literal): Literal {
  if (left.kind === "integer" && right.kind === "integer") {
    return integer(integerOperation(operator, left.value, right.value));
  }

  if (left.kind === "float" && right.kind === "float") {
    const result = floatOperation(operator, left.value, right.value);
    if (result !== undefined) return float(result);
  }

  if (left.kind === "bool" && right.kind === "bool") {
    if (operator === "bitwiseAnd") return bool(left.value && right.value);
    if (operator === "bitwiseOr") return bool(left.value || right.value);
  }

  throw new InvalidExpressionError(
    `Operator "${operator}" does not accept ${left.kind} and ${right.kind}`,
  );
}

function integerOperation(operator: BinaryOperator, left: bigint, right: bigint): bigint {
  switch (operator) {
    case "add":
      return left + right;
    case "subtract":
      return left - right;
    case "multiply":
      return left * right;
    case "divide":
      return left / right;
    case "bitwiseAnd":
      return left & right;
    case "bitwiseOr":
      return left | right;
  }
}

function floatOperation(operator: BinaryOperator, left: number, right: number): number | undefined {
  switch (operator) {
    case "add":
      return left + right;
    case "subtract":
      return left - right;
    case "multiply":
      return left * right;
    case "divide":
      return left / right;
    default:
      return undefined;
  }
}

function applyUnary(operator: UnaryOperator, operand: Literal): Literal {
  if (operator === "negate" && operand.kind === "integer") return integer(-operand.value);
  if (operator === "negate" && operand.kind === "float") return float(-operand.value);
  if (operator === "not" && operand.kind === "bool") return bool(!operand.value);
  if (operator === "bitwiseNot" && operand.kind === "integer") return integer(~operand.value);

  throw new InvalidExpressionError(`Operator "${operator}" does not accept ${operand.kind}`);
}

// ── Comparisons ─────────────────────────────────────────────────

/** The right operand stays unevaluated so `and`/`or` can short-circuit. */
function applyComparison(
  comparison: Comparison,
  left: Literal,
  right: Expression,
  lookup: VariableLookup,
): Literal {
  switch (comparison) {
    case "and":
      if (left.kind !== "bool") {
        throw new InvalidExpressionError(`"&&" expects a bool on the left, got ${left.kind}`);
      }
      return left.value ? evaluateExpression(right, lookup) : left;
    case "or":
      if (left.kind !== "bool") {
        throw new InvalidExpressionError(`"||" expects a bool on the left, got ${left.kind}`);
      }
      return left.value ? left : evaluateExpression(right, lookup);
    case "equal":
      return bool(literalEquals(left, evaluateExpression(right, lookup)));
    case "notEqual":
      return bool(!literalEquals(left, evaluateExpression(right, lookup)));
    case "lessThan":
      return bool(compareLiterals(left, evaluateExpression(right, lookup)) < 0);
    case "lessOrEqual":
      return bool(compareLiterals(left, evaluateExpression(right, lookup)) <= 0);
    case "greaterThan":
      return bool(compareLiterals(left, evaluateExpression(right, lookup)) > 0);
    case "greaterOrEqual":
      return bool(compareLiterals(left, evaluateExpression(right, lookup)) >= 0);
  }
}
