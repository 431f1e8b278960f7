import type { VariableName } from "../types.ts";
import type { Literal } from "./literal.ts";

export type BinaryOperator =
  | "add"
  | "subtract"
  | "multiply"
  | "divide"
  | "bitwiseAnd"
  | "bitwiseOr";

export type UnaryOperator = "negate" | "not" | "bitwiseNot";

export type Comparison =
  | "equal"
  | "notEqual"
  | "lessThan"
  | "lessOrEqual"
  | "greaterThan"
  | "greaterOrEqual"
  | "and"
  | "or";

export interface LiteralExpression {
  readonly kind: "literal";
  readonly literal: Literal;
}

export interface ReferenceExpression {
  readonly kind: "reference";
  readonly name: VariableName;
}

export interface OperatorExpression {
  readonly kind: "operator";
  readonly left: Expression;
  readonly operator: BinaryOperator;
  readonly right: Expression;
}

export interface UnaryExpression {
  readonly kind: "unary";
  readonly operator: UnaryOperator;
  readonly operand: Expression;
}

export interface ComparisonExpression {
  readonly kind: "comparison";
  readonly left: Expression;
  readonly comparison: Comparison;
  readonly right: Expression;
}

export interface ParenthesizedExpression {
  readonly kind: "parenthesized";
  readonly inner: Expression;
}

export type Expression =
  | LiteralExpression
  | ReferenceExpression
  | OperatorExpression
  | UnaryExpression
  | ComparisonExpression
  | ParenthesizedExpression;

/** Read side of the environment, as seen by evaluation. */
export interface VariableLookup {
  get(name: VariableName): Literal | undefined;
}
