export {
  type Literal,
  type LiteralKind,
  type IntegerLiteral,
  type FloatLiteral,
  type BoolLiteral,
  INT64_MIN,
  INT64_MAX,
  integer,
  float,
  bool,
  literalEquals,
  compareLiterals,
  isTruthy,
  formatLiteral,
  formatFloat,
} from "./literal.ts";
export type {
  Expression,
  BinaryOperator,
  UnaryOperator,
  Comparison,
  VariableLookup,
} from "./types.ts";
export { CharCursor } from "./cursor.ts";
export { parseExpression } from "./parser.ts";
export { evaluateExpression } from "./evaluate.ts";
