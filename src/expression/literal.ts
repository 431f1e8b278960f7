import { InvalidExpressionError } from "../errors.ts";

// ── Types ───────────────────────────────────────────────────────

export interface IntegerLiteral {
  readonly kind: "integer";
  /** Always within the signed 64-bit range. */
  readonly value: bigint;
}

export interface FloatLiteral {
  readonly kind: "float";
  readonly value: number;
}

export interface BoolLiteral {
  readonly kind: "bool";
  readonly value: boolean;
}

export type Literal = IntegerLiteral | FloatLiteral | BoolLiteral;
export type LiteralKind = Literal["kind"];

export const INT64_MIN = -(1n << 63n);
export const INT64_MAX = (1n << 63n) - 1n;

// ── Constructors ────────────────────────────────────────────────

/** Wraps to 64-bit two's complement, like native integer arithmetic. */
export function integer(value: bigint | number): IntegerLiteral {
  return { kind: "integer", value: BigInt.asIntN(64, BigInt(value)) };
}

export function float(value: number): FloatLiteral {
  return { kind: "float", value };
}

export function bool(value: boolean): BoolLiteral {
  return { kind: "bool", value };
}

// ── Comparison ──────────────────────────────────────────────────

/** Literals of different kinds are never equal. */
export function literalEquals(a: Literal, b: Literal): boolean {
  if (a.kind !== b.kind) return false;
  return a.value === b.value;
}

/**
 * Orders two literals of the same kind; `false < true` for bools.
 * Returns NaN when either float is NaN, so every ordering test fails.
 */
export function compareLiterals(a: Literal, b: Literal): number {
  if (a.kind === "integer" && b.kind === "integer") {
    if (a.value === b.value) return 0;
    return a.value < b.value ? -1 : 1;
  }

  if (a.kind === "float" && b.kind === "float") {
    if (Number.isNaN(a.value) || Number.isNaN(b.value)) return NaN;
    if (a.value === b.value) return 0;
    return a.value < b.value ? -1 : 1;
  }

  if (a.kind === "bool" && b.kind === "bool") {
    return Number(a.value) - Number(b.value);
  }

  throw new InvalidExpressionError(`Cannot order ${a.kind} against ${b.kind}`);
}

export function isTruthy(literal: Literal): boolean {
  switch (literal.kind) {
    case "integer":
      return literal.value !== 0n;
    case "float":
      return literal.value !== 0;
    case "bool":
      return literal.value;
  }
}

// ── Formatting ──────────────────────────────────────────────────

export function formatLiteral(literal: Literal): string {
  switch (literal.kind) {
    case "integer":
      return literal.value.toString();
    case "float":
      return formatFloat(literal.value);
    case "bool":
      return literal.value ? "true" : "false";
  }
}

/**
 * Shortest round-trip decimal, never in exponent notation:
 * 1.0 -> "1", 1e21 -> "1000000000000000000000", 1e-7 -> "0.0000001".
 */
export function formatFloat(value: number): string {
  if (Number.isNaN(value)) return "NaN";
  if (value === Infinity) return "inf";
  if (value === -Infinity) return "-inf";
  if (Object.is(value, -0)) return "-0";

  const text = String(value);
  const match = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (match === null) return text;

  const sign = match[1] ?? "";
  const digits = (match[2] ?? "") + (match[3] ?? "");
  const point = 1 + Number(match[4]);

  if (point >= digits.length) {
    return sign + digits + "0".repeat(point - digits.length);
  }
  if (point <= 0) {
    return `${sign}0.${"0".repeat(-point)}${digits}`;
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}
