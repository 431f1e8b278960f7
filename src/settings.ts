/**
 * Settings files: flat JSON objects that seed the shader environment.
 *
 * Value conversion:
 *   boolean          → bool
 *   integral number  → integer (floats outside the safe integer range stay float)
 *   other number     → float
 *   string           → parsed and evaluated as an expression, e.g.
 *                      "0x10" → integer 16, "1.0" → float 1, "BIT_3" is an error
 *
 * Keys starting with `$` are metadata (`$comment`, `$schema`) and skipped.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ShaderDirectiveError } from "./errors.ts";
import { evaluateExpression } from "./expression/evaluate.ts";
import { type Literal, bool, float, integer } from "./expression/literal.ts";
import { parseExpression } from "./expression/parser.ts";
import type { VariableLookup } from "./expression/types.ts";
import type { VariableName } from "./types.ts";
import type { Environment, EnvironmentTier } from "./workspace/environment.ts";

// ── Types ────────────────────────────────────────────────────────

export type SettingValue = boolean | number | string;

export type RawSettings = Readonly<Record<string, SettingValue>>;

export type SettingsLiterals = ReadonlyMap<VariableName, Literal>;

// ── Errors ───────────────────────────────────────────────────────

export class SettingsError extends ShaderDirectiveError {
  constructor(message: string) {
    super(message);
    this.name = "SettingsError";
  }
}

// ── Parsing ──────────────────────────────────────────────────────

const settingValueSchema = z.union([z.boolean(), z.number(), z.string()]);
const settingsObjectSchema = z.record(z.string(), z.unknown());

const EMPTY_LOOKUP: VariableLookup = { get: () => undefined };

/**
 * Parse a JSON string into validated settings.
 * Throws SettingsError if JSON is invalid or not a flat object.
 */
export function parseSettingsJson(json: string): RawSettings {
  let parsed: unknown;

  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new SettingsError(`Invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  const object = settingsObjectSchema.safeParse(parsed);
  if (!object.success) {
    throw new SettingsError("Settings must be a JSON object");
  }

  const settings: Record<string, SettingValue> = {};

  for (const [key, value] of Object.entries(object.data)) {
    if (key.startsWith("$")) continue;

    const setting = settingValueSchema.safeParse(value);
    if (!setting.success) {
      const type = value === null ? "null" : Array.isArray(value) ? "array" : typeof value;
      throw new SettingsError(
        `Setting "${key}" has unsupported type "${type}". Expected boolean, number, or string.`,
      );
    }
    settings[key] = setting.data;
  }

  return settings;
}

// ── Conversion ───────────────────────────────────────────────────

export function convertSettingValue(key: string, value: SettingValue): Literal {
  if (typeof value === "boolean") return bool(value);

  if (typeof value === "number") {
    return Number.isSafeInteger(value) ? integer(value) : float(value);
  }

  try {
    return evaluateExpression(parseExpression(value), EMPTY_LOOKUP);
  } catch (err) {
    if (err instanceof ShaderDirectiveError) {
      throw new SettingsError(`Setting "${key}" is not a constant expression: ${err.message}`);
    }
    throw err;
  }
}

export function settingsToLiterals(settings: RawSettings): SettingsLiterals {
  const literals = new Map<VariableName, Literal>();

  for (const [key, value] of Object.entries(settings)) {
    if (key.startsWith("$")) continue;
    literals.set(key, convertSettingValue(key, value));
  }

  return literals;
}

/**
 * Merge user-provided settings over defaults.
 * Returns a new immutable settings object.
 */
export function mergeSettings(defaults: RawSettings, userSettings: RawSettings): RawSettings {
  return { ...defaults, ...userSettings };
}

/**
 * Writes every setting into one tier of the environment.
 * Returns the number of variables written.
 */
export function applySettings(
  environment: Environment,
  settings: RawSettings,
  tier: EnvironmentTier = "global",
): number {
  const literals = settingsToLiterals(settings);
  for (const [name, value] of literals) {
    environment.set(name, value, tier);
  }
  return literals.size;
}

/**
 * `NAME=VALUE` from the command line. A bare `NAME` means `true`;
 * VALUE follows the string conversion rules above.
 */
export function parseDefine(define: string): readonly [VariableName, Literal] {
  const equals = define.indexOf("=");
  const name = (equals === -1 ? define : define.slice(0, equals)).trim();

  if (!/^[\p{L}_][\p{L}\p{N}_]*$/u.test(name)) {
    throw new SettingsError(`Invalid define name: "${name}"`);
  }
  if (equals === -1) return [name, bool(true)];

  return [name, convertSettingValue(name, define.slice(equals + 1))];
}

// ── File Loading ─────────────────────────────────────────────────

/** Load settings from a JSON file on disk. */
export async function loadSettingsFile(path: string): Promise<RawSettings> {
  let text: string;

  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    throw new SettingsError(
      `Cannot read settings file ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  return parseSettingsJson(text);
}
