/**
 * Value Coercer
 *
 * Turns raw directive tokens into scalars, and scalars into the declared
 * type of a setting. Typed readers return undefined when a value does not
 * fit, and the caller falls back to the default.
 */

import type { z } from "zod";
import {
  type DirectiveSettingKey,
  type DirectiveSettingValue,
  SETTING_KINDS,
} from "../models/directive-settings.ts";
import { quoteValue, unquote } from "../utils/quoting.ts";

export type ScalarValue = boolean | number | string;

const TRUE_LITERALS = new Set(["on", "yes", "true"]);
const FALSE_LITERALS = new Set(["off", "no", "false"]);
const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.\d*|\.\d+|\d+)([eE][+-]?\d+)?$/;

export interface CoerceOptions {
  /** The token came from a quoted value; quoted tokens stay strings */
  quoted?: boolean;
}

/**
 * Coerce a raw token in fixed priority: boolean literal, integer, float,
 * string with one layer of matching quotes removed, raw text.
 *
 * @example
 * coerceValue("off");                    // false
 * coerceValue("2");                      // 2
 * coerceValue("2", { quoted: true });    // "2"
 */
export function coerceValue(raw: string, options: CoerceOptions = {}): ScalarValue {
  if (options.quoted) {
    return raw;
  }
  if (TRUE_LITERALS.has(raw)) return true;
  if (FALSE_LITERALS.has(raw)) return false;
  if (INTEGER_PATTERN.test(raw)) return Number.parseInt(raw, 10);
  if (FLOAT_PATTERN.test(raw)) return Number(raw);
  return unquote(raw);
}

// ============================================================================
// Typed readers
// ============================================================================

/**
 * Booleans pass through; the boolean literal set is accepted in any case
 */
export function asBoolean(value: ScalarValue | undefined): boolean | undefined {
  if (typeof value === "boolean") return value;
  if (typeof value === "string") {
    const lower = value.toLowerCase();
    if (TRUE_LITERALS.has(lower)) return true;
    if (FALSE_LITERALS.has(lower)) return false;
  }
  return undefined;
}

/**
 * Integral numbers pass through and integer strings are parsed; `6.5` and
 * `"6.5"` are rejected
 */
export function asInteger(value: ScalarValue | undefined): number | undefined {
  if (typeof value === "number") return Number.isInteger(value) ? value : undefined;
  if (typeof value === "string" && INTEGER_PATTERN.test(value.trim())) {
    return Number.parseInt(value, 10);
  }
  return undefined;
}

export function asFloat(value: ScalarValue | undefined): number | undefined {
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value === "string" && FLOAT_PATTERN.test(value.trim())) {
    return Number(value);
  }
  return undefined;
}

/**
 * Booleans render as on/off
 */
export function asString(value: ScalarValue | undefined): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value === "boolean") return value ? "on" : "off";
  return String(value);
}

export function asEnum<T extends [string, ...string[]]>(
  schema: z.ZodEnum<T>,
  value: ScalarValue | undefined,
): T[number] | undefined {
  const result = schema.safeParse(asString(value));
  return result.success ? result.data : undefined;
}

// ============================================================================
// Settings
// ============================================================================

/**
 * Map a raw `config <key> <value>` value onto the key's declared kind.
 * Returns undefined when the value does not fit.
 */
export function coerceSetting(
  key: DirectiveSettingKey,
  raw: string,
): DirectiveSettingValue | undefined {
  const kind = SETTING_KINDS[key];
  switch (kind.type) {
    case "bool":
      return asBoolean(coerceValue(raw));
    case "int":
      return asInteger(coerceValue(raw));
    case "float":
      return asFloat(coerceValue(raw));
    case "string": {
      const value = unquote(raw);
      return value === "" ? undefined : value;
    }
    case "enum": {
      const value = unquote(raw);
      return kind.values.includes(value) ? value : undefined;
    }
  }
}

/**
 * Floats keep one decimal place when integral: 1 -> "1.0"
 */
export function formatFloat(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

/**
 * Render a setting value as directive text
 */
export function formatSettingValue(
  key: DirectiveSettingKey,
  value: DirectiveSettingValue,
): string {
  if (typeof value === "boolean") {
    return value ? "on" : "off";
  }
  if (typeof value === "number") {
    return SETTING_KINDS[key].type === "float" ? formatFloat(value) : String(value);
  }
  return /\s/.test(value) ? quoteValue(value) : value;
}
