/**
 * Property Tokenizer
 *
 * Splits `key=value key2="quoted value"` fragments into an ordered mapping.
 * Keys are case-sensitive, keep the position of their first occurrence and
 * take the value of their last one.
 */

import { unescapeDoubleQuoted } from "../utils/quoting.ts";
import { coerceValue, type ScalarValue } from "./value-coercer.ts";

export { quoteValue, stripTrailingComment, unquote } from "../utils/quoting.ts";

export interface PropertyToken {
  /** Value text without surrounding quotes */
  readonly raw: string;

  /** Whether the value was quoted in the source */
  readonly quoted: boolean;
}

const PROPERTY_PATTERN = /(\w+)=(?:"((?:[^"\\]|\\.)*)"|'([^']*)'|(\S+))/g;

/**
 * @example
 * tokenizeProperties('app="Finder App" manage=off');
 * // Map { "app" => { raw: "Finder App", quoted: true },
 * //       "manage" => { raw: "off", quoted: false } }
 */
export function tokenizeProperties(fragment: string): Map<string, PropertyToken> {
  const tokens = new Map<string, PropertyToken>();

  for (const match of fragment.matchAll(PROPERTY_PATTERN)) {
    const [, key, doubleQuoted, singleQuoted, bare] = match;
    if (doubleQuoted !== undefined) {
      tokens.set(key, { raw: unescapeDoubleQuoted(doubleQuoted), quoted: true });
    } else if (singleQuoted !== undefined) {
      tokens.set(key, { raw: singleQuoted, quoted: true });
    } else {
      tokens.set(key, { raw: bare ?? "", quoted: false });
    }
  }

  return tokens;
}

/**
 * Tokenize and coerce every value
 *
 * @example
 * parseProperties('app="Finder App" manage=off');
 * // Map { "app" => "Finder App", "manage" => false }
 */
export function parseProperties(fragment: string): Map<string, ScalarValue> {
  const values = new Map<string, ScalarValue>();
  for (const [key, token] of tokenizeProperties(fragment)) {
    values.set(key, coerceValue(token.raw, { quoted: token.quoted }));
  }
  return values;
}
