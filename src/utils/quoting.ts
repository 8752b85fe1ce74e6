/**
 * Quote helpers shared by the tokenizer, the coercer and the generators.
 *
 * @module quoting
 */

/**
 * Undo `\"` and `\\` inside a double-quoted value. Other backslash pairs
 * are kept as written, as the shell does.
 */
export function unescapeDoubleQuoted(text: string): string {
  return text.replace(/\\(["\\])/g, "$1");
}

/**
 * Remove one layer of matching single or double quotes
 */
export function unquote(raw: string): string {
  if (raw.length >= 2) {
    const first = raw[0];
    const last = raw[raw.length - 1];
    if (first === "'" && last === "'") {
      return raw.substring(1, raw.length - 1);
    }
    if (first === '"' && last === '"') {
      return unescapeDoubleQuoted(raw.substring(1, raw.length - 1));
    }
  }
  return raw;
}

/**
 * Quote a value for a `key=value` property. Double quotes are preferred;
 * a value that would need escaping is single-quoted, and one that holds
 * both quote characters is double-quoted with `"` and `\` escaped.
 *
 * @example
 * quoteValue("^Finder$");                // `"^Finder$"`
 * quoteValue(`say "hi"`);                // `'say "hi"'`
 * quoteValue(`osascript -e 'say "hi"'`); // `"osascript -e 'say \"hi\"'"`
 */
export function quoteValue(value: string): string {
  if (!/"|\\(["\\]|$)/.test(value)) {
    return `"${value}"`;
  }
  if (!value.includes("'")) {
    return `'${value}'`;
  }
  return `"${value.replace(/["\\]/g, "\\$&")}"`;
}

/**
 * Cut a trailing ` # comment` that starts outside quotes
 */
export function stripTrailingComment(line: string): string {
  let quote: string | null = null;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quote) {
      if (quote === '"' && ch === "\\") i++;
      else if (ch === quote) quote = null;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === "#" && i > 0 && /\s/.test(line[i - 1])) {
      return line.substring(0, i).trimEnd();
    }
  }
  return line;
}
