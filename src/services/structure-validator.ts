/**
 * Structure Validator
 *
 * Walks raw config text line by line and reports what the parsers would
 * skip or drop. Runs independently of parsing and never throws.
 */

import { createDiagnostic, type Diagnostic } from "../models/diagnostic.ts";
import { isSettingKey } from "../models/directive-settings.ts";
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../models/engine-config.ts";
import { isModifier, SPECIAL_KEYS } from "../models/enums.ts";
import { formatHotkey, type HotkeyBinding } from "../models/hotkey-binding.ts";
import { stripTrailingComment } from "../utils/quoting.ts";
import { parseBindingLine } from "./binding-parser.ts";
import { hotkeySignature } from "./conflict-validator.ts";
import { directivePatterns } from "./directive-parser.ts";
import { tokenizeProperties } from "./property-tokenizer.ts";
import { coerceSetting } from "./value-coercer.ts";

export interface DirectiveValidateOptions {
  engine?: Pick<EngineConfig, "directiveProgram">;
}

// ============================================================================
// Directive text
// ============================================================================

function hasFlag(command: string, flag: string): boolean {
  return command.split(/\s+/).includes(flag);
}

function subcommand(command: string, domain: string): boolean {
  return new RegExp(`(^|\\s)-m\\s+${domain}(\\s|$)`).test(command);
}

function validateDirectiveCommand(
  command: string,
  lineNumber: number,
  text: string,
  program: string,
): Diagnostic[] {
  const patterns = directivePatterns(program);
  const diagnostics: Diagnostic[] = [];
  const error = (message: string) => diagnostics.push(createDiagnostic(lineNumber, message, text));
  const warning = (message: string) =>
    diagnostics.push(createDiagnostic(lineNumber, message, text, "warning"));

  if (!hasFlag(command, "-m")) {
    error(`Missing -m flag in ${program} command`);
    return diagnostics;
  }

  if (subcommand(command, "config")) {
    if (patterns.spaceConfig.test(command)) {
      return diagnostics;
    }
    const match = patterns.config.exec(command);
    if (!match || match[1].startsWith("-")) {
      error("Invalid config command format");
    } else {
      const key = match[1];
      const raw = match[2].trim();
      if (isSettingKey(key) && coerceSetting(key, raw) === undefined) {
        warning(`Invalid value "${raw}" for ${key}; the line is ignored`);
      }
    }
  }

  if (subcommand(command, "rule")) {
    if (!hasFlag(command, "--add") && !hasFlag(command, "--remove")) {
      error("Rule command missing --add or --remove");
    } else {
      const match = patterns.ruleAdd.exec(command);
      if (match) {
        const props = tokenizeProperties(match[1]);
        if (!props.get("app")?.raw && !props.get("title")?.raw) {
          warning("Rule --add has no app or title selector and is ignored");
        }
      }
    }
  }

  if (subcommand(command, "signal")) {
    if (!hasFlag(command, "--add") && !hasFlag(command, "--remove")) {
      error("Signal command missing --add or --remove");
    } else if (hasFlag(command, "--add")) {
      const fragment = command.substring(command.indexOf("--add") + "--add".length);
      const props = tokenizeProperties(fragment);
      if (!props.get("event")?.raw) {
        error("Signal --add missing event parameter");
      }
      if (!props.get("action")?.raw) {
        error("Signal --add missing action parameter");
      }
    }
  }

  return diagnostics;
}

/**
 * Structural diagnostics for directive text
 *
 * @example
 * validateDirectiveText("yabai -m signal --add event=window_focused");
 * // [{ line: 1, message: "Signal --add missing action parameter", ... }]
 */
export function validateDirectiveText(
  text: string,
  options: DirectiveValidateOptions = {},
): Diagnostic[] {
  const program = options.engine?.directiveProgram ?? DEFAULT_ENGINE_CONFIG.directiveProgram;
  const diagnostics: Diagnostic[] = [];

  text.split("\n").forEach((line, i) => {
    const trimmed = line.trim();
    if (trimmed === "" || trimmed.startsWith("#")) {
      return;
    }

    const command = stripTrailingComment(trimmed);
    if (command === program || command.startsWith(`${program} `)) {
      diagnostics.push(...validateDirectiveCommand(command, i + 1, trimmed, program));
    } else if (!command.startsWith("echo ") && !command.includes("=")) {
      diagnostics.push(createDiagnostic(i + 1, "Unrecognized command", trimmed));
    }
  });

  return diagnostics;
}

// ============================================================================
// Binding text
// ============================================================================

const FUNCTION_KEY = /^f([1-9]|1[0-9]|20)$/;
const KEYPAD_KEY = /^(kp_\w+|kp[0-9])$/;
const KEY_CODE = /^0x[0-9a-f]{1,2}$/;

export function isValidKey(key: string): boolean {
  const normalized = key.trim().toLowerCase();
  return /^[a-z0-9]$/.test(normalized) ||
    FUNCTION_KEY.test(normalized) ||
    SPECIAL_KEYS.has(normalized) ||
    KEYPAD_KEY.test(normalized) ||
    KEY_CODE.test(normalized);
}

/**
 * Messages for modifiers and keys the hotkey daemon does not know
 */
export function lintBinding(binding: Pick<HotkeyBinding, "modifiers" | "key">): string[] {
  const messages: string[] = [];
  for (const modifier of binding.modifiers) {
    if (!isModifier(modifier.toLowerCase())) {
      messages.push(`Unknown modifier "${modifier}"`);
    }
  }
  if (!isValidKey(binding.key)) {
    messages.push(`Unknown key "${binding.key}"`);
  }
  return messages;
}

/**
 * Structural diagnostics for binding text. Duplicate hotkeys are reported
 * on the later line.
 */
export function validateBindingText(text: string): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  const firstUse = new Map<string, number>();

  text.split("\n").forEach((line, i) => {
    const lineNumber = i + 1;
    const trimmed = line.trim();
    if (trimmed === "" || trimmed.startsWith("#") || trimmed.startsWith("::")) {
      return;
    }

    if (!trimmed.includes(":")) {
      diagnostics.push(createDiagnostic(lineNumber, 'Missing command separator ":"', trimmed));
      return;
    }

    const binding = parseBindingLine(trimmed, { id: `line_${lineNumber}` });
    if (!binding) {
      diagnostics.push(createDiagnostic(lineNumber, "Invalid shortcut format", trimmed));
      return;
    }

    for (const message of lintBinding(binding)) {
      diagnostics.push(createDiagnostic(lineNumber, message, trimmed, "warning"));
    }

    const signature = hotkeySignature(binding.modifiers, binding.key);
    const first = firstUse.get(signature);
    if (first === undefined) {
      firstUse.set(signature, lineNumber);
    } else {
      diagnostics.push(
        createDiagnostic(
          lineNumber,
          `Duplicate hotkey "${formatHotkey(binding)}" (first bound on line ${first})`,
          trimmed,
          "warning",
        ),
      );
    }
  });

  return diagnostics;
}
