/**
 * Binding Parser
 *
 * Grammar of one binding line:
 *
 *   [modifier (' + ' modifier)*] ' - ' key ' : ' action
 *
 * The hotkey and the action are split at the first " : " and the modifiers
 * and the key at the last " - " of the hotkey, since actions often contain
 * both characters. Comments carry context: `# === Name ===` sets the
 * category of the bindings that follow, other comments describe the next
 * binding, and `# [DISABLED] <binding>` is an inactive binding.
 */

import { DISABLED_MARKER } from "../constants.ts";
import type { BindingConfig } from "../models/binding-config.ts";
import { type HotkeyCategory, parseHotkeyCategory } from "../models/enums.ts";
import { generateBindingId, type HotkeyBinding } from "../models/hotkey-binding.ts";
import { classifyHotkeyAction } from "./category-classifier.ts";
import { getLogger } from "./logger.ts";

export interface BindingLineOptions {
  id?: string;
  description?: string;
  category?: HotkeyCategory;
  enabled?: boolean;
}

export interface HotkeyParts {
  readonly modifiers: string[];
  readonly key: string;
}

const CATEGORY_MARKER = /^#\s*===\s*(.+?)\s*===\s*$/;
const DISABLED_PREFIX = `# ${DISABLED_MARKER}`;

/**
 * Split "<hotkey> : <action>" at the first " : ", falling back to the first
 * colon for compact lines
 */
export function splitBindingLine(line: string): { hotkey: string; action: string } | null {
  let index = line.indexOf(" : ");
  let width = 3;
  if (index === -1) {
    index = line.indexOf(":");
    width = 1;
  }
  if (index === -1) {
    return null;
  }
  return {
    hotkey: line.substring(0, index).trim(),
    action: line.substring(index + width).trim(),
  };
}

/**
 * Decompose a hotkey into lowercased modifiers and its key. Accepts
 * "shift + alt - j", the compact "alt-j" and a bare key.
 */
export function parseHotkey(hotkey: string): HotkeyParts | null {
  const text = hotkey.trim();
  let modPart = "";
  let key = text;

  const spaced = text.lastIndexOf(" - ");
  if (spaced !== -1) {
    modPart = text.substring(0, spaced);
    key = text.substring(spaced + 3).trim();
  } else {
    const compact = text.lastIndexOf("-");
    if (compact > 0 && compact < text.length - 1) {
      modPart = text.substring(0, compact);
      key = text.substring(compact + 1).trim();
    }
  }

  if (!/^\S+$/.test(key)) {
    return null;
  }

  const modifiers = modPart
    .split("+")
    .map((m) => m.trim().toLowerCase())
    .filter((m) => m !== "");
  if (modifiers.some((m) => /\s/.test(m))) {
    return null;
  }

  return { modifiers, key };
}

/**
 * Parse one binding line. Returns null for comments, blank lines, mode
 * declarations and lines outside the grammar.
 *
 * @example
 * parseBindingLine("shift + alt - j : yabai -m window --swap south");
 * // { modifiers: ["shift", "alt"], key: "j", action: "yabai -m window --swap south", ... }
 */
export function parseBindingLine(
  line: string,
  options: BindingLineOptions = {},
): HotkeyBinding | null {
  const trimmed = line.trim();
  if (trimmed === "" || trimmed.startsWith("#") || trimmed.startsWith("::")) {
    return null;
  }

  const split = splitBindingLine(trimmed);
  if (!split || split.hotkey === "" || split.action === "") {
    return null;
  }

  const hotkey = parseHotkey(split.hotkey);
  if (!hotkey) {
    return null;
  }

  return {
    id: options.id ?? generateBindingId(),
    modifiers: hotkey.modifiers,
    key: hotkey.key,
    action: split.action,
    ...(options.category !== undefined ? { category: options.category } : {}),
    ...(options.description ? { description: options.description } : {}),
    enabled: options.enabled ?? true,
  };
}

// ============================================================================
// Whole file
// ============================================================================

interface ParseState {
  readonly bindings: readonly HotkeyBinding[];
  readonly category: HotkeyCategory | undefined;
  readonly pendingDescription: string | undefined;
}

function appendBinding(
  state: ParseState,
  line: string,
  enabled: boolean,
): ParseState | undefined {
  const binding = parseBindingLine(line, {
    id: `binding_${state.bindings.length}`,
    description: state.pendingDescription,
    enabled,
  });
  if (!binding) {
    return undefined;
  }
  const category = state.category ?? classifyHotkeyAction(binding.action);
  return {
    ...state,
    bindings: [...state.bindings, { ...binding, category }],
    pendingDescription: undefined,
  };
}

function step(state: ParseState, line: string): ParseState {
  const trimmed = line.trim();

  const marker = CATEGORY_MARKER.exec(trimmed);
  if (marker) {
    // Names outside the closed set clear the context
    return { ...state, category: parseHotkeyCategory(marker[1]), pendingDescription: undefined };
  }

  if (trimmed.startsWith(DISABLED_PREFIX)) {
    const next = appendBinding(state, trimmed.substring(DISABLED_PREFIX.length), false);
    if (next) {
      return next;
    }
  }

  if (trimmed.startsWith("#")) {
    return { ...state, pendingDescription: trimmed.substring(1).trim() || undefined };
  }

  return appendBinding(state, trimmed, true) ?? { ...state, pendingDescription: undefined };
}

/**
 * Parse binding text. Bindings outside a known category section are
 * classified from their action.
 */
export function parseBindingConfig(text: string): BindingConfig {
  const initial: ParseState = {
    bindings: [],
    category: undefined,
    pendingDescription: undefined,
  };
  const { bindings } = text.split("\n").reduce(step, initial);

  getLogger().parseComplete("binding", {
    bindings: bindings.length,
    disabled: bindings.filter((b) => !b.enabled).length,
  });

  return { bindings };
}
