/**
 * Conflict Validator
 *
 * Two enabled bindings conflict when their modifier sets are equal (order,
 * case and repetition ignored) and their keys match case-insensitively.
 * Disabled bindings never conflict.
 */

import { formatHotkey, type HotkeyBinding } from "../models/hotkey-binding.ts";

export interface ConflictGroup {
  /** Normalized hotkey shared by the group, e.g. "alt+shift-j" */
  readonly signature: string;

  /** Hotkey as written by the first binding of the group */
  readonly hotkey: string;

  /** Two or more enabled bindings, in list order */
  readonly bindings: readonly HotkeyBinding[];
}

/**
 * Lowercase, deduplicate and sort modifiers
 *
 * @example
 * normalizeModifiers(["Shift", "alt", "shift"]); // ["alt", "shift"]
 */
export function normalizeModifiers(modifiers: readonly string[]): string[] {
  const normalized = modifiers.map((m) => m.trim().toLowerCase()).filter((m) => m !== "");
  return [...new Set(normalized)].sort();
}

export function hotkeySignature(modifiers: readonly string[], key: string): string {
  return `${normalizeModifiers(modifiers).join("+")}-${key.trim().toLowerCase()}`;
}

/**
 * Enabled bindings using the hotkey, other than `excludeId`
 */
export function getConflictingBindings(
  bindings: readonly HotkeyBinding[],
  modifiers: readonly string[],
  key: string,
  excludeId?: string,
): HotkeyBinding[] {
  const signature = hotkeySignature(modifiers, key);
  return bindings.filter((b) =>
    b.enabled && b.id !== excludeId && hotkeySignature(b.modifiers, b.key) === signature
  );
}

export function hasConflict(
  bindings: readonly HotkeyBinding[],
  modifiers: readonly string[],
  key: string,
  excludeId?: string,
): boolean {
  const signature = hotkeySignature(modifiers, key);
  return bindings.some((b) =>
    b.enabled && b.id !== excludeId && hotkeySignature(b.modifiers, b.key) === signature
  );
}

/**
 * Every hotkey bound more than once among enabled bindings, in order of
 * first use
 */
export function findAllConflicts(bindings: readonly HotkeyBinding[]): ConflictGroup[] {
  const groups = new Map<string, HotkeyBinding[]>();
  for (const binding of bindings) {
    if (!binding.enabled) continue;
    const signature = hotkeySignature(binding.modifiers, binding.key);
    const group = groups.get(signature);
    if (group) {
      group.push(binding);
    } else {
      groups.set(signature, [binding]);
    }
  }

  const conflicts: ConflictGroup[] = [];
  for (const [signature, members] of groups) {
    if (members.length > 1) {
      conflicts.push({ signature, hotkey: formatHotkey(members[0]), bindings: members });
    }
  }
  return conflicts;
}
