/**
 * Hotkey binding model.
 *
 * One `modifiers - key : action` line of the binding config. Modifier order
 * is kept for display; equality of hotkeys ignores it (see
 * conflict-validator).
 *
 * @module hotkey-binding
 */

import { z } from "zod";
import {
  HotkeyCategorySchema,
  isModifier,
  KEY_SYMBOLS,
  MODIFIER_SYMBOLS,
} from "./enums.ts";
import { generateId } from "../utils/ids.ts";

export const HotkeyBindingSchema = z.object({
  id: z.string().min(1, "Binding id must be non-empty"),
  modifiers: z.array(z.string().min(1)).default([]),
  key: z.string().regex(/^\S+$/, "Key must be a single token"),
  action: z.string().min(1, "Binding action is required"),
  category: HotkeyCategorySchema.optional(),
  description: z.string().min(1).optional(),
  enabled: z.boolean().default(true),
});

export type HotkeyBinding = Readonly<z.output<typeof HotkeyBindingSchema>>;
export type HotkeyBindingInput = z.input<typeof HotkeyBindingSchema>;

/**
 * Generate a binding identifier.
 * Format: binding_<timestamp>_<random>
 */
export function generateBindingId(): string {
  return generateId("binding");
}

export function createHotkeyBinding(
  fields: Omit<HotkeyBindingInput, "id"> & { id?: string },
): HotkeyBinding {
  return HotkeyBindingSchema.parse({ ...fields, id: fields.id ?? generateBindingId() });
}

/**
 * Hotkey in binding-text form: "shift + alt - j", or the bare key
 */
export function formatHotkey(binding: Pick<HotkeyBinding, "modifiers" | "key">): string {
  return binding.modifiers.length === 0
    ? binding.key
    : `${binding.modifiers.join(" + ")} - ${binding.key}`;
}

/**
 * Full binding line: "<hotkey> : <action>"
 */
export function formatBindingLine(binding: HotkeyBinding): string {
  return `${formatHotkey(binding)} : ${binding.action}`;
}

/**
 * Symbolic form for display, e.g. "⇧⌥J"
 */
export function hotkeyDisplay(binding: Pick<HotkeyBinding, "modifiers" | "key">): string {
  const mods = binding.modifiers
    .map((m) => {
      const lower = m.toLowerCase();
      return isModifier(lower) ? MODIFIER_SYMBOLS[lower] : m;
    })
    .join("");
  const key = KEY_SYMBOLS[binding.key.toLowerCase()] ?? binding.key.toUpperCase();
  return `${mods}${key}`;
}
