/**
 * Binding-side aggregate: the ordered list of hotkey bindings of one binding
 * file. Edits return a new aggregate.
 *
 * @module binding-config
 */

import { z } from "zod";
import { type HotkeyCategory, HotkeyCategorySchema } from "./enums.ts";
import { type HotkeyBinding, HotkeyBindingSchema } from "./hotkey-binding.ts";
import { ErrorType, StructuredError } from "./structured-error.ts";

export const BindingConfigSchema = z
  .object({
    bindings: z.array(HotkeyBindingSchema).default([]),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.bindings.forEach((binding, i) => {
      if (seen.has(binding.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["bindings", i, "id"],
          message: `Duplicate binding id ${binding.id}`,
        });
      }
      seen.add(binding.id);
    });
  });

export interface BindingConfig {
  /** Identifiers are unique within the list */
  readonly bindings: readonly HotkeyBinding[];
}

export function createBindingConfig(bindings: readonly HotkeyBinding[] = []): BindingConfig {
  return { bindings };
}

/**
 * Append a binding.
 * @throws {StructuredError} DUPLICATE_ID when the id is already in use
 */
export function addBinding(config: BindingConfig, binding: HotkeyBinding): BindingConfig {
  if (config.bindings.some((b) => b.id === binding.id)) {
    throw new StructuredError(
      ErrorType.DUPLICATE_ID,
      "Binding Config",
      `Binding id "${binding.id}" is already in use`,
      [
        "Create the binding with generateBindingId()",
        "Use updateBinding() to replace an existing binding",
      ],
      { id: binding.id },
    );
  }
  return { bindings: [...config.bindings, binding] };
}

export function updateBinding(config: BindingConfig, binding: HotkeyBinding): BindingConfig {
  return { bindings: config.bindings.map((b) => (b.id === binding.id ? binding : b)) };
}

export function removeBinding(config: BindingConfig, id: string): BindingConfig {
  return { bindings: config.bindings.filter((b) => b.id !== id) };
}

export function toggleBinding(config: BindingConfig, id: string): BindingConfig {
  return {
    bindings: config.bindings.map((b) => (b.id === id ? { ...b, enabled: !b.enabled } : b)),
  };
}

export function findBinding(config: BindingConfig, id: string): HotkeyBinding | undefined {
  return config.bindings.find((b) => b.id === id);
}

/**
 * Bindings with the given category; `undefined` selects uncategorized ones
 */
export function bindingsByCategory(
  config: BindingConfig,
  category: HotkeyCategory | undefined,
): HotkeyBinding[] {
  return config.bindings.filter((b) => b.category === category);
}

/**
 * Categories present, in canonical order, uncategorized last
 */
export function categoriesInUse(config: BindingConfig): Array<HotkeyCategory | undefined> {
  const used = new Set(config.bindings.map((b) => b.category));
  const ordered: Array<HotkeyCategory | undefined> = HotkeyCategorySchema.options.filter((c) =>
    used.has(c)
  );
  if (used.has(undefined)) {
    ordered.push(undefined);
  }
  return ordered;
}

export function enabledCount(config: BindingConfig): number {
  return config.bindings.filter((b) => b.enabled).length;
}

export function disabledCount(config: BindingConfig): number {
  return config.bindings.filter((b) => !b.enabled).length;
}
