/**
 * Binding Presets
 *
 * Ready-made binding sets read from data/presets.json. The file is loaded
 * and validated once per process.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { type BindingConfig, createBindingConfig } from "../models/binding-config.ts";
import { HotkeyCategorySchema } from "../models/enums.ts";
import { createHotkeyBinding, type HotkeyBinding } from "../models/hotkey-binding.ts";
import { ErrorType, formatZodIssues, StructuredError } from "../models/structured-error.ts";
import { hotkeySignature } from "./conflict-validator.ts";

const PresetBindingSchema = z.object({
  modifiers: z.array(z.string().min(1)),
  key: z.string().regex(/^\S+$/),
  action: z.string().min(1),
  category: HotkeyCategorySchema.optional(),
  description: z.string().min(1).optional(),
});

export const PresetSchema = z.object({
  name: z.string().regex(/^[a-z0-9-]+$/),
  display_name: z.string().min(1),
  description: z.string(),
  bindings: z.array(PresetBindingSchema).min(1),
});

const PresetFileSchema = z.object({
  presets: z.array(PresetSchema),
});

export type Preset = z.infer<typeof PresetSchema>;

export interface PresetSummary {
  name: string;
  display_name: string;
  description: string;
  count: number;
}

const PRESETS_URL = new URL("../data/presets.json", import.meta.url);

let presetCache: Map<string, Preset> | null = null;

function loadPresetFile(): Map<string, Preset> {
  if (presetCache !== null) {
    return presetCache;
  }

  const content = readFileSync(PRESETS_URL, "utf-8");
  const result = PresetFileSchema.safeParse(JSON.parse(content));
  if (!result.success) {
    throw new StructuredError(
      ErrorType.SCHEMA_MISMATCH,
      "Preset Loader",
      "Preset data does not match the expected shape",
      ["Fix the fields listed under issues in presets.json"],
      { path: PRESETS_URL.pathname, issues: formatZodIssues(result.error) },
    );
  }

  presetCache = new Map(result.data.presets.map((preset) => [preset.name, preset]));
  return presetCache;
}

export function listPresets(): PresetSummary[] {
  return [...loadPresetFile().values()].map((preset) => ({
    name: preset.name,
    display_name: preset.display_name,
    description: preset.description,
    count: preset.bindings.length,
  }));
}

export function getPreset(name: string): Preset | undefined {
  return loadPresetFile().get(name);
}

/**
 * Bindings of a preset, each with a fresh id
 * @throws {StructuredError} PRESET_NOT_FOUND
 */
export function loadPreset(name: string): HotkeyBinding[] {
  const preset = getPreset(name);
  if (!preset) {
    const available = [...loadPresetFile().keys()];
    throw new StructuredError(
      ErrorType.PRESET_NOT_FOUND,
      "Preset Loader",
      `Unknown preset "${name}"`,
      [`Use one of: ${available.join(", ")}`, "Run the presets command to list them"],
      { name, available },
    );
  }
  return preset.bindings.map((binding) => createHotkeyBinding(binding));
}

/**
 * Append the preset's bindings whose hotkey is not already bound. Existing
 * bindings are never replaced.
 */
export function mergePreset(config: BindingConfig, name: string): BindingConfig {
  const used = new Set(config.bindings.map((b) => hotkeySignature(b.modifiers, b.key)));
  const added: HotkeyBinding[] = [];
  for (const binding of loadPreset(name)) {
    const signature = hotkeySignature(binding.modifiers, binding.key);
    if (!used.has(signature)) {
      used.add(signature);
      added.push(binding);
    }
  }
  return createBindingConfig([...config.bindings, ...added]);
}
