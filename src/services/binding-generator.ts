/**
 * Binding Generator
 *
 * Renders a BindingConfig as canonical binding text: a header, then one
 * section per category in the order focus, move, resize, layout, space,
 * display, custom, uncategorized. Bindings keep their relative order inside
 * a section.
 */

import { BINDING_TEXT, DISABLED_MARKER, GENERATED_BY_PREFIX } from "../constants.ts";
import {
  type BindingConfig,
  bindingsByCategory,
  categoriesInUse,
} from "../models/binding-config.ts";
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../models/engine-config.ts";
import { HOTKEY_CATEGORY_INFO, type HotkeyCategory } from "../models/enums.ts";
import { formatBindingLine, type HotkeyBinding } from "../models/hotkey-binding.ts";

export interface BindingGenerateOptions {
  engine?: Partial<Pick<EngineConfig, "bindingProgram" | "generatorLabel">>;
}

export function categoryHeader(category: HotkeyCategory | undefined): string {
  const name = category === undefined
    ? BINDING_TEXT.UNCATEGORIZED
    : HOTKEY_CATEGORY_INFO[category].displayName;
  return `# === ${name} ===`;
}

/**
 * Lines for one binding: its description comment, then the binding, commented
 * out when disabled
 */
export function bindingLines(binding: HotkeyBinding): string[] {
  const lines: string[] = [];
  if (binding.description) {
    lines.push(`# ${binding.description.replace(/\s*\n\s*/g, " ")}`);
  }
  const line = formatBindingLine(binding);
  lines.push(binding.enabled ? line : `# ${DISABLED_MARKER} ${line}`);
  return lines;
}

export function generateBindingText(
  config: BindingConfig,
  options: BindingGenerateOptions = {},
): string {
  const engine = { ...DEFAULT_ENGINE_CONFIG, ...options.engine };
  const lines: string[] = [
    `# ${engine.bindingProgram} ${BINDING_TEXT.TITLE_SUFFIX}`,
    `# ${GENERATED_BY_PREFIX} ${engine.generatorLabel}`,
    "",
  ];

  for (const category of categoriesInUse(config)) {
    lines.push(categoryHeader(category));
    for (const binding of bindingsByCategory(config, category)) {
      lines.push(...bindingLines(binding));
    }
    lines.push("");
  }

  return lines.join("\n") + "\n";
}
