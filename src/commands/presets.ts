/**
 * Presets Command Handler
 *
 * Without a name, lists the presets; with one, prints it as binding text,
 * or merges it into an existing binding file with --merge.
 */

import { EXIT_CODES } from "../constants.ts";
import { createBindingConfig } from "../models/binding-config.ts";
import { parseBindingConfig } from "../services/binding-parser.ts";
import { generateBindingText } from "../services/binding-generator.ts";
import { listPresets, loadPreset, mergePreset } from "../services/presets.ts";
import { type CommandContext, readTextFile, writeTextFile } from "./context.ts";

export interface PresetsOptions {
  name?: string;
  /** Binding file to merge the preset into, in place */
  merge?: string;
}

export function presetsCommand(options: PresetsOptions, context: CommandContext): number {
  if (options.name === undefined) {
    const presets = listPresets();
    context.output.stdout(
      (context.json
        ? JSON.stringify(presets, null, 2)
        : context.reporter.reportPresets(presets)) + "\n",
    );
    return EXIT_CODES.SUCCESS;
  }

  if (options.merge !== undefined) {
    const current = parseBindingConfig(readTextFile(options.merge));
    const merged = mergePreset(current, options.name);
    writeTextFile(options.merge, generateBindingText(merged, { engine: context.engine }));
    const added = merged.bindings.length - current.bindings.length;
    context.output.stderr(`Added ${added} binding${added === 1 ? "" : "s"} to ${options.merge}\n`);
    return EXIT_CODES.SUCCESS;
  }

  const config = createBindingConfig(loadPreset(options.name));
  context.output.stdout(generateBindingText(config, { engine: context.engine }));
  return EXIT_CODES.SUCCESS;
}
