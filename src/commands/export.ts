/**
 * Export Command Handler
 *
 * Prints the JSON exchange form of a config file.
 */

import { EXIT_CODES } from "../constants.ts";
import { parseBindingConfig } from "../services/binding-parser.ts";
import { parseDirectiveConfig } from "../services/directive-parser.ts";
import { serializeBindingConfig, serializeDirectiveConfig } from "../services/model-serializer.ts";
import {
  type CommandContext,
  detectFormat,
  readTextFile,
  requireArgument,
  writeTextFile,
} from "./context.ts";

export interface ExportOptions {
  file?: string;
  format?: string;
  /** Write the JSON here instead of printing it */
  output?: string;
}

export function exportCommand(options: ExportOptions, context: CommandContext): number {
  const file = requireArgument(options.file, "tiling-config export <file> [-o <json>]");
  const format = detectFormat(file, options.format, context.engine);
  const text = readTextFile(file);

  const json = format === "directive"
    ? serializeDirectiveConfig(parseDirectiveConfig(text, { engine: context.engine }))
    : serializeBindingConfig(parseBindingConfig(text));

  if (options.output) {
    writeTextFile(options.output, json + "\n");
  } else {
    context.output.stdout(json + "\n");
  }
  return EXIT_CODES.SUCCESS;
}
