/**
 * Import Command Handler
 *
 * Renders config text from a JSON exchange document. The format cannot be
 * read from a .json file name, so --format is required.
 */

import { EXIT_CODES } from "../constants.ts";
import { ErrorType, StructuredError } from "../models/structured-error.ts";
import { generateBindingText } from "../services/binding-generator.ts";
import { generateDirectiveText } from "../services/directive-generator.ts";
import {
  deserializeBindingConfig,
  deserializeDirectiveConfig,
} from "../services/model-serializer.ts";
import {
  type CommandContext,
  ConfigFormatSchema,
  readTextFile,
  requireArgument,
  writeTextFile,
} from "./context.ts";

export interface ImportOptions {
  file?: string;
  format?: string;
  /** Write the text here instead of printing it */
  output?: string;
  selfExclusion?: boolean;
}

export function importCommand(options: ImportOptions, context: CommandContext): number {
  const usage = "tiling-config import <json> --format directive|binding [-o <file>]";
  const file = requireArgument(options.file, usage);
  const format = ConfigFormatSchema.safeParse(options.format);
  if (!format.success) {
    throw new StructuredError(
      ErrorType.INVALID_ARGUMENTS,
      "CLI",
      options.format === undefined ? "Missing --format" : `Unknown format "${options.format}"`,
      [`Usage: ${usage}`],
    );
  }

  const json = readTextFile(file);
  let text: string;
  if (format.data === "directive") {
    const { config, exclusions } = deserializeDirectiveConfig(json);
    text = generateDirectiveText(config, {
      exclusions,
      engine: context.engine,
      selfExclusion: options.selfExclusion ?? true,
    });
  } else {
    text = generateBindingText(deserializeBindingConfig(json), { engine: context.engine });
  }

  if (options.output) {
    writeTextFile(options.output, text);
  } else {
    context.output.stdout(text);
  }
  return EXIT_CODES.SUCCESS;
}
