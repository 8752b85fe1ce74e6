/**
 * Format Command Handler
 *
 * Rewrites a config file in canonical form: parse, then generate.
 */

import { EXIT_CODES } from "../constants.ts";
import { parseBindingConfig } from "../services/binding-parser.ts";
import { generateBindingText } from "../services/binding-generator.ts";
import { generateDirectiveText } from "../services/directive-generator.ts";
import { parseDirectiveConfig } from "../services/directive-parser.ts";
import {
  type CommandContext,
  type ConfigFormat,
  detectFormat,
  readTextFile,
  requireArgument,
  writeTextFile,
} from "./context.ts";

export interface FormatOptions {
  file?: string;
  format?: string;
  /** Replace the file instead of printing */
  write?: boolean;
  /** Add the editor exclusion rule when nothing targets the editor app */
  selfExclusion?: boolean;
}

export function formatText(
  format: ConfigFormat,
  text: string,
  context: Pick<CommandContext, "engine">,
  selfExclusion = true,
): string {
  if (format === "directive") {
    const config = parseDirectiveConfig(text, { engine: context.engine });
    return generateDirectiveText(config, { engine: context.engine, selfExclusion });
  }
  return generateBindingText(parseBindingConfig(text), { engine: context.engine });
}

export function formatCommand(options: FormatOptions, context: CommandContext): number {
  const file = requireArgument(options.file, "tiling-config format <file> [--write]");
  const format = detectFormat(file, options.format, context.engine);
  const formatted = formatText(format, readTextFile(file), context, options.selfExclusion ?? true);

  if (options.write) {
    writeTextFile(file, formatted);
    context.output.stderr(`Formatted ${file}\n`);
  } else {
    context.output.stdout(formatted);
  }
  return EXIT_CODES.SUCCESS;
}
