/**
 * Validate Command Handler
 *
 * Parses a config file and reports structural diagnostics, plus the
 * semantic settings checks for directive files. Fails (exit 1) on any
 * error; warnings alone pass.
 */

import { EXIT_CODES } from "../constants.ts";
import { type Diagnostic, hasErrors } from "../models/diagnostic.ts";
import { analyzeBindingText, analyzeDirectiveText } from "../services/document-analyzer.ts";
import { type ValidationResult, validateDirectiveModel } from "../services/settings-validator.ts";
import {
  type CommandContext,
  type ConfigFormat,
  detectFormat,
  readTextFile,
  requireArgument,
} from "./context.ts";

export interface ValidateOptions {
  file?: string;
  format?: string;
}

export interface FileValidation {
  file: string;
  format: ConfigFormat;
  valid: boolean;
  diagnostics: readonly Diagnostic[];
  /** Settings checks; empty for binding files */
  model: ValidationResult;
}

export function validateText(
  file: string,
  format: ConfigFormat,
  text: string,
  context: Pick<CommandContext, "engine">,
): FileValidation {
  if (format === "directive") {
    const { config, diagnostics } = analyzeDirectiveText(text, { engine: context.engine });
    const model = validateDirectiveModel(config);
    return {
      file,
      format,
      valid: !hasErrors(diagnostics) && model.valid,
      diagnostics,
      model,
    };
  }

  const { diagnostics } = analyzeBindingText(text);
  return {
    file,
    format,
    valid: !hasErrors(diagnostics),
    diagnostics,
    model: { valid: true, errors: [], warnings: [] },
  };
}

/**
 * Validate command entry point
 */
export function validateCommand(options: ValidateOptions, context: CommandContext): number {
  const file = requireArgument(options.file, "tiling-config validate <file> [--format <format>]");
  const format = detectFormat(file, options.format, context.engine);
  const result = validateText(file, format, readTextFile(file), context);

  if (context.json) {
    context.output.stdout(JSON.stringify(result, null, 2) + "\n");
  } else {
    const report = context.reporter.reportDiagnostics(file, result.diagnostics) +
      context.reporter.reportModelCheck(result.model);
    context.output.stdout(report + "\n");
  }

  return result.valid ? EXIT_CODES.SUCCESS : EXIT_CODES.VALIDATION_FAILED;
}
