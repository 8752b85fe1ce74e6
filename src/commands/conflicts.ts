/**
 * Conflicts Command Handler
 *
 * Lists hotkeys bound more than once in a binding file. Exits 1 when any
 * conflict exists.
 */

import { EXIT_CODES } from "../constants.ts";
import { ErrorType, StructuredError } from "../models/structured-error.ts";
import { parseBindingConfig } from "../services/binding-parser.ts";
import { findAllConflicts } from "../services/conflict-validator.ts";
import { type CommandContext, detectFormat, readTextFile, requireArgument } from "./context.ts";

export interface ConflictsOptions {
  file?: string;
  format?: string;
}

export function conflictsCommand(options: ConflictsOptions, context: CommandContext): number {
  const file = requireArgument(options.file, "tiling-config conflicts <file>");
  if (detectFormat(file, options.format, context.engine) !== "binding") {
    throw new StructuredError(
      ErrorType.INVALID_ARGUMENTS,
      "CLI",
      "Conflict detection applies to binding files only",
      [`Pass a .${context.engine.bindingProgram}rc file or --format binding`],
      { path: file },
    );
  }

  const conflicts = findAllConflicts(parseBindingConfig(readTextFile(file)).bindings);

  if (context.json) {
    const report = conflicts.map((group) => ({
      hotkey: group.hotkey,
      signature: group.signature,
      bindings: group.bindings.map((b) => ({ id: b.id, action: b.action })),
    }));
    context.output.stdout(JSON.stringify(report, null, 2) + "\n");
  } else {
    context.output.stdout(context.reporter.reportConflicts(conflicts) + "\n");
  }

  return conflicts.length === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.VALIDATION_FAILED;
}
