/**
 * Error Handler Service
 *
 * Formatting and logging for StructuredError and anything else a command
 * throws.
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import { EXIT_CODES } from "../constants.ts";
import { ErrorType, isStructuredError } from "../models/structured-error.ts";

/**
 * Default error log location
 */
export function defaultErrorLogPath(): string {
  return join(homedir(), ".config", "tiling-config", "error.log");
}

/**
 * Format an error for the console
 * @param error - Error to format (StructuredError or generic Error)
 */
export function formatError(error: unknown): string {
  if (isStructuredError(error)) {
    return error.format();
  }

  if (error instanceof Error) {
    return `✗ Error: ${error.message}\n\nStack trace:\n${error.stack || "No stack trace available"}`;
  }

  return `✗ Unknown error: ${String(error)}`;
}

/**
 * Append an error to the error log file
 * @param logPath - Path to log file (default: ~/.config/tiling-config/error.log)
 * @returns false when the log could not be written
 */
export function logErrorToFile(error: unknown, logPath?: string): boolean {
  const targetPath = logPath || defaultErrorLogPath();

  try {
    mkdirSync(dirname(targetPath), { recursive: true });

    const timestamp = new Date().toISOString();
    const entry = `\n[${timestamp}]\n${formatError(error)}\n${"=".repeat(80)}\n`;
    appendFileSync(targetPath, entry, "utf-8");
    return true;
  } catch (fileError) {
    console.error(`Failed to write error log to ${targetPath}:`, fileError);
    return false;
  }
}

/**
 * CLI exit code for a thrown error
 */
export function exitCodeFor(error: unknown): number {
  if (!isStructuredError(error)) {
    return EXIT_CODES.VALIDATION_FAILED;
  }
  switch (error.type) {
    case ErrorType.FILE_NOT_FOUND:
    case ErrorType.FILE_READ_FAILED:
      return EXIT_CODES.IO_ERROR;
    case ErrorType.INVALID_ARGUMENTS:
    case ErrorType.UNKNOWN_FORMAT:
    case ErrorType.PRESET_NOT_FOUND:
    case ErrorType.INVALID_ENGINE_CONFIG:
      return EXIT_CODES.USAGE_ERROR;
    default:
      return EXIT_CODES.VALIDATION_FAILED;
  }
}
