/**
 * Command Context
 *
 * What every command needs besides its own arguments: engine
 * configuration, output streams, and the file helpers shared by the
 * file-based commands.
 */

import { readFileSync, writeFileSync } from "node:fs";
import { basename } from "node:path";
import { z } from "zod";
import type { EngineConfig } from "../models/engine-config.ts";
import { ErrorType, StructuredError } from "../models/structured-error.ts";
import { getLogger } from "../services/logger.ts";
import { Reporter } from "../ui/reporter.ts";

export const ConfigFormatSchema = z.enum(["directive", "binding"]);
export type ConfigFormat = z.infer<typeof ConfigFormatSchema>;

export interface CommandOutput {
  stdout(text: string): void;
  stderr(text: string): void;
}

export const processOutput: CommandOutput = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

export interface CommandContext {
  engine: EngineConfig;
  output: CommandOutput;
  reporter: Reporter;
  /** Machine-readable output */
  json: boolean;
}

export function createCommandContext(
  engine: EngineConfig,
  options: { output?: CommandOutput; color?: boolean; json?: boolean } = {},
): CommandContext {
  return {
    engine,
    output: options.output ?? processOutput,
    reporter: new Reporter(options.color ?? true),
    json: options.json ?? false,
  };
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Pick the text format from `--format`, else from the file name
 *
 * @example
 * detectFormat("/home/me/.yabairc", undefined, engine); // "directive"
 */
export function detectFormat(
  path: string,
  explicit: string | undefined,
  engine: Pick<EngineConfig, "directiveProgram" | "bindingProgram">,
): ConfigFormat {
  if (explicit !== undefined) {
    const parsed = ConfigFormatSchema.safeParse(explicit);
    if (!parsed.success) {
      throw new StructuredError(
        ErrorType.INVALID_ARGUMENTS,
        "CLI",
        `Unknown format "${explicit}"`,
        ["Use --format directive or --format binding"],
        { format: explicit },
      );
    }
    return parsed.data;
  }

  const name = basename(path).toLowerCase();
  if (name.includes(`${basename(engine.directiveProgram).toLowerCase()}rc`)) {
    return "directive";
  }
  if (name.includes(`${basename(engine.bindingProgram).toLowerCase()}rc`)) {
    return "binding";
  }

  throw new StructuredError(
    ErrorType.UNKNOWN_FORMAT,
    "CLI",
    `Cannot tell the format of ${path} from its name`,
    [
      "Pass --format directive or --format binding",
      `Name the file like .${engine.directiveProgram}rc or .${engine.bindingProgram}rc`,
    ],
    { path },
  );
}

/**
 * @throws {StructuredError} FILE_NOT_FOUND or FILE_READ_FAILED
 */
export function readTextFile(path: string): string {
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) {
      throw new StructuredError(
        ErrorType.FILE_NOT_FOUND,
        "CLI",
        `File not found: ${path}`,
        ["Check the path", "Config files usually live in your home directory"],
        { path },
      );
    }
    throw new StructuredError(
      ErrorType.FILE_READ_FAILED,
      "CLI",
      `Could not read ${path}: ${errorMessage(error)}`,
      ["Check the file permissions"],
      { path },
    );
  }

  getLogger().fileRead(path, Buffer.byteLength(content));
  return content;
}

/**
 * @throws {StructuredError} FILE_READ_FAILED
 */
export function writeTextFile(path: string, content: string): void {
  try {
    writeFileSync(path, content, "utf-8");
  } catch (error) {
    throw new StructuredError(
      ErrorType.FILE_READ_FAILED,
      "CLI",
      `Could not write ${path}: ${errorMessage(error)}`,
      ["Check the file and directory permissions"],
      { path },
    );
  }
  getLogger().fileWrite(path, Buffer.byteLength(content));
}

/**
 * @throws {StructuredError} INVALID_ARGUMENTS when the positional is missing
 */
export function requireArgument(value: string | undefined, usage: string): string {
  if (value === undefined || value === "") {
    throw new StructuredError(
      ErrorType.INVALID_ARGUMENTS,
      "CLI",
      "Missing file argument",
      [`Usage: ${usage}`],
    );
  }
  return value;
}
