#!/usr/bin/env -S node --import tsx

/**
 * tiling-config - Main Entry Point
 *
 * Validate, format and convert window manager directive files and hotkey
 * binding files from the shell.
 */

import minimist from "minimist";
import { existsSync, realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { conflictsCommand } from "./src/commands/conflicts.ts";
import { type CommandOutput, createCommandContext, processOutput } from "./src/commands/context.ts";
import { exportCommand } from "./src/commands/export.ts";
import { formatCommand } from "./src/commands/format.ts";
import { importCommand } from "./src/commands/import.ts";
import { presetsCommand } from "./src/commands/presets.ts";
import { validateCommand } from "./src/commands/validate.ts";
import { EXIT_CODES, VERSION } from "./src/constants.ts";
import { loadEngineConfig } from "./src/models/engine-config.ts";
import { ErrorType, isStructuredError, StructuredError } from "./src/models/structured-error.ts";
import { exitCodeFor, formatError, logErrorToFile } from "./src/services/error-handler.ts";
import { getLogger, LogLevel, parseLogLevel } from "./src/services/logger.ts";

const HELP = `
tiling-config v${VERSION}

USAGE:
  tiling-config <command> [options] <file>

COMMANDS:
  validate <file>          Report problems in a directive or binding file
  format <file>            Print the file in canonical form
  export <file>            Print the JSON exchange form of a file
  import <json>            Render config text from a JSON document
  conflicts <file>         List hotkeys bound more than once
  presets [name]           List binding presets, or print one

OPTIONS:
  --format <format>        directive or binding (default: from the file name)
  --write                  format: replace the file instead of printing
  -o, --output <path>      export/import: write to a file
  --merge <file>           presets: add the preset to a binding file
  --no-self-exclusion      format/import: omit the editor exclusion rule
  --json                   Machine-readable output
  --no-color               Disable colored output
  --verbose                Log debug events to stderr
  -h, --help               Show this help message
  -v, --version            Show version information

EXIT CODES:
  0 success, 1 validation failed, 2 usage error, 3 file error

EXAMPLES:
  tiling-config validate ~/.yabairc
  tiling-config format ~/.skhdrc --write
  tiling-config export ~/.yabairc -o yabai.json
  tiling-config import yabai.json --format directive
  tiling-config presets vim
`;

const CliArgsSchema = z.object({
  _: z.array(z.coerce.string()),
  format: z.string().optional(),
  output: z.string().optional(),
  merge: z.string().optional(),
  help: z.boolean(),
  version: z.boolean(),
  verbose: z.boolean(),
  json: z.boolean(),
  color: z.boolean(),
  write: z.boolean(),
  "self-exclusion": z.boolean(),
});

export type CliArgs = z.infer<typeof CliArgsSchema>;

/**
 * @throws {StructuredError} INVALID_ARGUMENTS for unknown flags or a flag
 * missing its value
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const unknownFlags: string[] = [];
  const parsed = minimist(argv, {
    string: ["format", "output", "merge"],
    boolean: ["help", "version", "verbose", "json", "color", "write", "self-exclusion"],
    alias: { h: "help", v: "version", o: "output" },
    default: { color: true, "self-exclusion": true },
    unknown: (arg) => {
      if (arg.startsWith("-")) {
        unknownFlags.push(arg);
        return false;
      }
      return true;
    },
  });

  if (unknownFlags.length > 0) {
    throw new StructuredError(
      ErrorType.INVALID_ARGUMENTS,
      "CLI",
      `Unknown option${unknownFlags.length === 1 ? "" : "s"}: ${unknownFlags.join(", ")}`,
      ["Run 'tiling-config --help' for usage information"],
      { options: unknownFlags },
    );
  }

  const result = CliArgsSchema.safeParse(parsed);
  if (!result.success) {
    throw new StructuredError(
      ErrorType.INVALID_ARGUMENTS,
      "CLI",
      "Malformed arguments",
      ["Run 'tiling-config --help' for usage information"],
    );
  }

  for (const flag of ["format", "output", "merge"] as const) {
    if (result.data[flag] === "") {
      throw new StructuredError(
        ErrorType.INVALID_ARGUMENTS,
        "CLI",
        `--${flag} needs a value`,
        ["Run 'tiling-config --help' for usage information"],
      );
    }
  }
  return result.data;
}

function dispatch(args: CliArgs, output: CommandOutput): number {
  const engine = loadEngineConfig(process.env);
  const logger = getLogger();
  logger.setLevel(args.verbose ? LogLevel.DEBUG : parseLogLevel(engine.logLevel) ?? LogLevel.WARN);

  const context = createCommandContext(engine, {
    output,
    color: args.color,
    json: args.json,
  });
  const command: string | undefined = args._[0];
  const target: string | undefined = args._[1];
  const fileOptions = { file: target, format: args.format };

  switch (command) {
    case "validate":
      return validateCommand(fileOptions, context);

    case "format":
      return formatCommand(
        { ...fileOptions, write: args.write, selfExclusion: args["self-exclusion"] },
        context,
      );

    case "export":
      return exportCommand({ ...fileOptions, output: args.output }, context);

    case "import":
      return importCommand(
        { ...fileOptions, output: args.output, selfExclusion: args["self-exclusion"] },
        context,
      );

    case "conflicts":
      return conflictsCommand(fileOptions, context);

    case "presets":
      return presetsCommand({ name: target, merge: args.merge }, context);

    case undefined:
    case "help":
      output.stdout(HELP);
      return EXIT_CODES.SUCCESS;

    default:
      output.stderr(`Unknown command: ${command}\nRun 'tiling-config --help' for usage information\n`);
      return EXIT_CODES.USAGE_ERROR;
  }
}

/**
 * Run the CLI and return its exit code
 */
export function main(argv: string[], output: CommandOutput = processOutput): number {
  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      output.stdout(HELP);
      return EXIT_CODES.SUCCESS;
    }
    if (args.version) {
      output.stdout(`tiling-config v${VERSION}\n`);
      return EXIT_CODES.SUCCESS;
    }
    return dispatch(args, output);
  } catch (error) {
    const code = exitCodeFor(error);
    output.stderr(formatError(error) + "\n");
    if (!isStructuredError(error)) {
      logErrorToFile(error);
    }
    return code;
  } finally {
    getLogger().close();
  }
}

/**
 * Whether the script path Node was started with is this module. npm links
 * `bin` entries through a symlink, so both sides are resolved first.
 */
export function isEntryPoint(scriptPath: string | undefined, moduleUrl: string): boolean {
  if (scriptPath === undefined || !existsSync(scriptPath)) {
    return false;
  }
  return realpathSync(scriptPath) === realpathSync(fileURLToPath(moduleUrl));
}

if (isEntryPoint(process.argv[1], import.meta.url)) {
  process.exitCode = main(process.argv.slice(2));
}
