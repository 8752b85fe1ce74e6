/**
 * Engine configuration model.
 *
 * Names and labels the parsers and generators need that are not part of the
 * config text itself. Defaults can be overridden per call or from the
 * environment.
 *
 * @module engine-config
 */

import { z } from "zod";
import { ENV_VARS } from "../constants.ts";
import { ErrorType, formatZodIssues, StructuredError } from "./structured-error.ts";

export const LogLevelNameSchema = z.enum(["debug", "info", "warn", "error"]);

/**
 * Program names are single shell words
 */
const ProgramNameSchema = z
  .string()
  .regex(/^[A-Za-z0-9_.\/-]+$/, "Program name must be a single word without spaces");

export const EngineConfigSchema = z.object({
  /**
   * Program that prefixes every directive line.
   * Default: "yabai"
   */
  directiveProgram: ProgramNameSchema,

  /**
   * Hotkey daemon name, used in generated binding headers.
   * Default: "skhd"
   */
  bindingProgram: ProgramNameSchema,

  /**
   * Application the generator keeps out of window management when no
   * exclusion rules are supplied.
   * Default: "tiling-config"
   */
  editorAppName: z.string().min(1, "Editor app name must be non-empty"),

  /**
   * Written in the "Generated by" header of both formats.
   * Default: "tiling-config"
   */
  generatorLabel: z.string().min(1),

  /**
   * Minimum level written by the logger.
   * Default: "warn"
   */
  logLevel: LogLevelNameSchema,
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

/**
 * Default engine configuration.
 */
export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  directiveProgram: "yabai",
  bindingProgram: "skhd",
  editorAppName: "tiling-config",
  generatorLabel: "tiling-config",
  logLevel: "warn",
};

function engineConfigError(error: z.ZodError): StructuredError {
  const issues = formatZodIssues(error);
  return new StructuredError(
    ErrorType.INVALID_ENGINE_CONFIG,
    "Engine Config",
    `Invalid engine configuration (${issues.length} issue${issues.length === 1 ? "" : "s"})`,
    [
      "Check the TILING_CONFIG_* environment variables",
      "Program names must be single words, e.g. yabai or /opt/homebrew/bin/yabai",
    ],
    { issues },
  );
}

/**
 * Validate EngineConfig overrides.
 * @returns true if valid, throws StructuredError if invalid
 */
export function validateEngineConfig(config: Partial<EngineConfig>): boolean {
  const result = EngineConfigSchema.partial().safeParse(config);
  if (!result.success) {
    throw engineConfigError(result.error);
  }
  return true;
}

/**
 * Merge overrides over the defaults after validating them.
 */
export function resolveEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  validateEngineConfig(overrides);
  return { ...DEFAULT_ENGINE_CONFIG, ...overrides };
}

/**
 * Build the engine configuration from environment variables.
 *
 * @param env - Environment record, usually process.env
 *
 * @example
 * const config = loadEngineConfig({ TILING_CONFIG_LOG_LEVEL: "debug" });
 * // config.logLevel === "debug"
 */
export function loadEngineConfig(
  env: Record<string, string | undefined>,
): EngineConfig {
  const overrides: Record<string, string> = {};
  const mapping: Array<[keyof EngineConfig, string]> = [
    ["directiveProgram", ENV_VARS.DIRECTIVE_PROGRAM],
    ["bindingProgram", ENV_VARS.BINDING_PROGRAM],
    ["editorAppName", ENV_VARS.EDITOR_APP],
    ["logLevel", ENV_VARS.LOG_LEVEL],
  ];

  for (const [field, variable] of mapping) {
    const value = env[variable];
    if (value !== undefined && value !== "") {
      overrides[field] = value;
    }
  }

  const parsed = EngineConfigSchema.partial().safeParse(overrides);
  if (!parsed.success) {
    throw engineConfigError(parsed.error);
  }
  return { ...DEFAULT_ENGINE_CONFIG, ...parsed.data };
}
