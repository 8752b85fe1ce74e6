/**
 * Engine Constants
 *
 * Centralized constants to avoid magic strings in the parsers and generators.
 */

/**
 * Tool version (single source of truth)
 */
export const VERSION = "1.0.0";

/**
 * Prefix marking an entry that is present but inactive.
 * Written before a directive command or a binding inside a comment.
 */
export const DISABLED_MARKER = "[DISABLED]";

/**
 * Header line naming the generating tool, after "# "
 */
export const GENERATED_BY_PREFIX = "Generated by";

/**
 * Directive text fixtures
 */
export const DIRECTIVE_TEXT = {
  /** First line of every canonical directive file */
  SHEBANG: "#!/usr/bin/env sh",

  /** Header comment, after the program name: "# yabai configuration" */
  TITLE_SUFFIX: "configuration",

  /** Echoed by the trailing status line, after the program name */
  STATUS_SUFFIX: "configuration loaded...",
} as const;

/**
 * Section headers of the canonical directive file, in emission order
 */
export const DIRECTIVE_SECTIONS = {
  EXCLUSIONS: "Window Rules (Exclusions)",
  LAYOUT: "Layout",
  GAPS: "Gaps and Padding",
  EXTERNAL_BAR: "External Bar",
  MOUSE: "Mouse",
  APPEARANCE: "Window Appearance",
  BORDERS: "Window Borders",
  ADDITIONAL: "Additional Settings",
  SPACES: "Space Configurations",
  SIGNALS: "Signals",
} as const;

/**
 * Binding text fixtures
 */
export const BINDING_TEXT = {
  /** Header comment, after the program name: "# skhd configuration" */
  TITLE_SUFFIX: "configuration",

  /** Section header used for bindings without a category */
  UNCATEGORIZED: "Uncategorized",
} as const;

/**
 * CLI exit codes
 */
export const EXIT_CODES = {
  /** Command completed */
  SUCCESS: 0,

  /** Validation found errors or conflicts */
  VALIDATION_FAILED: 1,

  /** Bad arguments or unknown command */
  USAGE_ERROR: 2,

  /** File could not be read or written */
  IO_ERROR: 3,
} as const;

/**
 * Environment variables read by loadEngineConfig()
 */
export const ENV_VARS = {
  DIRECTIVE_PROGRAM: "TILING_CONFIG_DIRECTIVE_PROGRAM",
  BINDING_PROGRAM: "TILING_CONFIG_BINDING_PROGRAM",
  EDITOR_APP: "TILING_CONFIG_EDITOR_APP",
  LOG_LEVEL: "TILING_CONFIG_LOG_LEVEL",
} as const;
