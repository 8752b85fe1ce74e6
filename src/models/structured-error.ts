/**
 * Structured Error Model
 *
 * Hard failures of the engine and the CLI: loading the JSON exchange format,
 * invalid engine configuration, file access and argument errors.
 * Malformed config text is never reported through this type; parsers collect
 * Diagnostics instead.
 */

import { z } from "zod";

/**
 * Error type enumeration
 */
export enum ErrorType {
  /** Exchange document is not valid JSON */
  INVALID_JSON = "INVALID_JSON",

  /** Exchange document is JSON but does not match the model shape */
  SCHEMA_MISMATCH = "SCHEMA_MISMATCH",

  /** Engine configuration (env or overrides) failed validation */
  INVALID_ENGINE_CONFIG = "INVALID_ENGINE_CONFIG",

  /** Identifier already present in a collection */
  DUPLICATE_ID = "DUPLICATE_ID",

  /** Named preset does not exist */
  PRESET_NOT_FOUND = "PRESET_NOT_FOUND",

  /** Input file missing */
  FILE_NOT_FOUND = "FILE_NOT_FOUND",

  /** Input file exists but could not be read or written */
  FILE_READ_FAILED = "FILE_READ_FAILED",

  /** Could not tell whether a file holds directive or binding text */
  UNKNOWN_FORMAT = "UNKNOWN_FORMAT",

  /** CLI arguments missing or malformed */
  INVALID_ARGUMENTS = "INVALID_ARGUMENTS",
}

/**
 * Structured error class with diagnostic context
 */
export class StructuredError extends Error {
  /** Error category for filtering and reporting */
  public readonly type: ErrorType;

  /** Component that raised the error (e.g., "Model Serializer", "CLI") */
  public readonly component: string;

  /** Root cause description */
  public override readonly cause: string;

  /** Ordered list of remediation steps */
  public readonly remediation: string[];

  /** Additional diagnostic context (paths, ids, schema issues, etc.) */
  public readonly context?: Record<string, unknown>;

  constructor(
    type: ErrorType,
    component: string,
    cause: string,
    remediation: string[],
    context?: Record<string, unknown>,
  ) {
    super(`${component}: ${cause}`);

    this.name = "StructuredError";
    this.type = type;
    this.component = component;
    this.cause = cause;
    this.remediation = remediation;
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StructuredError);
    }
  }

  /**
   * Format error as human-readable message
   */
  format(): string {
    const lines = [
      `✗ ${this.type}: ${this.message}`,
      "",
    ];

    if (this.context && Object.keys(this.context).length > 0) {
      lines.push("Context:");
      for (const [key, value] of Object.entries(this.context)) {
        const valueStr = typeof value === "string" ? value : JSON.stringify(value);
        lines.push(`  ${key}: ${valueStr}`);
      }
      lines.push("");
    }

    lines.push("Suggested fixes:");
    this.remediation.forEach((fix, i) => {
      lines.push(`  ${i + 1}. ${fix}`);
    });

    return lines.join("\n");
  }

  /**
   * Convert error to JSON for machine-readable output
   */
  toJSON(): Record<string, unknown> {
    return {
      type: this.type,
      component: this.component,
      cause: this.cause,
      remediation: this.remediation,
      context: this.context || {},
      stack: this.stack,
    };
  }
}

/**
 * Render zod issues as "<path>: <message>" lines
 */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`);
}

/**
 * Type guard to check if an error is a StructuredError
 */
export function isStructuredError(error: unknown): error is StructuredError {
  return error instanceof StructuredError;
}
