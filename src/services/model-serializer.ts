/**
 * Model Serializer
 *
 * JSON exchange form of both aggregates. Keys are snake_case on both sides;
 * fields left out of a document take their schema defaults.
 */

import { z } from "zod";
import { type BindingConfig, BindingConfigSchema } from "../models/binding-config.ts";
import {
  checkUniqueSpaces,
  type DirectiveConfig,
  DirectiveConfigObjectSchema,
} from "../models/directive-config.ts";
import { type ExclusionRule, ExclusionRuleSchema } from "../models/exclusion-rule.ts";
import { ErrorType, formatZodIssues, StructuredError } from "../models/structured-error.ts";

const COMPONENT = "Model Serializer";

export const DirectiveDocumentSchema = DirectiveConfigObjectSchema.extend({
  exclusions: z.array(ExclusionRuleSchema).default([]),
}).superRefine(checkUniqueSpaces);

export interface DirectiveDocument {
  readonly config: DirectiveConfig;
  readonly exclusions: readonly ExclusionRule[];
}

function parseJson(json: string, what: string): unknown {
  try {
    return JSON.parse(json);
  } catch (error) {
    throw new StructuredError(
      ErrorType.INVALID_JSON,
      COMPONENT,
      `${what} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      [
        "Check the document for trailing commas or unquoted keys",
        "Re-export the document with the export command",
      ],
    );
  }
}

function schemaMismatch(error: z.ZodError, what: string): StructuredError {
  const issues = formatZodIssues(error);
  return new StructuredError(
    ErrorType.SCHEMA_MISMATCH,
    COMPONENT,
    `${what} does not match the expected shape (${issues.length} issue${
      issues.length === 1 ? "" : "s"
    })`,
    [
      "Fix the fields listed under issues",
      "Keys are snake_case, e.g. extra_settings, app_name",
    ],
    { issues },
  );
}

// ============================================================================
// Directive side
// ============================================================================

export function serializeDirectiveConfig(
  config: DirectiveConfig,
  exclusions: readonly ExclusionRule[] = [],
): string {
  const document = {
    settings: config.settings,
    extra_settings: config.extra_settings,
    rules: config.rules,
    signals: config.signals,
    spaces: config.spaces,
    exclusions,
  };
  return JSON.stringify(document, null, 2);
}

/**
 * @throws {StructuredError} INVALID_JSON or SCHEMA_MISMATCH
 */
export function deserializeDirectiveConfig(json: string): DirectiveDocument {
  const result = DirectiveDocumentSchema.safeParse(parseJson(json, "Directive document"));
  if (!result.success) {
    throw schemaMismatch(result.error, "Directive document");
  }
  const { exclusions, ...config } = result.data;
  return { config, exclusions };
}

// ============================================================================
// Binding side
// ============================================================================

export function serializeBindingConfig(config: BindingConfig): string {
  return JSON.stringify({ bindings: config.bindings }, null, 2);
}

/**
 * @throws {StructuredError} INVALID_JSON or SCHEMA_MISMATCH
 */
export function deserializeBindingConfig(json: string): BindingConfig {
  const result = BindingConfigSchema.safeParse(parseJson(json, "Binding document"));
  if (!result.success) {
    throw schemaMismatch(result.error, "Binding document");
  }
  return result.data;
}
