/**
 * Document Analyzer
 *
 * One call per document: the parsed model together with the structural
 * diagnostics for the same text.
 */

import type { BindingConfig } from "../models/binding-config.ts";
import { type Diagnostic, sortDiagnostics } from "../models/diagnostic.ts";
import type { DirectiveConfig } from "../models/directive-config.ts";
import type { ExclusionRule } from "../models/exclusion-rule.ts";
import { parseBindingConfig } from "./binding-parser.ts";
import { type ConflictGroup, findAllConflicts } from "./conflict-validator.ts";
import {
  type DirectiveParseOptions,
  parseDirectiveConfig,
  parseExclusionRules,
} from "./directive-parser.ts";
import { validateBindingText, validateDirectiveText } from "./structure-validator.ts";

export interface DirectiveAnalysis {
  readonly config: DirectiveConfig;
  readonly exclusions: readonly ExclusionRule[];
  readonly diagnostics: readonly Diagnostic[];
}

export interface BindingAnalysis {
  readonly config: BindingConfig;
  readonly diagnostics: readonly Diagnostic[];
  readonly conflicts: readonly ConflictGroup[];
}

export function analyzeDirectiveText(
  text: string,
  options: DirectiveParseOptions = {},
): DirectiveAnalysis {
  return {
    config: parseDirectiveConfig(text, options),
    exclusions: parseExclusionRules(text, options),
    diagnostics: sortDiagnostics(validateDirectiveText(text, options)),
  };
}

export function analyzeBindingText(text: string): BindingAnalysis {
  const config = parseBindingConfig(text);
  return {
    config,
    diagnostics: sortDiagnostics(validateBindingText(text)),
    conflicts: findAllConflicts(config.bindings),
  };
}
