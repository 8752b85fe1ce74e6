/**
 * Reporter UI Component
 *
 * Renders validation results, conflicts and preset listings for the
 * terminal. Every method returns text; callers decide where it goes.
 */

import type { Diagnostic } from "../models/diagnostic.ts";
import { formatHotkey } from "../models/hotkey-binding.ts";
import type { ConflictGroup } from "../services/conflict-validator.ts";
import type { PresetSummary } from "../services/presets.ts";
import type { ValidationResult } from "../services/settings-validator.ts";

/**
 * ANSI color codes for terminal output
 */
const COLORS = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
  bold: "\x1b[1m",
};

type ColorName = keyof typeof COLORS;

export class Reporter {
  private useColor: boolean;

  constructor(useColor = true, isTerminal = process.stdout.isTTY === true) {
    this.useColor = useColor && isTerminal;
  }

  /**
   * One block per diagnostic, then a summary line
   */
  reportDiagnostics(file: string, diagnostics: readonly Diagnostic[]): string {
    const lines: string[] = [this.color(file, "bold")];

    for (const diagnostic of diagnostics) {
      const isError = diagnostic.severity === "error";
      const icon = this.color(isError ? "✗" : "⚠", isError ? "red" : "yellow");
      lines.push(`  ${icon} Line ${diagnostic.line}: ${diagnostic.message}`);
      lines.push(`    ${this.color(diagnostic.text, "gray")}`);
    }

    const errors = diagnostics.filter((d) => d.severity === "error").length;
    const warnings = diagnostics.length - errors;
    lines.push(this.summary(errors, warnings));
    return lines.join("\n");
  }

  /**
   * Semantic checks on the parsed model
   */
  reportModelCheck(result: ValidationResult): string {
    const lines: string[] = [];
    if (result.errors.length > 0) {
      lines.push("", "  Errors:");
      for (const error of result.errors) {
        lines.push(`    - ${this.color(error, "red")}`);
      }
    }
    if (result.warnings.length > 0) {
      lines.push("", "  Warnings:");
      for (const warning of result.warnings) {
        lines.push(`    - ${this.color(warning, "yellow")}`);
      }
    }
    return lines.join("\n");
  }

  reportConflicts(conflicts: readonly ConflictGroup[]): string {
    if (conflicts.length === 0) {
      return this.color("✓ No conflicting hotkeys", "green");
    }

    const lines: string[] = [
      this.color(`✗ ${conflicts.length} conflicting hotkey${conflicts.length === 1 ? "" : "s"}`, "red"),
    ];
    for (const conflict of conflicts) {
      lines.push("", `  ${this.color(conflict.hotkey, "bold")}`);
      for (const binding of conflict.bindings) {
        lines.push(`    ${formatHotkey(binding)} : ${binding.action}`);
      }
    }
    return lines.join("\n");
  }

  reportPresets(presets: readonly PresetSummary[]): string {
    const width = Math.max(...presets.map((p) => p.name.length));
    const lines = [this.color("Available presets:", "bold")];
    for (const preset of presets) {
      lines.push(
        `  ${this.color(preset.name.padEnd(width), "cyan")}  ${preset.display_name} ` +
          this.color(`(${preset.count} bindings)`, "gray"),
      );
      lines.push(`  ${" ".repeat(width)}  ${preset.description}`);
    }
    return lines.join("\n");
  }

  private summary(errors: number, warnings: number): string {
    if (errors === 0 && warnings === 0) {
      return this.color("  ✓ Valid", "green");
    }
    const text = `  ${errors} error${errors === 1 ? "" : "s"}, ` +
      `${warnings} warning${warnings === 1 ? "" : "s"}`;
    return this.color(text, errors > 0 ? "red" : "yellow");
  }

  /**
   * Apply color to text
   */
  private color(text: string, colorName: ColorName): string {
    if (!this.useColor) {
      return text;
    }
    return `${COLORS[colorName]}${text}${COLORS.reset}`;
  }
}
