/**
 * Settings Validator
 *
 * Semantic checks on a parsed or edited directive model: value ranges,
 * color formats, space labels and signal events. Text-level problems are
 * the structure validator's job.
 */

import type { DirectiveConfig } from "../models/directive-config.ts";
import type { DirectiveSettings } from "../models/directive-settings.ts";
import { describeSignalEvent, isKnownSignalEvent } from "../models/signal.ts";
import { SPACE_GAP_KEYS } from "../models/space-config.ts";

/**
 * Validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

// ============================================================================
// Field checks
// ============================================================================

const COLOR_PATTERNS = [
  /^#[0-9A-Fa-f]{3}$/,
  /^#[0-9A-Fa-f]{6}$/,
  /^#[0-9A-Fa-f]{8}$/,
  /^0x[0-9A-Fa-f]{6}$/,
  /^0x[0-9A-Fa-f]{8}$/,
];

export function isValidColor(color: string): boolean {
  const trimmed = color.trim();
  return COLOR_PATTERNS.some((pattern) => pattern.test(trimmed));
}

/**
 * Space labels: letters, digits, hyphens and underscores, at most 50
 * characters. Returns an error message or null.
 */
export function validateLabel(label: string): string | null {
  const trimmed = label.trim();
  if (trimmed === "") {
    return "Label is required";
  }
  if (!/^[\w-]+$/.test(trimmed)) {
    return "Label can only contain letters, numbers, hyphens, and underscores";
  }
  if (trimmed.length > 50) {
    return "Label is too long (max 50 characters)";
  }
  return null;
}

function inUnitRange(value: number): boolean {
  return value >= 0 && value <= 1;
}

// ============================================================================
// Model checks
// ============================================================================

/**
 * Check setting values against their documented ranges
 */
export function validateSettings(settings: DirectiveSettings): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!inUnitRange(settings.split_ratio)) {
    errors.push(`split_ratio must be between 0.0 and 1.0 (got ${settings.split_ratio})`);
  }
  if (!inUnitRange(settings.active_window_opacity)) {
    errors.push(
      `active_window_opacity must be between 0.0 and 1.0 (got ${settings.active_window_opacity})`,
    );
  }
  if (!inUnitRange(settings.normal_window_opacity)) {
    errors.push(
      `normal_window_opacity must be between 0.0 and 1.0 (got ${settings.normal_window_opacity})`,
    );
  }

  for (const key of SPACE_GAP_KEYS) {
    if (settings[key] < 0) {
      errors.push(`${key} must not be negative (got ${settings[key]})`);
    }
  }
  if (settings.window_border_width < 0) {
    errors.push(`window_border_width must not be negative (got ${settings.window_border_width})`);
  }
  if (settings.window_animation_duration < 0) {
    errors.push(
      `window_animation_duration must not be negative (got ${settings.window_animation_duration})`,
    );
  }

  for (
    const key of [
      "active_window_border_color",
      "normal_window_border_color",
      "insert_feedback_color",
    ] as const
  ) {
    if (!isValidColor(settings[key])) {
      errors.push(`${key} has an invalid color format (use 0xAARRGGBB, 0xRRGGBB or #RRGGBB)`);
    }
  }

  if (settings.window_opacity && settings.normal_window_opacity === 0) {
    warnings.push("normal_window_opacity is 0.0; unfocused windows will be invisible");
  }

  return { valid: errors.length === 0, errors, warnings };
}

/**
 * Settings checks plus space labels, space gaps and signal events
 */
export function validateDirectiveModel(config: DirectiveConfig): ValidationResult {
  const { errors, warnings } = validateSettings(config.settings);

  for (const space of config.spaces) {
    if (space.label !== undefined) {
      const labelError = validateLabel(space.label);
      if (labelError) {
        warnings.push(`Space ${space.index}: ${labelError}`);
      }
    }
    for (const key of SPACE_GAP_KEYS) {
      const value = space[key];
      if (value !== undefined && value < 0) {
        errors.push(`Space ${space.index}: ${key} must not be negative (got ${value})`);
      }
    }
  }

  for (const signal of config.signals) {
    if (!isKnownSignalEvent(signal.event)) {
      warnings.push(`Signal ${signal.id}: ${describeSignalEvent(signal.event)}`);
    }
  }

  return { valid: errors.length === 0, errors, warnings };
}
