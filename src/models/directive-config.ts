/**
 * Directive-side aggregate.
 *
 * Settings, opaque settings, rules, signals and space overrides read from
 * (or written to) one directive file. Instances are never mutated; every
 * edit below returns a new aggregate.
 *
 * @module directive-config
 */

import { z } from "zod";
import {
  DEFAULT_SETTINGS,
  type DirectiveSettings,
  DirectiveSettingsSchema,
  type OpaqueSetting,
} from "./directive-settings.ts";
import { type WindowRule, WindowRuleSchema } from "./window-rule.ts";
import { type Signal, SignalSchema } from "./signal.ts";
import { hasCustomization, type SpaceConfig, SpaceConfigSchema } from "./space-config.ts";

export const OpaqueSettingSchema = z.object({
  key: z.string().min(1),
  value: z.string(),
});

/**
 * Field shape of the aggregate, before the cross-field checks
 */
export const DirectiveConfigObjectSchema = z.object({
  settings: DirectiveSettingsSchema.default({}),
  extra_settings: z.array(OpaqueSettingSchema).default([]),
  rules: z.array(WindowRuleSchema).default([]),
  signals: z.array(SignalSchema).default([]),
  spaces: z.array(SpaceConfigSchema).default([]),
});

/**
 * Report space indexes used more than once
 */
export function checkUniqueSpaces(
  config: { spaces: readonly SpaceConfig[] },
  ctx: z.RefinementCtx,
): void {
  const seen = new Set<number>();
  config.spaces.forEach((space, i) => {
    if (seen.has(space.index)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["spaces", i, "index"],
        message: `Duplicate space index ${space.index}`,
      });
    }
    seen.add(space.index);
  });
}

export const DirectiveConfigSchema = DirectiveConfigObjectSchema.superRefine(checkUniqueSpaces);

export interface DirectiveConfig {
  readonly settings: DirectiveSettings;
  /** Unrecognized `config` keys, raw values, in order of first occurrence */
  readonly extra_settings: readonly OpaqueSetting[];
  readonly rules: readonly WindowRule[];
  readonly signals: readonly Signal[];
  /** At most one entry per index */
  readonly spaces: readonly SpaceConfig[];
}

export function createDirectiveConfig(
  fields: Partial<DirectiveConfig> = {},
): DirectiveConfig {
  return {
    settings: DEFAULT_SETTINGS,
    extra_settings: [],
    rules: [],
    signals: [],
    spaces: [],
    ...fields,
  };
}

// ============================================================================
// Rules
// ============================================================================

export function addRule(config: DirectiveConfig, rule: WindowRule): DirectiveConfig {
  return { ...config, rules: [...config.rules, rule] };
}

export function updateRule(config: DirectiveConfig, rule: WindowRule): DirectiveConfig {
  return { ...config, rules: config.rules.map((r) => (r.id === rule.id ? rule : r)) };
}

export function removeRule(config: DirectiveConfig, id: string): DirectiveConfig {
  return { ...config, rules: config.rules.filter((r) => r.id !== id) };
}

export function toggleRule(config: DirectiveConfig, id: string): DirectiveConfig {
  return {
    ...config,
    rules: config.rules.map((r) => (r.id === id ? { ...r, enabled: !r.enabled } : r)),
  };
}

export function findRule(config: DirectiveConfig, id: string): WindowRule | undefined {
  return config.rules.find((r) => r.id === id);
}

// ============================================================================
// Signals
// ============================================================================

export function addSignal(config: DirectiveConfig, signal: Signal): DirectiveConfig {
  return { ...config, signals: [...config.signals, signal] };
}

export function updateSignal(config: DirectiveConfig, signal: Signal): DirectiveConfig {
  return {
    ...config,
    signals: config.signals.map((s) => (s.id === signal.id ? signal : s)),
  };
}

export function removeSignal(config: DirectiveConfig, id: string): DirectiveConfig {
  return { ...config, signals: config.signals.filter((s) => s.id !== id) };
}

export function toggleSignal(config: DirectiveConfig, id: string): DirectiveConfig {
  return {
    ...config,
    signals: config.signals.map((s) => (s.id === id ? { ...s, enabled: !s.enabled } : s)),
  };
}

export function findSignal(config: DirectiveConfig, id: string): Signal | undefined {
  return config.signals.find((s) => s.id === id);
}

// ============================================================================
// Spaces
// ============================================================================

/**
 * Insert or replace the override for `space.index`. A replaced entry keeps
 * its position.
 */
export function upsertSpace(config: DirectiveConfig, space: SpaceConfig): DirectiveConfig {
  const exists = config.spaces.some((s) => s.index === space.index);
  return {
    ...config,
    spaces: exists
      ? config.spaces.map((s) => (s.index === space.index ? space : s))
      : [...config.spaces, space],
  };
}

export function removeSpace(config: DirectiveConfig, index: number): DirectiveConfig {
  return { ...config, spaces: config.spaces.filter((s) => s.index !== index) };
}

export function getSpace(config: DirectiveConfig, index: number): SpaceConfig | undefined {
  return config.spaces.find((s) => s.index === index);
}

// ============================================================================
// Settings
// ============================================================================

/**
 * Overlay settings. Passing `external_bar: undefined` clears the bar.
 */
export function updateSettings(
  config: DirectiveConfig,
  patch: Partial<DirectiveSettings>,
): DirectiveConfig {
  const merged: DirectiveSettings = { ...config.settings, ...patch };
  const { external_bar, ...rest } = merged;
  return { ...config, settings: external_bar === undefined ? rest : merged };
}

/**
 * Set an unrecognized key; an existing entry keeps its position
 */
export function setExtraSetting(
  config: DirectiveConfig,
  key: string,
  value: string,
): DirectiveConfig {
  const exists = config.extra_settings.some((s) => s.key === key);
  return {
    ...config,
    extra_settings: exists
      ? config.extra_settings.map((s) => (s.key === key ? { key, value } : s))
      : [...config.extra_settings, { key, value }],
  };
}

export function removeExtraSetting(config: DirectiveConfig, key: string): DirectiveConfig {
  return { ...config, extra_settings: config.extra_settings.filter((s) => s.key !== key) };
}

export function withUniformPadding(config: DirectiveConfig, padding: number): DirectiveConfig {
  return updateSettings(config, {
    top_padding: padding,
    bottom_padding: padding,
    left_padding: padding,
    right_padding: padding,
  });
}

/**
 * The shared padding when all four sides are equal
 */
export function uniformPadding(config: DirectiveConfig): number | undefined {
  const { top_padding, bottom_padding, left_padding, right_padding } = config.settings;
  return top_padding === bottom_padding && bottom_padding === left_padding &&
      left_padding === right_padding
    ? top_padding
    : undefined;
}

// ============================================================================
// Statistics
// ============================================================================

export function enabledRulesCount(config: DirectiveConfig): number {
  return config.rules.filter((r) => r.enabled).length;
}

export function enabledSignalsCount(config: DirectiveConfig): number {
  return config.signals.filter((s) => s.enabled).length;
}

export function customizedSpacesCount(config: DirectiveConfig): number {
  return config.spaces.filter(hasCustomization).length;
}
