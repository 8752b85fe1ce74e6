/**
 * Directive settings: the typed `config <key> <value>` half of the directive
 * model.
 *
 * The schema below is the single defaults table. Each recognized key carries
 * its declared kind and documented default; absent keys take the default when
 * the schema parses the collected values, once, at model construction.
 */

import { z } from "zod";
import {
  FocusFollowsMouseSchema,
  LayoutSchema,
  MouseActionSchema,
  MouseDropActionSchema,
  MouseModifierSchema,
  SplitTypeSchema,
  WindowPlacementSchema,
  WindowShadowSchema,
} from "./enums.ts";

export const DirectiveSettingsSchema = z.object({
  // Layout
  layout: LayoutSchema.default("bsp"),
  window_placement: WindowPlacementSchema.default("second_child"),
  auto_balance: z.boolean().default(false),
  split_ratio: z.number().default(0.5),
  split_type: SplitTypeSchema.default("auto"),

  // Gaps and padding
  window_gap: z.number().int().default(6),
  top_padding: z.number().int().default(6),
  bottom_padding: z.number().int().default(6),
  left_padding: z.number().int().default(6),
  right_padding: z.number().int().default(6),

  // External bar (emitted only when set)
  external_bar: z.string().optional(),

  // Mouse
  mouse_follows_focus: z.boolean().default(false),
  focus_follows_mouse: FocusFollowsMouseSchema.default("off"),
  mouse_modifier: MouseModifierSchema.default("alt"),
  mouse_action1: MouseActionSchema.default("move"),
  mouse_action2: MouseActionSchema.default("resize"),
  mouse_drop_action: MouseDropActionSchema.default("swap"),

  // Appearance
  window_opacity: z.boolean().default(false),
  active_window_opacity: z.number().default(1.0),
  normal_window_opacity: z.number().default(0.9),
  window_shadow: WindowShadowSchema.default("on"),
  window_animation_duration: z.number().default(0.0),

  // Borders
  window_border: z.boolean().default(false),
  window_border_width: z.number().int().default(4),
  active_window_border_color: z.string().default("0xff775759"),
  normal_window_border_color: z.string().default("0xff555555"),
  insert_feedback_color: z.string().default("0xffd75f5f"),
});

export type DirectiveSettings = Readonly<z.output<typeof DirectiveSettingsSchema>>;
export type DirectiveSettingKey = keyof z.output<typeof DirectiveSettingsSchema>;
export type DirectiveSettingValue = boolean | number | string;

/**
 * Declared kind of a recognized key
 */
export type SettingKind =
  | { readonly type: "bool" }
  | { readonly type: "int" }
  | { readonly type: "float" }
  | { readonly type: "string" }
  | { readonly type: "enum"; readonly values: readonly string[] };

const BOOL: SettingKind = { type: "bool" };
const INT: SettingKind = { type: "int" };
const FLOAT: SettingKind = { type: "float" };
const STRING: SettingKind = { type: "string" };

function oneOf(schema: z.ZodEnum<[string, ...string[]]>): SettingKind {
  return { type: "enum", values: schema.options };
}

export const SETTING_KINDS: Readonly<Record<DirectiveSettingKey, SettingKind>> = {
  layout: oneOf(LayoutSchema),
  window_placement: oneOf(WindowPlacementSchema),
  auto_balance: BOOL,
  split_ratio: FLOAT,
  split_type: oneOf(SplitTypeSchema),
  window_gap: INT,
  top_padding: INT,
  bottom_padding: INT,
  left_padding: INT,
  right_padding: INT,
  external_bar: STRING,
  mouse_follows_focus: BOOL,
  focus_follows_mouse: oneOf(FocusFollowsMouseSchema),
  mouse_modifier: oneOf(MouseModifierSchema),
  mouse_action1: oneOf(MouseActionSchema),
  mouse_action2: oneOf(MouseActionSchema),
  mouse_drop_action: oneOf(MouseDropActionSchema),
  window_opacity: BOOL,
  active_window_opacity: FLOAT,
  normal_window_opacity: FLOAT,
  window_shadow: oneOf(WindowShadowSchema),
  window_animation_duration: FLOAT,
  window_border: BOOL,
  window_border_width: INT,
  active_window_border_color: STRING,
  normal_window_border_color: STRING,
  insert_feedback_color: STRING,
};

/**
 * Recognized keys in canonical order
 */
export const SETTING_KEYS: readonly DirectiveSettingKey[] = DirectiveSettingsSchema.keyof().options;

export function isSettingKey(key: string): key is DirectiveSettingKey {
  return Object.prototype.hasOwnProperty.call(SETTING_KINDS, key);
}

/**
 * Every recognized key at its documented default
 */
export const DEFAULT_SETTINGS: DirectiveSettings = DirectiveSettingsSchema.parse({});

/**
 * Build a settings object from already-coerced values; absent keys take
 * their defaults.
 */
export function buildSettings(
  values: Partial<Record<DirectiveSettingKey, DirectiveSettingValue>>,
): DirectiveSettings {
  return DirectiveSettingsSchema.parse(values);
}

/**
 * Setting a directive key does not have a typed slot for; kept verbatim so a
 * round trip does not lose it
 */
export interface OpaqueSetting {
  readonly key: string;
  readonly value: string;
}
