/**
 * Closed Enumerations
 *
 * Every closed set used by the directive and binding models, declared once as
 * a zod enum with its display metadata. The canonical string form of each
 * variant is the enum value itself; nothing else in the codebase spells these
 * strings out.
 */

import { z } from "zod";

/**
 * Display metadata attached to an enumeration variant
 */
export interface EnumInfo {
  /** Human-readable label */
  displayName: string;

  /** One-line explanation */
  description: string;
}

// ============================================================================
// Directive-side enumerations
// ============================================================================

export const LayoutSchema = z.enum(["bsp", "float", "stack"]);
export type Layout = z.infer<typeof LayoutSchema>;

export const LAYOUT_INFO: Record<Layout, EnumInfo> = {
  bsp: {
    displayName: "Binary Space Partition",
    description: "Automatically tiles windows in a binary tree structure",
  },
  float: {
    displayName: "Floating",
    description: "Windows float freely and can be moved/resized manually",
  },
  stack: {
    displayName: "Stacking",
    description: "Windows stack on top of each other",
  },
};

export const WindowPlacementSchema = z.enum(["first_child", "second_child"]);
export type WindowPlacement = z.infer<typeof WindowPlacementSchema>;

export const WINDOW_PLACEMENT_INFO: Record<WindowPlacement, EnumInfo> = {
  first_child: {
    displayName: "First Child",
    description: "New windows become the left/top child of the split",
  },
  second_child: {
    displayName: "Second Child",
    description: "New windows become the right/bottom child of the split",
  },
};

export const MouseModifierSchema = z.enum(["alt", "cmd", "ctrl", "shift", "fn"]);
export type MouseModifier = z.infer<typeof MouseModifierSchema>;

export const MOUSE_MODIFIER_INFO: Record<MouseModifier, EnumInfo> = {
  alt: { displayName: "Option (Alt)", description: "Hold Option while dragging" },
  cmd: { displayName: "Command", description: "Hold Command while dragging" },
  ctrl: { displayName: "Control", description: "Hold Control while dragging" },
  shift: { displayName: "Shift", description: "Hold Shift while dragging" },
  fn: { displayName: "Function", description: "Hold fn while dragging" },
};

export const MouseActionSchema = z.enum(["move", "resize"]);
export type MouseAction = z.infer<typeof MouseActionSchema>;

export const MOUSE_ACTION_INFO: Record<MouseAction, EnumInfo> = {
  move: { displayName: "Move Window", description: "Drag moves the window" },
  resize: { displayName: "Resize Window", description: "Drag resizes the window" },
};

export const MouseDropActionSchema = z.enum(["swap", "stack"]);
export type MouseDropAction = z.infer<typeof MouseDropActionSchema>;

export const MOUSE_DROP_ACTION_INFO: Record<MouseDropAction, EnumInfo> = {
  swap: { displayName: "Swap Windows", description: "Dropping a window swaps it with the target" },
  stack: { displayName: "Stack Windows", description: "Dropping a window stacks it on the target" },
};

export const SplitTypeSchema = z.enum(["auto", "vertical", "horizontal"]);
export type SplitType = z.infer<typeof SplitTypeSchema>;

export const SPLIT_TYPE_INFO: Record<SplitType, EnumInfo> = {
  auto: { displayName: "Auto", description: "Split along the longer side" },
  vertical: { displayName: "Vertical", description: "Always split vertically" },
  horizontal: { displayName: "Horizontal", description: "Always split horizontally" },
};

export const WindowShadowSchema = z.enum(["on", "off", "float"]);
export type WindowShadow = z.infer<typeof WindowShadowSchema>;

export const WINDOW_SHADOW_INFO: Record<WindowShadow, EnumInfo> = {
  on: { displayName: "On", description: "All windows draw a shadow" },
  off: { displayName: "Off", description: "No window draws a shadow" },
  float: { displayName: "Floating Only", description: "Only floating windows draw a shadow" },
};

export const FocusFollowsMouseSchema = z.enum(["off", "autoraise", "autofocus"]);
export type FocusFollowsMouse = z.infer<typeof FocusFollowsMouseSchema>;

export const FOCUS_FOLLOWS_MOUSE_INFO: Record<FocusFollowsMouse, EnumInfo> = {
  off: { displayName: "Off", description: "Focus does not follow the pointer" },
  autoraise: { displayName: "Autoraise", description: "Hovered window is focused and raised" },
  autofocus: { displayName: "Autofocus", description: "Hovered window is focused without raising" },
};

export const WindowLayerSchema = z.enum(["below", "normal", "above"]);
export type WindowLayer = z.infer<typeof WindowLayerSchema>;

export const WINDOW_LAYER_INFO: Record<WindowLayer, EnumInfo> = {
  below: { displayName: "Below", description: "Window stays below normal windows" },
  normal: { displayName: "Normal", description: "Default stacking" },
  above: { displayName: "Above", description: "Window stays above normal windows" },
};

// ============================================================================
// Category enumerations
// ============================================================================

/**
 * Hotkey grouping on the binding side. Space and display stay distinct.
 */
export const HotkeyCategorySchema = z.enum([
  "focus",
  "move",
  "resize",
  "layout",
  "space",
  "display",
  "custom",
]);
export type HotkeyCategory = z.infer<typeof HotkeyCategorySchema>;

export const HOTKEY_CATEGORY_INFO: Record<HotkeyCategory, EnumInfo> = {
  focus: { displayName: "Focus", description: "Window focus commands" },
  move: { displayName: "Move", description: "Window movement commands" },
  resize: { displayName: "Resize", description: "Window resize commands" },
  layout: { displayName: "Layout", description: "Layout switching commands" },
  space: { displayName: "Space", description: "Space/desktop commands" },
  display: { displayName: "Display", description: "Display/monitor commands" },
  custom: { displayName: "Custom", description: "User-defined commands" },
};

/**
 * Resolve a category marker name ("Focus", "focus") to a HotkeyCategory.
 * Returns undefined for names outside the closed set.
 */
export function parseHotkeyCategory(name: string): HotkeyCategory | undefined {
  const needle = name.trim().toLowerCase();
  return HotkeyCategorySchema.options.find(
    (category) =>
      category === needle ||
      HOTKEY_CATEGORY_INFO[category].displayName.toLowerCase() === needle,
  );
}

/**
 * Grouping used by the rule-editing surface. Space and display share the
 * `spaces` bucket.
 */
export const RuleCategorySchema = z.enum([
  "focus",
  "move",
  "resize",
  "layout",
  "spaces",
  "custom",
]);
export type RuleCategory = z.infer<typeof RuleCategorySchema>;

export const RULE_CATEGORY_INFO: Record<RuleCategory, EnumInfo> = {
  focus: { displayName: "Focus", description: "Move keyboard focus between windows" },
  move: { displayName: "Move", description: "Swap, warp or move windows" },
  resize: { displayName: "Resize", description: "Change window dimensions" },
  layout: { displayName: "Layout", description: "Change tiling layout modes" },
  spaces: { displayName: "Spaces", description: "Navigate between spaces and displays" },
  custom: { displayName: "Custom", description: "User-defined shortcuts" },
};

// ============================================================================
// Binding-side enumerations
// ============================================================================

export const ModifierSchema = z.enum([
  "alt",
  "lalt",
  "ralt",
  "shift",
  "lshift",
  "rshift",
  "cmd",
  "lcmd",
  "rcmd",
  "ctrl",
  "lctrl",
  "rctrl",
  "fn",
  "hyper",
  "meh",
]);
export type Modifier = z.infer<typeof ModifierSchema>;

/**
 * Display symbol per modifier
 */
export const MODIFIER_SYMBOLS: Record<Modifier, string> = {
  alt: "⌥",
  lalt: "⌥",
  ralt: "⌥",
  shift: "⇧",
  lshift: "⇧",
  rshift: "⇧",
  cmd: "⌘",
  lcmd: "⌘",
  rcmd: "⌘",
  ctrl: "⌃",
  lctrl: "⌃",
  rctrl: "⌃",
  fn: "fn",
  hyper: "⌃⌥⇧⌘",
  meh: "⌃⌥⇧",
};

export function isModifier(value: string): value is Modifier {
  return ModifierSchema.safeParse(value).success;
}

/**
 * Named keys accepted by the hotkey daemon besides letters, digits and
 * function keys
 */
export const SPECIAL_KEYS: ReadonlySet<string> = new Set([
  "space",
  "tab",
  "return",
  "escape",
  "backspace",
  "delete",
  "forwarddelete",
  "home",
  "end",
  "pageup",
  "pagedown",
  "left",
  "right",
  "up",
  "down",
  "caps_lock",
  "help",
  "insert",
]);

/**
 * Display symbol per special key; other keys render uppercased
 */
export const KEY_SYMBOLS: Readonly<Record<string, string>> = {
  left: "←",
  right: "→",
  up: "↑",
  down: "↓",
  space: "Space",
  tab: "⇥",
  return: "⏎",
  escape: "⎋",
  delete: "⌫",
};
