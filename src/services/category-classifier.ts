/**
 * Category Classifier
 *
 * Infers the category of an action from its text. Patterns are tried in a
 * fixed order over the lowercased action and the first match wins; actions
 * that do not call the window manager are custom.
 */

import type { HotkeyCategory, RuleCategory } from "../models/enums.ts";
import { DEFAULT_ENGINE_CONFIG } from "../models/engine-config.ts";

type ActionClass = "focus" | "move" | "resize" | "layout" | "space" | "display";

interface ClassPattern {
  readonly target: ActionClass;
  readonly matches: (action: string) => boolean;
}

const windowCommand = (action: string, ...flags: string[]): boolean =>
  action.includes("-m window") && flags.some((flag) => action.includes(flag));

const PATTERNS: readonly ClassPattern[] = [
  { target: "focus", matches: (a) => windowCommand(a, "--focus") },
  { target: "move", matches: (a) => windowCommand(a, "--swap", "--warp", "--move") },
  {
    target: "resize",
    matches: (a) => windowCommand(a, "--resize", "--ratio", "--toggle zoom"),
  },
  {
    target: "layout",
    matches: (a) =>
      windowCommand(a, "--toggle") ||
      a.includes("-m config layout") ||
      a.includes("-m space --layout") ||
      a.includes("--balance") ||
      a.includes("--equalize") ||
      a.includes("--rotate") ||
      a.includes("--mirror"),
  },
  {
    target: "space",
    matches: (a) => a.includes("-m space") || a.includes("-m window --space"),
  },
  {
    target: "display",
    matches: (a) => a.includes("-m display") || a.includes("-m window --display"),
  },
];

function classify(action: string, program: string): ActionClass | undefined {
  const lower = action.toLowerCase();
  if (!lower.includes(program.toLowerCase())) {
    return undefined;
  }
  return PATTERNS.find((pattern) => pattern.matches(lower))?.target;
}

/**
 * Binding-side category; space and display stay distinct
 *
 * @example
 * classifyHotkeyAction("yabai -m window --focus west"); // "focus"
 * classifyHotkeyAction("open -a Terminal");             // "custom"
 */
export function classifyHotkeyAction(
  action: string,
  program = DEFAULT_ENGINE_CONFIG.directiveProgram,
): HotkeyCategory {
  return classify(action, program) ?? "custom";
}

/**
 * Rule-editing category; space and display share `spaces`
 */
export function classifyRuleAction(
  action: string,
  program = DEFAULT_ENGINE_CONFIG.directiveProgram,
): RuleCategory {
  const target = classify(action, program);
  if (target === "space" || target === "display") {
    return "spaces";
  }
  return target ?? "custom";
}
