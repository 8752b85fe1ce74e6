/**
 * Directive Generator
 *
 * Renders a DirectiveConfig as canonical directive text. Section order and
 * conditional blocks are fixed so that regenerated files diff cleanly:
 *
 *   header, window rules (exclusions first), layout, gaps and padding,
 *   external bar*, mouse, window appearance, window borders,
 *   additional settings*, space configurations*, signals*, status line
 *
 * (* only when non-empty). Booleans are always written as on/off.
 */

import {
  DIRECTIVE_SECTIONS,
  DIRECTIVE_TEXT,
  DISABLED_MARKER,
  GENERATED_BY_PREFIX,
} from "../constants.ts";
import type { DirectiveConfig } from "../models/directive-config.ts";
import type { DirectiveSettingKey, DirectiveSettings } from "../models/directive-settings.ts";
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../models/engine-config.ts";
import { type ExclusionRule, exclusionHasActions } from "../models/exclusion-rule.ts";
import type { Signal } from "../models/signal.ts";
import { SPACE_GAP_KEYS, type SpaceConfig } from "../models/space-config.ts";
import { ruleTargetsApp, type WindowRule } from "../models/window-rule.ts";
import { quoteValue } from "../utils/quoting.ts";
import { formatSettingValue } from "./value-coercer.ts";

export type GeneratorEngineConfig = Pick<
  EngineConfig,
  "directiveProgram" | "editorAppName" | "generatorLabel"
>;

export interface DirectiveGenerateOptions {
  /** Exclusion rules written at the top of the rules section */
  exclusions?: readonly ExclusionRule[];

  engine?: Partial<GeneratorEngineConfig>;

  /**
   * Keep the editor app out of window management when no exclusions are
   * supplied and no rule targets it (default: true)
   */
  selfExclusion?: boolean;
}

// ============================================================================
// Single commands
// ============================================================================

function disabled(command: string): string {
  return `# ${DISABLED_MARKER} ${command}`;
}

function selector(appName: string | undefined, title: string | undefined): string[] {
  const parts: string[] = [];
  if (appName !== undefined) parts.push(`app=${quoteValue(`^${appName}$`)}`);
  if (title !== undefined) parts.push(`title=${quoteValue(title)}`);
  return parts;
}

/**
 * One `rule --add` line carrying every action of the rule
 */
export function ruleCommand(rule: WindowRule, program = DEFAULT_ENGINE_CONFIG.directiveProgram): string {
  const parts = selector(rule.app_name, rule.title);
  if (parts.length === 0) {
    return "";
  }
  parts.push(`manage=${rule.manage ? "on" : "off"}`);
  if (rule.sticky !== undefined) parts.push(`sticky=${rule.sticky ? "on" : "off"}`);
  if (rule.layer !== undefined) parts.push(`layer=${rule.layer}`);
  if (rule.space !== undefined) parts.push(`space=${rule.space}`);
  return `${program} -m rule --add ${parts.join(" ")}`;
}

/**
 * The `rule --add` line of an exclusion, or "" when it has no action
 */
export function exclusionCommand(
  rule: ExclusionRule,
  program = DEFAULT_ENGINE_CONFIG.directiveProgram,
): string {
  if (!exclusionHasActions(rule)) {
    return "";
  }
  const parts = selector(rule.app_name, rule.title_pattern);
  if (rule.manage_off) parts.push("manage=off");
  if (rule.sticky) parts.push("sticky=on");
  if (rule.layer !== "normal") parts.push(`layer=${rule.layer}`);
  if (rule.assigned_space !== undefined) parts.push(`space=${rule.assigned_space}`);
  return `${program} -m rule --add ${parts.join(" ")}`;
}

export function signalCommand(
  signal: Signal,
  program = DEFAULT_ENGINE_CONFIG.directiveProgram,
): string {
  const parts: string[] = [];
  if (signal.label !== undefined) parts.push(`label=${quoteValue(signal.label)}`);
  parts.push(`event=${/[\s"']/.test(signal.event) ? quoteValue(signal.event) : signal.event}`);
  parts.push(`action=${quoteValue(signal.action)}`);
  return `${program} -m signal --add ${parts.join(" ")}`;
}

/**
 * Label, layout, gap and padding lines for one space
 */
export function spaceCommands(
  space: SpaceConfig,
  program = DEFAULT_ENGINE_CONFIG.directiveProgram,
): string[] {
  const commands: string[] = [];
  if (space.label !== undefined) {
    commands.push(`${program} -m space ${space.index} --label ${quoteValue(space.label)}`);
  }
  if (space.layout !== undefined) {
    commands.push(`${program} -m config --space ${space.index} layout ${space.layout}`);
  }
  for (const key of SPACE_GAP_KEYS) {
    const value = space[key];
    if (value !== undefined) {
      commands.push(`${program} -m config --space ${space.index} ${key} ${value}`);
    }
  }
  return commands;
}

// ============================================================================
// Whole file
// ============================================================================

/**
 * Render canonical directive text. Output ends with a newline.
 */
export function generateDirectiveText(
  config: DirectiveConfig,
  options: DirectiveGenerateOptions = {},
): string {
  const engine: GeneratorEngineConfig = { ...DEFAULT_ENGINE_CONFIG, ...options.engine };
  const program = engine.directiveProgram;
  const exclusions = options.exclusions ?? [];
  const settings = config.settings;
  const lines: string[] = [];

  const section = (title: string, body: readonly string[]): void => {
    lines.push(`# === ${title} ===`, ...body, "");
  };
  const setting = (key: DirectiveSettingKey, value: DirectiveSettings[DirectiveSettingKey]): string =>
    value === undefined ? "" : `${program} -m config ${key} ${formatSettingValue(key, value)}`;
  const settingLines = (keys: readonly DirectiveSettingKey[]): string[] =>
    keys.map((key) => setting(key, settings[key])).filter((line) => line !== "");

  lines.push(
    DIRECTIVE_TEXT.SHEBANG,
    "",
    `# ${program} ${DIRECTIVE_TEXT.TITLE_SUFFIX}`,
    `# ${GENERATED_BY_PREFIX} ${engine.generatorLabel}`,
    "",
  );

  // Rules: exclusions first, then the model's rules. A line already written
  // is not repeated.
  const ruleLines: string[] = [];
  const emit = (command: string, enabled: boolean): void => {
    if (command === "") return;
    const line = enabled ? command : disabled(command);
    if (!ruleLines.includes(line)) ruleLines.push(line);
  };

  const editorTargeted = exclusions.some((e) => e.app_name === engine.editorAppName) ||
    config.rules.some((r) => ruleTargetsApp(r, engine.editorAppName));
  if ((options.selfExclusion ?? true) && exclusions.length === 0 && !editorTargeted) {
    emit(`${program} -m rule --add app=${quoteValue(`^${engine.editorAppName}$`)} manage=off`, true);
  }
  for (const exclusion of exclusions) {
    emit(exclusionCommand(exclusion, program), exclusion.enabled);
  }
  for (const rule of config.rules) {
    emit(ruleCommand(rule, program), rule.enabled);
  }
  section(DIRECTIVE_SECTIONS.EXCLUSIONS, ruleLines);

  section(
    DIRECTIVE_SECTIONS.LAYOUT,
    settingLines(["layout", "window_placement", "auto_balance", "split_ratio", "split_type"]),
  );
  section(
    DIRECTIVE_SECTIONS.GAPS,
    settingLines(["window_gap", "top_padding", "bottom_padding", "left_padding", "right_padding"]),
  );

  if (settings.external_bar !== undefined) {
    section(DIRECTIVE_SECTIONS.EXTERNAL_BAR, settingLines(["external_bar"]));
  }

  section(
    DIRECTIVE_SECTIONS.MOUSE,
    settingLines([
      "mouse_follows_focus",
      "focus_follows_mouse",
      "mouse_modifier",
      "mouse_action1",
      "mouse_action2",
      "mouse_drop_action",
    ]),
  );

  section(
    DIRECTIVE_SECTIONS.APPEARANCE,
    settingLines([
      "window_opacity",
      ...(settings.window_opacity
        ? (["active_window_opacity", "normal_window_opacity"] as const)
        : []),
      "window_shadow",
      "window_animation_duration",
    ]),
  );

  section(
    DIRECTIVE_SECTIONS.BORDERS,
    settingLines([
      "window_border",
      ...(settings.window_border
        ? ([
          "window_border_width",
          "active_window_border_color",
          "normal_window_border_color",
          "insert_feedback_color",
        ] as const)
        : []),
    ]),
  );

  if (config.extra_settings.length > 0) {
    section(
      DIRECTIVE_SECTIONS.ADDITIONAL,
      config.extra_settings.map(({ key, value }) => `${program} -m config ${key} ${value}`),
    );
  }

  if (config.spaces.length > 0) {
    section(
      DIRECTIVE_SECTIONS.SPACES,
      config.spaces.flatMap((space) => spaceCommands(space, program)),
    );
  }

  if (config.signals.length > 0) {
    section(
      DIRECTIVE_SECTIONS.SIGNALS,
      config.signals.map((signal) => {
        const command = signalCommand(signal, program);
        return signal.enabled ? command : disabled(command);
      }),
    );
  }

  lines.push(`echo "${program} ${DIRECTIVE_TEXT.STATUS_SUFFIX}"`);
  return lines.join("\n") + "\n";
}
