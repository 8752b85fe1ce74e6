/**
 * Directive Parser
 *
 * Reads directive text into a DirectiveConfig. Recognized line classes:
 *
 *   <program> -m config <key> <value>
 *   <program> -m config --space <n> <key> <value>
 *   <program> -m space <n> --label <label>
 *   <program> -m rule --add <properties>
 *   <program> -m signal --add <properties>
 *
 * Rule and signal lines may be commented out as `# [DISABLED] <line>` and are
 * then read with enabled = false. Everything else is ignored here and left
 * to the validator. Identifiers are numbered per call (`rule_0`, `signal_0`).
 */

import { DISABLED_MARKER } from "../constants.ts";
import {
  buildSettings,
  type DirectiveSettingKey,
  type DirectiveSettings,
  type DirectiveSettingValue,
  isSettingKey,
  type OpaqueSetting,
} from "../models/directive-settings.ts";
import type { DirectiveConfig } from "../models/directive-config.ts";
import { LayoutSchema, WindowLayerSchema } from "../models/enums.ts";
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../models/engine-config.ts";
import type { ExclusionRule } from "../models/exclusion-rule.ts";
import type { Signal } from "../models/signal.ts";
import { isSpaceGapKey, type SpaceConfig, type SpaceGapKey } from "../models/space-config.ts";
import { stripAnchors, type WindowRule } from "../models/window-rule.ts";
import { stripTrailingComment, unquote } from "../utils/quoting.ts";
import { getLogger } from "./logger.ts";
import { type PropertyToken, tokenizeProperties } from "./property-tokenizer.ts";
import {
  asBoolean,
  asEnum,
  asInteger,
  coerceSetting,
  coerceValue,
  type ScalarValue,
} from "./value-coercer.ts";

export interface DirectiveParseOptions {
  /** Engine configuration; only `directiveProgram` is read */
  engine?: Pick<EngineConfig, "directiveProgram">;
}

// ============================================================================
// Line patterns
// ============================================================================

export interface DirectivePatterns {
  readonly spaceConfig: RegExp;
  readonly config: RegExp;
  readonly spaceLabel: RegExp;
  readonly ruleAdd: RegExp;
  readonly signalAdd: RegExp;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\\/]/g, "\\$&");
}

/**
 * Line patterns for a directive program name
 */
export function directivePatterns(program: string): DirectivePatterns {
  const p = escapeRegExp(program);
  return {
    spaceConfig: new RegExp(`^${p}\\s+-m\\s+config\\s+--space\\s+(\\d+)\\s+(\\S+)\\s+(.+)$`),
    config: new RegExp(`^${p}\\s+-m\\s+config\\s+(\\S+)\\s+(.+)$`),
    spaceLabel: new RegExp(`^${p}\\s+-m\\s+space\\s+(\\d+)\\s+--label\\s+(.+)$`),
    ruleAdd: new RegExp(`^${p}\\s+-m\\s+rule\\s+--add\\s+(.+)$`),
    signalAdd: new RegExp(`^${p}\\s+-m\\s+signal\\s+--add\\s+(.+)$`),
  };
}

const DISABLED_PATTERN = new RegExp(`^#\\s*${escapeRegExp(DISABLED_MARKER)}\\s+(.+)$`);

interface CommandLine {
  /** Command text with any trailing comment removed */
  readonly command: string;
  readonly enabled: boolean;
}

/**
 * Normalize one raw line. Returns undefined for blank lines and comments
 * other than disabled-entry markers.
 */
export function readCommandLine(line: string): CommandLine | undefined {
  const trimmed = line.trim();
  if (trimmed === "") {
    return undefined;
  }
  if (trimmed.startsWith("#")) {
    const disabled = DISABLED_PATTERN.exec(trimmed);
    return disabled ? { command: stripTrailingComment(disabled[1].trim()), enabled: false } : undefined;
  }
  return { command: stripTrailingComment(trimmed), enabled: true };
}

function tokenValue(token: PropertyToken | undefined): ScalarValue | undefined {
  return token === undefined ? undefined : coerceValue(token.raw, { quoted: token.quoted });
}

function positiveInteger(value: ScalarValue | undefined): number | undefined {
  const n = asInteger(value);
  return n !== undefined && n > 0 ? n : undefined;
}

// ============================================================================
// Entity builders
// ============================================================================

/**
 * Build a window rule from a `rule --add` property fragment. Returns
 * undefined when neither `app` nor `title` is present.
 */
export function buildWindowRule(
  fragment: string,
  id: string,
  enabled = true,
): WindowRule | undefined {
  const props = tokenizeProperties(fragment);
  const appRaw = props.get("app")?.raw;
  const appName = appRaw === undefined ? undefined : stripAnchors(appRaw) || undefined;
  const title = props.get("title")?.raw || undefined;

  if (appName === undefined && title === undefined) {
    return undefined;
  }

  const sticky = asBoolean(tokenValue(props.get("sticky")));
  const layer = asEnum(WindowLayerSchema, tokenValue(props.get("layer")));
  const space = positiveInteger(tokenValue(props.get("space")));

  return {
    id,
    ...(appName !== undefined ? { app_name: appName } : {}),
    ...(title !== undefined ? { title } : {}),
    manage: asBoolean(tokenValue(props.get("manage"))) ?? true,
    ...(sticky !== undefined ? { sticky } : {}),
    ...(layer !== undefined ? { layer } : {}),
    ...(space !== undefined ? { space } : {}),
    enabled,
  };
}

/**
 * Build a signal from a `signal --add` property fragment. Returns undefined
 * when `event` or `action` is missing.
 */
export function buildSignal(fragment: string, id: string, enabled = true): Signal | undefined {
  const props = tokenizeProperties(fragment);
  const event = props.get("event")?.raw;
  const action = props.get("action")?.raw;

  if (!event || !action) {
    return undefined;
  }

  const label = props.get("label")?.raw || undefined;
  return {
    id,
    event,
    action,
    ...(label !== undefined ? { label } : {}),
    enabled,
  };
}

/**
 * Build an exclusion from a `rule --add` property fragment. Requires `app`.
 */
export function buildExclusionRule(
  fragment: string,
  id: string,
  enabled = true,
): ExclusionRule | undefined {
  const props = tokenizeProperties(fragment);
  const appRaw = props.get("app")?.raw;
  const appName = appRaw === undefined ? "" : stripAnchors(appRaw);
  if (appName === "") {
    return undefined;
  }

  const title = props.get("title")?.raw || undefined;
  const space = positiveInteger(tokenValue(props.get("space")));

  return {
    id,
    app_name: appName,
    ...(title !== undefined ? { title_pattern: title } : {}),
    manage_off: asBoolean(tokenValue(props.get("manage"))) === false,
    sticky: asBoolean(tokenValue(props.get("sticky"))) === true,
    layer: asEnum(WindowLayerSchema, tokenValue(props.get("layer"))) ?? "normal",
    ...(space !== undefined ? { assigned_space: space } : {}),
    enabled,
  };
}

function applySpaceOverride(
  space: SpaceConfig,
  key: string,
  raw: string,
): SpaceConfig | undefined {
  if (key === "layout") {
    const layout = asEnum(LayoutSchema, unquote(raw));
    return layout === undefined ? undefined : { ...space, layout };
  }
  if (key === "label") {
    const label = unquote(raw);
    return label === "" ? undefined : { ...space, label };
  }
  if (isSpaceGapKey(key)) {
    const value = asInteger(coerceValue(raw));
    if (value === undefined) {
      return undefined;
    }
    const patch: Partial<Record<SpaceGapKey, number>> = {};
    patch[key] = value;
    return { ...space, ...patch };
  }
  return undefined;
}

// ============================================================================
// Parsers
// ============================================================================

/**
 * Parse directive text into a DirectiveConfig.
 *
 * @example
 * const config = parseDirectiveConfig('yabai -m config layout float\n');
 * config.settings.layout; // "float"
 */
export function parseDirectiveConfig(
  text: string,
  options: DirectiveParseOptions = {},
): DirectiveConfig {
  const program = options.engine?.directiveProgram ?? DEFAULT_ENGINE_CONFIG.directiveProgram;
  const patterns = directivePatterns(program);
  const logger = getLogger();

  const values: Partial<Record<DirectiveSettingKey, DirectiveSettingValue>> = {};
  const extras = new Map<string, string>();
  const rules: WindowRule[] = [];
  const signals: Signal[] = [];
  const spaces = new Map<number, SpaceConfig>();

  for (const line of text.split("\n")) {
    const entry = readCommandLine(line);
    if (!entry) {
      continue;
    }
    const { command, enabled } = entry;

    const ruleMatch = patterns.ruleAdd.exec(command);
    if (ruleMatch) {
      const rule = buildWindowRule(ruleMatch[1], `rule_${rules.length}`, enabled);
      if (rule) {
        rules.push(rule);
      } else {
        logger.entityDropped("rule", "missing app or title selector", command);
      }
      continue;
    }

    const signalMatch = patterns.signalAdd.exec(command);
    if (signalMatch) {
      const signal = buildSignal(signalMatch[1], `signal_${signals.length}`, enabled);
      if (signal) {
        signals.push(signal);
      } else {
        logger.entityDropped("signal", "missing event or action", command);
      }
      continue;
    }

    // Only rules and signals can be disabled
    if (!enabled) {
      continue;
    }

    const spaceConfigMatch = patterns.spaceConfig.exec(command);
    if (spaceConfigMatch) {
      const index = Number.parseInt(spaceConfigMatch[1], 10);
      if (index >= 1) {
        const current = spaces.get(index) ?? { index };
        const next = applySpaceOverride(current, spaceConfigMatch[2], spaceConfigMatch[3].trim());
        if (next) {
          spaces.set(index, next);
        } else {
          logger.debug("Ignored space override", { line: command });
        }
      }
      continue;
    }

    const labelMatch = patterns.spaceLabel.exec(command);
    if (labelMatch) {
      const index = Number.parseInt(labelMatch[1], 10);
      const label = unquote(labelMatch[2].trim());
      if (index >= 1 && label !== "") {
        spaces.set(index, { ...(spaces.get(index) ?? { index }), label });
      }
      continue;
    }

    const configMatch = patterns.config.exec(command);
    if (configMatch) {
      const key = configMatch[1];
      const raw = configMatch[2].trim();
      if (isSettingKey(key)) {
        const value = coerceSetting(key, raw);
        if (value === undefined) {
          logger.debug("Ignored invalid setting value", { key, value: raw });
        } else {
          values[key] = value;
        }
      } else if (!key.startsWith("-")) {
        extras.set(key, raw);
      }
    }
  }

  const extra_settings: OpaqueSetting[] = [...extras].map(([key, value]) => ({ key, value }));
  const settings: DirectiveSettings = buildSettings(values);

  logger.parseComplete("directive", {
    rules: rules.length,
    signals: signals.length,
    spaces: spaces.size,
    extra_settings: extra_settings.length,
  });

  return {
    settings,
    extra_settings,
    rules,
    signals,
    spaces: [...spaces.values()],
  };
}

/**
 * Read the exclusion view of the rule lines in directive text
 */
export function parseExclusionRules(
  text: string,
  options: DirectiveParseOptions = {},
): ExclusionRule[] {
  const program = options.engine?.directiveProgram ?? DEFAULT_ENGINE_CONFIG.directiveProgram;
  const { ruleAdd } = directivePatterns(program);
  const exclusions: ExclusionRule[] = [];

  for (const line of text.split("\n")) {
    const entry = readCommandLine(line);
    const match = entry ? ruleAdd.exec(entry.command) : null;
    if (!entry || !match) {
      continue;
    }
    const exclusion = buildExclusionRule(match[1], `exclusion_${exclusions.length}`, entry.enabled);
    if (exclusion) {
      exclusions.push(exclusion);
    }
  }

  return exclusions;
}
