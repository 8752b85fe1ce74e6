/**
 * Unit tests for DirectiveParser
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import {
  buildExclusionRule,
  buildSignal,
  buildWindowRule,
  parseDirectiveConfig,
  parseExclusionRules,
  readCommandLine,
} from "../../src/services/directive-parser.ts";
import { getLogger, LogLevel, resetLogger } from "../../src/services/logger.ts";

const SAMPLE = [
  "#!/usr/bin/env sh",
  "yabai -m config layout float",
  "yabai -m config window_gap 12  # wider",
  "yabai -m config split_ratio 0.60",
  "yabai -m config menubar_opacity 0.5",
  "yabai -m config --space 2 layout stack",
  "yabai -m config --space 2 window_gap 0",
  "yabai -m space 2 --label code",
  'yabai -m rule --add app="^System Settings$" manage=off',
  'yabai -m rule --add title="Picture-in-Picture" sticky=on layer=above',
  "yabai -m rule --add manage=off",
  '# [DISABLED] yabai -m rule --add app="^Calculator$" manage=off',
  'yabai -m signal --add event=window_focused action="sketchybar --trigger window_focus" label=focus',
  "yabai -m signal --add event=window_created",
  '# [DISABLED] yabai -m signal --add event=space_changed action="echo space"',
  "# [DISABLED] yabai -m config layout stack",
  'echo "yabai configuration loaded..."',
].join("\n");

test("parseDirectiveConfig - settings", () => {
  const { settings } = parseDirectiveConfig(SAMPLE);
  assert.equal(settings.layout, "float");
  assert.equal(settings.window_gap, 12);
  assert.equal(settings.split_ratio, 0.6);
  assert.equal(settings.top_padding, 6);
});

test("parseDirectiveConfig - unknown keys kept verbatim", () => {
  assert.deepEqual(parseDirectiveConfig(SAMPLE).extra_settings, [
    { key: "menubar_opacity", value: "0.5" },
  ]);
});

test("parseDirectiveConfig - space overrides merge per index", () => {
  assert.deepEqual(parseDirectiveConfig(SAMPLE).spaces, [
    { index: 2, layout: "stack", window_gap: 0, label: "code" },
  ]);
});

test("parseDirectiveConfig - rules with ids numbered per call", () => {
  assert.deepEqual(parseDirectiveConfig(SAMPLE).rules, [
    { id: "rule_0", app_name: "System Settings", manage: false, enabled: true },
    {
      id: "rule_1",
      title: "Picture-in-Picture",
      manage: true,
      sticky: true,
      layer: "above",
      enabled: true,
    },
    { id: "rule_2", app_name: "Calculator", manage: false, enabled: false },
  ]);
});

test("parseDirectiveConfig - signals, incomplete ones dropped", () => {
  assert.deepEqual(parseDirectiveConfig(SAMPLE).signals, [
    {
      id: "signal_0",
      event: "window_focused",
      action: "sketchybar --trigger window_focus",
      label: "focus",
      enabled: true,
    },
    { id: "signal_1", event: "space_changed", action: "echo space", enabled: false },
  ]);
});

test("parseDirectiveConfig - empty text gives defaults", () => {
  const config = parseDirectiveConfig("");
  assert.equal(config.settings.layout, "bsp");
  assert.deepEqual(config.rules, []);
  assert.deepEqual(config.spaces, []);
});

test("parseDirectiveConfig - invalid value without an earlier one keeps the default", () => {
  const config = parseDirectiveConfig("yabai -m config layout grid\nyabai -m config window_gap wide");
  assert.equal(config.settings.layout, "bsp");
  assert.equal(config.settings.window_gap, 6);
});

test("parseDirectiveConfig - invalid repeat keeps the earlier valid value", () => {
  const config = parseDirectiveConfig(
    "yabai -m config layout float\nyabai -m config layout garbage\n" +
      "yabai -m config window_gap 4\nyabai -m config window_gap wide\n",
  );
  assert.equal(config.settings.layout, "float");
  assert.equal(config.settings.window_gap, 4);
});

test("parseDirectiveConfig - fractional integer setting is ignored", () => {
  const config = parseDirectiveConfig("yabai -m config window_gap 8.5\nyabai -m config window_border_width 2.0");
  assert.equal(config.settings.window_gap, 6);
  assert.equal(config.settings.window_border_width, 2);
});

test("parseDirectiveConfig - later value wins", () => {
  const config = parseDirectiveConfig("yabai -m config window_gap 4\nyabai -m config window_gap 9");
  assert.equal(config.settings.window_gap, 9);
});

test("parseDirectiveConfig - hex colors stay strings", () => {
  const config = parseDirectiveConfig("yabai -m config active_window_border_color 0xff00ff00");
  assert.equal(config.settings.active_window_border_color, "0xff00ff00");
});

test("parseDirectiveConfig - program name from engine config", () => {
  const text = "/opt/bin/yabai -m config layout stack";
  assert.equal(parseDirectiveConfig(text).settings.layout, "bsp");
  assert.equal(
    parseDirectiveConfig(text, { engine: { directiveProgram: "/opt/bin/yabai" } }).settings.layout,
    "stack",
  );
});

test("parseDirectiveConfig - dropped entities are logged at debug", () => {
  resetLogger();
  const chunks: string[] = [];
  const logger = getLogger({ level: LogLevel.DEBUG, sink: (chunk) => chunks.push(chunk) });
  parseDirectiveConfig("yabai -m rule --add manage=off");
  logger.flush();
  resetLogger();

  const entries = chunks.join("").trim().split("\n").map((line) => JSON.parse(line));
  assert.equal(entries[0].event_type, "entity_dropped");
  assert.equal(entries[0].message, "Dropped rule: missing app or title selector");
  assert.equal(entries[1].event_type, "parse_complete");
});

test("parseExclusionRules - app rules only", () => {
  assert.deepEqual(parseExclusionRules(SAMPLE), [
    {
      id: "exclusion_0",
      app_name: "System Settings",
      manage_off: true,
      sticky: false,
      layer: "normal",
      enabled: true,
    },
    {
      id: "exclusion_1",
      app_name: "Calculator",
      manage_off: true,
      sticky: false,
      layer: "normal",
      enabled: false,
    },
  ]);
});

test("buildExclusionRule - space and title", () => {
  assert.deepEqual(
    buildExclusionRule('app="^Slack$" title="Huddle" space=3 sticky=on', "x"),
    {
      id: "x",
      app_name: "Slack",
      title_pattern: "Huddle",
      manage_off: false,
      sticky: true,
      layer: "normal",
      assigned_space: 3,
      enabled: true,
    },
  );
});

test("buildWindowRule - ignores invalid layer and space", () => {
  assert.deepEqual(buildWindowRule("app=Finder layer=top space=0", "r"), {
    id: "r",
    app_name: "Finder",
    manage: true,
    enabled: true,
  });
});

test("buildSignal - empty action counts as missing", () => {
  assert.equal(buildSignal('event=window_focused action=""', "s"), undefined);
});

test("readCommandLine - comments, disabled markers and trailing comments", () => {
  assert.equal(readCommandLine("   "), undefined);
  assert.equal(readCommandLine("# just a note"), undefined);
  assert.deepEqual(readCommandLine("# [DISABLED] yabai -m rule --add app=X # old"), {
    command: "yabai -m rule --add app=X",
    enabled: false,
  });
  assert.deepEqual(readCommandLine("  yabai -m config layout bsp  "), {
    command: "yabai -m config layout bsp",
    enabled: true,
  });
});
