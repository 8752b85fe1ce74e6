/**
 * Unit tests for directive settings defaults and kinds
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import {
  buildSettings,
  DEFAULT_SETTINGS,
  isSettingKey,
  SETTING_KEYS,
  SETTING_KINDS,
} from "../../src/models/directive-settings.ts";

test("DEFAULT_SETTINGS - documented defaults", () => {
  assert.equal(DEFAULT_SETTINGS.layout, "bsp");
  assert.equal(DEFAULT_SETTINGS.window_placement, "second_child");
  assert.equal(DEFAULT_SETTINGS.split_ratio, 0.5);
  assert.equal(DEFAULT_SETTINGS.window_gap, 6);
  assert.equal(DEFAULT_SETTINGS.normal_window_opacity, 0.9);
  assert.equal(DEFAULT_SETTINGS.window_shadow, "on");
  assert.equal(DEFAULT_SETTINGS.window_border_width, 4);
  assert.equal(DEFAULT_SETTINGS.active_window_border_color, "0xff775759");
  assert.equal(DEFAULT_SETTINGS.external_bar, undefined);
  assert.equal("external_bar" in DEFAULT_SETTINGS, false);
});

test("SETTING_KEYS - every key has a kind", () => {
  assert.equal(SETTING_KEYS.length, 27);
  assert.equal(SETTING_KEYS[0], "layout");
  for (const key of SETTING_KEYS) {
    assert.ok(SETTING_KINDS[key], key);
  }
});

test("SETTING_KINDS - enum kinds carry their values", () => {
  assert.deepEqual(SETTING_KINDS.focus_follows_mouse, {
    type: "enum",
    values: ["off", "autoraise", "autofocus"],
  });
  assert.deepEqual(SETTING_KINDS.window_gap, { type: "int" });
});

test("isSettingKey - recognized keys only", () => {
  assert.equal(isSettingKey("window_gap"), true);
  assert.equal(isSettingKey("menubar_opacity"), false);
  assert.equal(isSettingKey("toString"), false);
});

test("buildSettings - absent keys take defaults", () => {
  const settings = buildSettings({ layout: "float", window_gap: 12 });
  assert.equal(settings.layout, "float");
  assert.equal(settings.window_gap, 12);
  assert.equal(settings.top_padding, 6);
});
