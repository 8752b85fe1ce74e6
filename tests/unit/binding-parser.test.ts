/**
 * Unit tests for BindingParser
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import {
  parseBindingConfig,
  parseBindingLine,
  parseHotkey,
  splitBindingLine,
} from "../../src/services/binding-parser.ts";

const SAMPLE = [
  "# skhd configuration",
  "",
  "# === Focus ===",
  "# Focus left",
  "alt - h : yabai -m window --focus west",
  "alt - l : yabai -m window --focus east",
  "",
  "# === Whatever ===",
  "shift + alt - j : yabai -m window --swap south",
  "# [DISABLED] cmd - return : open -a Terminal",
  "# stray comment",
  "",
  "ctrl-k : yabai -m space --focus next",
  ":: passthrough",
  "bad line",
].join("\n");

test("parseBindingConfig - categories, descriptions and disabled entries", () => {
  assert.deepEqual(parseBindingConfig(SAMPLE).bindings, [
    {
      id: "binding_0",
      modifiers: ["alt"],
      key: "h",
      action: "yabai -m window --focus west",
      category: "focus",
      description: "Focus left",
      enabled: true,
    },
    {
      id: "binding_1",
      modifiers: ["alt"],
      key: "l",
      action: "yabai -m window --focus east",
      category: "focus",
      enabled: true,
    },
    {
      id: "binding_2",
      modifiers: ["shift", "alt"],
      key: "j",
      action: "yabai -m window --swap south",
      category: "move",
      enabled: true,
    },
    {
      id: "binding_3",
      modifiers: ["cmd"],
      key: "return",
      action: "open -a Terminal",
      category: "custom",
      enabled: false,
    },
    {
      id: "binding_4",
      modifiers: ["ctrl"],
      key: "k",
      action: "yabai -m space --focus next",
      category: "space",
      enabled: true,
    },
  ]);
});

test("parseBindingConfig - category marker matches display name or id", () => {
  const { bindings } = parseBindingConfig("# === resize ===\nalt - r : open -a Notes");
  assert.equal(bindings[0].category, "resize");
});

test("parseBindingConfig - empty text", () => {
  assert.deepEqual(parseBindingConfig("").bindings, []);
});

test("parseBindingLine - minimal binding", () => {
  assert.deepEqual(parseBindingLine("alt - h : echo hi", { id: "b" }), {
    id: "b",
    modifiers: ["alt"],
    key: "h",
    action: "echo hi",
    enabled: true,
  });
});

test("parseBindingLine - lowercases modifiers, keeps key case", () => {
  const binding = parseBindingLine("Shift + ALT - J : echo", { id: "b" });
  assert.deepEqual(binding?.modifiers, ["shift", "alt"]);
  assert.equal(binding?.key, "J");
});

test("parseBindingLine - rejects comments, modes and incomplete lines", () => {
  assert.equal(parseBindingLine("# alt - h : echo"), null);
  assert.equal(parseBindingLine(":: default"), null);
  assert.equal(parseBindingLine("alt - h"), null);
  assert.equal(parseBindingLine("alt - h : "), null);
  assert.equal(parseBindingLine(" : echo"), null);
});

test("splitBindingLine - first spaced colon wins", () => {
  assert.deepEqual(splitBindingLine("alt - a : echo a : b"), {
    hotkey: "alt - a",
    action: "echo a : b",
  });
  assert.deepEqual(splitBindingLine("alt-a:echo"), { hotkey: "alt-a", action: "echo" });
  assert.equal(splitBindingLine("no separator"), null);
});

test("parseHotkey - forms", () => {
  assert.deepEqual(parseHotkey("shift + alt - j"), { modifiers: ["shift", "alt"], key: "j" });
  assert.deepEqual(parseHotkey("cmd-return"), { modifiers: ["cmd"], key: "return" });
  assert.deepEqual(parseHotkey("f1"), { modifiers: [], key: "f1" });
  assert.equal(parseHotkey("shift + alt -"), null);
  assert.equal(parseHotkey("alt - page up"), null);
});
