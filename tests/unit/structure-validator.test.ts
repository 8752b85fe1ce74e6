/**
 * Unit tests for StructureValidator
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import {
  isValidKey,
  lintBinding,
  validateBindingText,
  validateDirectiveText,
} from "../../src/services/structure-validator.ts";

test("validateDirectiveText - reports each problem on its line", () => {
  const text = [
    "#!/usr/bin/env sh",
    "yabai -m config layout grid",
    "yabai -m signal --add event=window_focused",
    "yabai config layout bsp",
    "yabai -m rule --add manage=off",
    "yabai -m rule app=Finder",
    "sudo yabai --load-sa",
    'echo "done"',
    "FOO=bar",
    "yabai -m config --space 2 layout stack",
    "yabai -m config",
  ].join("\n");

  assert.deepEqual(
    validateDirectiveText(text).map((d) => [d.line, d.severity, d.message]),
    [
      [2, "warning", 'Invalid value "grid" for layout; the line is ignored'],
      [3, "error", "Signal --add missing action parameter"],
      [4, "error", "Missing -m flag in yabai command"],
      [5, "warning", "Rule --add has no app or title selector and is ignored"],
      [6, "error", "Rule command missing --add or --remove"],
      [7, "error", "Unrecognized command"],
      [11, "error", "Invalid config command format"],
    ],
  );
});

test("validateDirectiveText - fractional value for an integer setting", () => {
  assert.deepEqual(
    validateDirectiveText("yabai -m config window_gap 8.5").map((d) => [d.line, d.severity, d.message]),
    [[1, "warning", 'Invalid value "8.5" for window_gap; the line is ignored']],
  );
});

test("validateDirectiveText - keeps the trimmed line text", () => {
  const [diagnostic] = validateDirectiveText("   yabai -m signal --add action=x  ");
  assert.equal(diagnostic.text, "yabai -m signal --add action=x");
  assert.equal(diagnostic.message, "Signal --add missing event parameter");
});

test("validateDirectiveText - clean file", () => {
  assert.deepEqual(
    validateDirectiveText(
      'yabai -m config layout bsp\nyabai -m rule --add app="^Finder$" manage=off\n# note\n',
    ),
    [],
  );
});

test("validateDirectiveText - other program name", () => {
  const diagnostics = validateDirectiveText("wm -m config layout bsp\nyabai -m config layout bsp", {
    engine: { directiveProgram: "wm" },
  });
  assert.deepEqual(diagnostics.map((d) => [d.line, d.message]), [[2, "Unrecognized command"]]);
});

test("validateBindingText - separators, formats, lint and duplicates", () => {
  const text = [
    "# comment",
    "alt - h : echo a",
    "alt - x",
    "alt - page up : echo b",
    "super - h : echo c",
    "alt - pgup : echo d",
    "ALT - H : echo e",
    ":: mode",
    "alt + shift - h : echo f",
    "shift + alt - h : echo g",
  ].join("\n");

  assert.deepEqual(
    validateBindingText(text).map((d) => [d.line, d.severity, d.message]),
    [
      [3, "error", 'Missing command separator ":"'],
      [4, "error", "Invalid shortcut format"],
      [5, "warning", 'Unknown modifier "super"'],
      [6, "warning", 'Unknown key "pgup"'],
      [7, "warning", 'Duplicate hotkey "alt - H" (first bound on line 2)'],
      [10, "warning", 'Duplicate hotkey "shift + alt - h" (first bound on line 9)'],
    ],
  );
});

test("validateBindingText - disabled lines are not checked", () => {
  assert.deepEqual(
    validateBindingText("alt - h : echo a\n# [DISABLED] alt - h : echo b"),
    [],
  );
});

test("isValidKey - accepted key names", () => {
  for (const key of ["a", "7", "F12", "return", "PageUp", "kp_enter", "0x2C"]) {
    assert.equal(isValidKey(key), true, key);
  }
  for (const key of ["f21", "pgup", "ab", "0x123"]) {
    assert.equal(isValidKey(key), false, key);
  }
});

test("lintBinding - modifier case ignored", () => {
  assert.deepEqual(lintBinding({ modifiers: ["Shift", "hyper"], key: "space" }), []);
  assert.deepEqual(lintBinding({ modifiers: ["win"], key: "?" }), [
    'Unknown modifier "win"',
    'Unknown key "?"',
  ]);
});
