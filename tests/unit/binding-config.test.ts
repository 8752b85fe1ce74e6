/**
 * Unit tests for hotkey bindings and the binding-side aggregate
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import {
  addBinding,
  BindingConfigSchema,
  bindingsByCategory,
  categoriesInUse,
  createBindingConfig,
  disabledCount,
  enabledCount,
  findBinding,
  removeBinding,
  toggleBinding,
  updateBinding,
} from "../../src/models/binding-config.ts";
import {
  createHotkeyBinding,
  formatBindingLine,
  formatHotkey,
  generateBindingId,
  hotkeyDisplay,
} from "../../src/models/hotkey-binding.ts";
import { ErrorType, isStructuredError } from "../../src/models/structured-error.ts";

const focusWest = createHotkeyBinding({
  id: "b1",
  modifiers: ["alt"],
  key: "h",
  action: "yabai -m window --focus west",
  category: "focus",
});
const terminal = createHotkeyBinding({ id: "b2", modifiers: ["cmd"], key: "return", action: "open -a Terminal" });

test("generateBindingId - prefixed time-based id", () => {
  assert.match(generateBindingId(), /^binding_\d+_[a-z0-9]{7}$/);
});

test("createHotkeyBinding - rejects keys with whitespace", () => {
  assert.throws(() => createHotkeyBinding({ key: "a b", action: "x" }));
});

test("formatHotkey - modifiers joined with plus", () => {
  assert.equal(formatHotkey({ modifiers: ["shift", "alt"], key: "j" }), "shift + alt - j");
  assert.equal(formatHotkey({ modifiers: [], key: "f1" }), "f1");
});

test("formatBindingLine - hotkey and action", () => {
  assert.equal(formatBindingLine(focusWest), "alt - h : yabai -m window --focus west");
});

test("hotkeyDisplay - symbols", () => {
  assert.equal(hotkeyDisplay({ modifiers: ["shift", "alt"], key: "j" }), "⇧⌥J");
  assert.equal(hotkeyDisplay({ modifiers: ["cmd"], key: "left" }), "⌘←");
});

test("addBinding - duplicate id raises DUPLICATE_ID", () => {
  const config = addBinding(createBindingConfig(), focusWest);
  assert.throws(
    () => addBinding(config, focusWest),
    (error: unknown) => isStructuredError(error) && error.type === ErrorType.DUPLICATE_ID,
  );
});

test("binding operations - update, toggle, remove", () => {
  let config = createBindingConfig([focusWest, terminal]);
  config = updateBinding(config, { ...terminal, key: "t" });
  assert.equal(findBinding(config, "b2")?.key, "t");
  config = toggleBinding(config, "b1");
  assert.equal(enabledCount(config), 1);
  assert.equal(disabledCount(config), 1);
  assert.deepEqual(removeBinding(config, "b1").bindings.map((b) => b.id), ["b2"]);
});

test("categoriesInUse - canonical order, uncategorized last", () => {
  const resize = createHotkeyBinding({ id: "b3", key: "r", action: "x", category: "resize" });
  const config = createBindingConfig([terminal, resize, focusWest]);
  assert.deepEqual(categoriesInUse(config), ["focus", "resize", undefined]);
  assert.deepEqual(bindingsByCategory(config, undefined).map((b) => b.id), ["b2"]);
});

test("BindingConfigSchema - duplicate ids are rejected", () => {
  const result = BindingConfigSchema.safeParse({
    bindings: [
      { id: "x", key: "a", action: "echo a" },
      { id: "x", key: "b", action: "echo b" },
    ],
  });
  assert.equal(result.success, false);
});
