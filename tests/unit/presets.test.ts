/**
 * Unit tests for binding presets
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import { createBindingConfig } from "../../src/models/binding-config.ts";
import { ErrorType, isStructuredError } from "../../src/models/structured-error.ts";
import { findAllConflicts, hotkeySignature } from "../../src/services/conflict-validator.ts";
import { getPreset, listPresets, loadPreset, mergePreset } from "../../src/services/presets.ts";
import { lintBinding } from "../../src/services/structure-validator.ts";

test("listPresets - names and counts", () => {
  const presets = listPresets();
  assert.deepEqual(presets.map((p) => p.name), ["vim", "arrows", "minimal", "i3", "stack"]);
  assert.deepEqual(presets[2], {
    name: "minimal",
    display_name: "Minimal",
    description: "Essential shortcuts only",
    count: 11,
  });
});

test("getPreset - unknown name", () => {
  assert.equal(getPreset("emacs"), undefined);
});

test("loadPreset - fresh ids, fields from the preset", () => {
  const bindings = loadPreset("vim");
  assert.deepEqual(
    { ...bindings[0], id: "" },
    {
      id: "",
      modifiers: ["alt"],
      key: "h",
      action: "yabai -m window --focus west",
      category: "focus",
      description: "Focus window to the west",
      enabled: true,
    },
  );
  assert.ok(bindings[0].id.startsWith("binding_"));
  assert.equal(new Set(bindings.map((b) => b.id)).size, bindings.length);
});

test("loadPreset - unknown name", () => {
  assert.throws(
    () => loadPreset("emacs"),
    (error: unknown) =>
      isStructuredError(error) &&
      error.type === ErrorType.PRESET_NOT_FOUND &&
      error.cause === 'Unknown preset "emacs"',
  );
});

test("presets - every binding is well formed and conflict free", () => {
  for (const { name } of listPresets()) {
    const bindings = loadPreset(name);
    assert.deepEqual(findAllConflicts(bindings), [], name);
    for (const binding of bindings) {
      assert.deepEqual(lintBinding(binding), [], `${name}: ${binding.key}`);
    }
  }
});

test("mergePreset - keeps existing bindings, skips used hotkeys", () => {
  const existing = createBindingConfig([
    { id: "mine", modifiers: ["alt"], key: "h", action: "open -a Notes", enabled: true },
    { id: "off", modifiers: ["ALT"], key: "1", action: "echo one", enabled: false },
  ]);
  const merged = mergePreset(existing, "minimal");

  assert.equal(merged.bindings.length, 11);
  assert.deepEqual(merged.bindings.slice(0, 2), existing.bindings);
  assert.equal(merged.bindings[2].action, "yabai -m window --focus east");
  const signatures = merged.bindings.map((b) => hotkeySignature(b.modifiers, b.key));
  assert.equal(new Set(signatures).size, 11);
});
