/**
 * Unit tests for ModelSerializer
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import { createDirectiveConfig } from "../../src/models/directive-config.ts";
import { buildSettings } from "../../src/models/directive-settings.ts";
import type { ExclusionRule } from "../../src/models/exclusion-rule.ts";
import { ErrorType, isStructuredError } from "../../src/models/structured-error.ts";
import {
  deserializeBindingConfig,
  deserializeDirectiveConfig,
  serializeBindingConfig,
  serializeDirectiveConfig,
} from "../../src/services/model-serializer.ts";

const CONFIG = createDirectiveConfig({
  settings: buildSettings({ layout: "stack", window_gap: 10, external_bar: "main:30:0" }),
  extra_settings: [{ key: "menubar_opacity", value: "0.5" }],
  rules: [{ id: "rule_0", app_name: "Finder", manage: false, layer: "above", enabled: true }],
  signals: [{ id: "signal_0", event: "window_created", action: "echo new", enabled: false }],
  spaces: [{ index: 1, label: "main", layout: "bsp" }],
});

const EXCLUSIONS: ExclusionRule[] = [
  { id: "exclusion_0", app_name: "Finder", manage_off: true, sticky: false, layer: "normal", enabled: true },
];

function errorOf(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  assert.fail("expected an error");
}

test("serializeDirectiveConfig - snake_case document keys", () => {
  const document = JSON.parse(serializeDirectiveConfig(CONFIG, EXCLUSIONS));
  assert.deepEqual(Object.keys(document), [
    "settings",
    "extra_settings",
    "rules",
    "signals",
    "spaces",
    "exclusions",
  ]);
  assert.equal(document.settings.window_gap, 10);
  assert.equal(document.rules[0].app_name, "Finder");
});

test("serializeDirectiveConfig - two-space indent", () => {
  const json = serializeDirectiveConfig(createDirectiveConfig());
  assert.equal(json.split("\n")[1], '  "settings": {');
});

test("deserializeDirectiveConfig - restores what was serialized", () => {
  assert.deepEqual(deserializeDirectiveConfig(serializeDirectiveConfig(CONFIG, EXCLUSIONS)), {
    config: CONFIG,
    exclusions: EXCLUSIONS,
  });
});

test("deserializeDirectiveConfig - missing fields take defaults", () => {
  assert.deepEqual(deserializeDirectiveConfig("{}"), {
    config: createDirectiveConfig(),
    exclusions: [],
  });
});

test("deserializeDirectiveConfig - invalid JSON", () => {
  const error = errorOf(() => deserializeDirectiveConfig("{settings:"));
  assert.ok(isStructuredError(error));
  assert.equal(error.type, ErrorType.INVALID_JSON);
  assert.ok(error.cause.startsWith("Directive document is not valid JSON: "));
});

test("deserializeDirectiveConfig - wrong enum value", () => {
  const error = errorOf(() => deserializeDirectiveConfig('{"settings":{"layout":"grid"}}'));
  assert.ok(isStructuredError(error));
  assert.equal(error.type, ErrorType.SCHEMA_MISMATCH);
  assert.equal(error.cause, "Directive document does not match the expected shape (1 issue)");
});

test("deserializeDirectiveConfig - duplicate space indexes", () => {
  const error = errorOf(() =>
    deserializeDirectiveConfig('{"spaces":[{"index":1},{"index":1,"label":"x"}]}')
  );
  assert.ok(isStructuredError(error));
  assert.deepEqual(error.context, { issues: ["spaces.1.index: Duplicate space index 1"] });
});

test("binding documents - restore what was serialized", () => {
  const config = {
    bindings: [
      { id: "b0", modifiers: ["alt"], key: "h", action: "echo h", category: "focus" as const, enabled: true },
      { id: "b1", modifiers: [], key: "f1", action: "echo f1", description: "One", enabled: false },
    ],
  };
  assert.deepEqual(deserializeBindingConfig(serializeBindingConfig(config)), config);
});

test("deserializeBindingConfig - duplicate ids", () => {
  const json = JSON.stringify({
    bindings: [
      { id: "b", modifiers: [], key: "a", action: "x" },
      { id: "b", modifiers: [], key: "c", action: "y" },
    ],
  });
  const error = errorOf(() => deserializeBindingConfig(json));
  assert.ok(isStructuredError(error));
  assert.equal(error.cause, "Binding document does not match the expected shape (1 issue)");
  assert.deepEqual(error.context, { issues: ["bindings.1.id: Duplicate binding id b"] });
});
