/**
 * Unit tests for enumerations and lookup helpers
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import {
  HotkeyCategorySchema,
  isModifier,
  LAYOUT_INFO,
  parseHotkeyCategory,
} from "../../src/models/enums.ts";
import {
  describeSignalEvent,
  isKnownSignalEvent,
  SIGNAL_EVENTS,
  signalEventDisplayName,
} from "../../src/models/signal.ts";

test("HotkeyCategorySchema - canonical order", () => {
  assert.deepEqual(HotkeyCategorySchema.options, [
    "focus",
    "move",
    "resize",
    "layout",
    "space",
    "display",
    "custom",
  ]);
});

test("parseHotkeyCategory - display names and values, any case", () => {
  assert.equal(parseHotkeyCategory("Focus"), "focus");
  assert.equal(parseHotkeyCategory(" DISPLAY "), "display");
  assert.equal(parseHotkeyCategory("Uncategorized"), undefined);
  assert.equal(parseHotkeyCategory("apps"), undefined);
});

test("isModifier - closed modifier set", () => {
  assert.equal(isModifier("alt"), true);
  assert.equal(isModifier("hyper"), true);
  assert.equal(isModifier("super"), false);
});

test("LAYOUT_INFO - one entry per layout", () => {
  assert.deepEqual(Object.keys(LAYOUT_INFO).sort(), ["bsp", "float", "stack"]);
});

test("signal catalog - known events and descriptions", () => {
  assert.equal(SIGNAL_EVENTS.length, 28);
  assert.equal(isKnownSignalEvent("window_focused"), true);
  assert.equal(isKnownSignalEvent("window_teleported"), false);
  assert.equal(describeSignalEvent("window_focused"), "When a window gains focus");
  assert.equal(describeSignalEvent("window_teleported"), "Unknown event: window_teleported");
});

test("signalEventDisplayName - title-cased words", () => {
  assert.equal(signalEventDisplayName("window_focused"), "Window Focused");
  assert.equal(signalEventDisplayName("system_woke"), "System Woke");
});
