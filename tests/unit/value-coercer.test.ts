/**
 * Unit tests for ValueCoercer
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import { LayoutSchema } from "../../src/models/enums.ts";
import {
  asBoolean,
  asEnum,
  asFloat,
  asInteger,
  asString,
  coerceSetting,
  coerceValue,
  formatFloat,
  formatSettingValue,
} from "../../src/services/value-coercer.ts";

test("coerceValue - boolean literals", () => {
  for (const raw of ["on", "yes", "true"]) assert.equal(coerceValue(raw), true);
  for (const raw of ["off", "no", "false"]) assert.equal(coerceValue(raw), false);
});

test("coerceValue - literals are case-sensitive", () => {
  assert.equal(coerceValue("ON"), "ON");
});

test("coerceValue - integers before floats", () => {
  assert.equal(coerceValue("2"), 2);
  assert.equal(coerceValue("-12"), -12);
  assert.equal(coerceValue("0.75"), 0.75);
  assert.equal(coerceValue("1e2"), 100);
});

test("coerceValue - strings lose one quote layer", () => {
  assert.equal(coerceValue('"hello world"'), "hello world");
  assert.equal(coerceValue("0xff775759"), "0xff775759");
});

test("coerceValue - quoted tokens stay strings", () => {
  assert.equal(coerceValue("2", { quoted: true }), "2");
  assert.equal(coerceValue("on", { quoted: true }), "on");
});

test("asBoolean - accepts literals in any case", () => {
  assert.equal(asBoolean("ON"), true);
  assert.equal(asBoolean("No"), false);
  assert.equal(asBoolean(1), undefined);
  assert.equal(asBoolean("maybe"), undefined);
});

test("asInteger - rejects non-integral numbers and parses integer strings", () => {
  assert.equal(asInteger(2.9), undefined);
  assert.equal(asInteger(3.0), 3);
  assert.equal(asInteger("7"), 7);
  assert.equal(asInteger("7.5"), undefined);
  assert.equal(asInteger(true), undefined);
});

test("asFloat - numbers and numeric strings", () => {
  assert.equal(asFloat(3), 3);
  assert.equal(asFloat("0.25"), 0.25);
  assert.equal(asFloat("abc"), undefined);
});

test("asString - booleans render as on/off", () => {
  assert.equal(asString(true), "on");
  assert.equal(asString(false), "off");
  assert.equal(asString(4), "4");
  assert.equal(asString(undefined), undefined);
});

test("asEnum - membership check", () => {
  assert.equal(asEnum(LayoutSchema, "float"), "float");
  assert.equal(asEnum(LayoutSchema, "grid"), undefined);
});

test("coerceSetting - by declared kind", () => {
  assert.equal(coerceSetting("auto_balance", "on"), true);
  assert.equal(coerceSetting("window_gap", "10"), 10);
  assert.equal(coerceSetting("window_gap", "wide"), undefined);
  assert.equal(coerceSetting("window_gap", "6.5"), undefined);
  assert.equal(coerceSetting("split_ratio", "0.6"), 0.6);
  assert.equal(coerceSetting("layout", "stack"), "stack");
  assert.equal(coerceSetting("layout", "grid"), undefined);
});

test("coerceSetting - string settings keep hex colors verbatim", () => {
  assert.equal(coerceSetting("active_window_border_color", "0xff00ff00"), "0xff00ff00");
  assert.equal(coerceSetting("external_bar", '"all:26:0"'), "all:26:0");
  assert.equal(coerceSetting("external_bar", '""'), undefined);
});

test("formatFloat - integral values keep one decimal", () => {
  assert.equal(formatFloat(1), "1.0");
  assert.equal(formatFloat(0), "0.0");
  assert.equal(formatFloat(0.9), "0.9");
});

test("formatSettingValue - per kind", () => {
  assert.equal(formatSettingValue("auto_balance", false), "off");
  assert.equal(formatSettingValue("split_ratio", 1), "1.0");
  assert.equal(formatSettingValue("window_gap", 6), "6");
  assert.equal(formatSettingValue("layout", "bsp"), "bsp");
  assert.equal(formatSettingValue("external_bar", "all 26"), '"all 26"');
});
