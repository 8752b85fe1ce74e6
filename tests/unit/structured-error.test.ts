/**
 * Unit tests for StructuredError
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import { z } from "zod";
import {
  ErrorType,
  formatZodIssues,
  isStructuredError,
  StructuredError,
} from "../../src/models/structured-error.ts";

function sampleError(): StructuredError {
  return new StructuredError(
    ErrorType.FILE_NOT_FOUND,
    "CLI",
    "File not found: /tmp/missing",
    ["Check the path", "Create the file"],
    { path: "/tmp/missing" },
  );
}

test("StructuredError - message joins component and cause", () => {
  const error = sampleError();
  assert.equal(error.message, "CLI: File not found: /tmp/missing");
  assert.equal(error.name, "StructuredError");
  assert.ok(error instanceof Error);
});

test("StructuredError - format lists context and numbered fixes", () => {
  assert.equal(
    sampleError().format(),
    [
      "✗ FILE_NOT_FOUND: CLI: File not found: /tmp/missing",
      "",
      "Context:",
      "  path: /tmp/missing",
      "",
      "Suggested fixes:",
      "  1. Check the path",
      "  2. Create the file",
    ].join("\n"),
  );
});

test("StructuredError - format serializes non-string context values", () => {
  const error = new StructuredError(ErrorType.SCHEMA_MISMATCH, "Model Serializer", "bad", ["fix"], {
    issues: ["a: b"],
  });
  assert.ok(error.format().includes('  issues: ["a: b"]'));
});

test("StructuredError - toJSON carries every field", () => {
  const json = sampleError().toJSON();
  assert.equal(json.type, "FILE_NOT_FOUND");
  assert.equal(json.component, "CLI");
  assert.deepEqual(json.remediation, ["Check the path", "Create the file"]);
  assert.deepEqual(json.context, { path: "/tmp/missing" });
});

test("isStructuredError - distinguishes plain errors", () => {
  assert.equal(isStructuredError(sampleError()), true);
  assert.equal(isStructuredError(new Error("plain")), false);
  assert.equal(isStructuredError("text"), false);
});

test("formatZodIssues - path and message per issue", () => {
  const result = z.object({ a: z.object({ b: z.number() }) }).safeParse({ a: { b: "x" } });
  assert.equal(result.success, false);
  if (!result.success) {
    assert.deepEqual(formatZodIssues(result.error), ["a.b: Expected number, received string"]);
  }
});

test("formatZodIssues - root issues", () => {
  const result = z.string().safeParse(1);
  assert.equal(result.success, false);
  if (!result.success) {
    assert.deepEqual(formatZodIssues(result.error), ["root: Expected string, received number"]);
  }
});
