/**
 * Tests for the Result model.
 *
 * Run: node --import tsx --test src/result/result.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, test } from "node:test";

import {
  createResult,
  addError,
  addRecoverableError,
  addWarning,
  setResultStatus,
  setPhaseResult,
  finalizeResult,
  formatResultSummary,
  worseStatus,
} from "./result.js";
import { DataLoadError, RegistryIOError, errorMessage } from "./errors.js";

const START = new Date("2026-01-05T10:00:00.000Z");

// ═══════════════════════════════════════════════════════════════════════════
// CREATE
// ═══════════════════════════════════════════════════════════════════════════

describe("createResult", () => {
  test("starts as success with empty lists", () => {
    const result = createResult("load", START);
    assert.equal(result.status, "success");
    assert.deepEqual(result.errors, []);
    assert.deepEqual(result.warnings, []);
    assert.equal(result.startedAt, "2026-01-05T10:00:00.000Z");
    assert.equal(result.finishedAt, null);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// STATUS ESCALATION
// ═══════════════════════════════════════════════════════════════════════════

describe("status escalation", () => {
  test("addError forces failed", () => {
    const result = addError(createResult("x"), "boom");
    assert.equal(result.status, "failed");
    assert.deepEqual(result.errors, ["boom"]);
  });

  test("addError does not mutate its input", () => {
    const original = createResult("x");
    addError(original, "boom");
    assert.equal(original.status, "success");
    assert.deepEqual(original.errors, []);
  });

  test("recoverable error degrades to partial", () => {
    const result = addRecoverableError(createResult("x"), "module missing");
    assert.equal(result.status, "partial");
    assert.deepEqual(result.errors, ["module missing"]);
  });

  test("recoverable error keeps failed", () => {
    const result = addRecoverableError(addError(createResult("x"), "fatal"), "later");
    assert.equal(result.status, "failed");
    assert.deepEqual(result.errors, ["fatal", "later"]);
  });

  test("warning degrades success to partial", () => {
    const result = addWarning(createResult("x"), "slow");
    assert.equal(result.status, "partial");
    assert.deepEqual(result.warnings, ["slow"]);
  });

  test("setResultStatus cannot improve partial", () => {
    const partial = addWarning(createResult("x"), "w");
    const result = setResultStatus(partial, "success", "all good");
    assert.equal(result.status, "partial");
    assert.equal(result.message, "all good");
  });

  test("setResultStatus cannot improve failed", () => {
    const failed = addError(createResult("x"), "e");
    assert.equal(setResultStatus(failed, "partial", "m").status, "failed");
  });

  test("setResultStatus can degrade success", () => {
    assert.equal(setResultStatus(createResult("x"), "partial", "m").status, "partial");
  });

  test("worseStatus orders success < partial < failed", () => {
    assert.equal(worseStatus("success", "partial"), "partial");
    assert.equal(worseStatus("failed", "partial"), "failed");
    assert.equal(worseStatus("success", "success"), "success");
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// PHASE RESULTS AND FINALIZE
// ═══════════════════════════════════════════════════════════════════════════

describe("phase results and finalize", () => {
  test("setPhaseResult adds without dropping earlier phases", () => {
    let result = setPhaseResult(createResult("x"), "data_load", { rows: 3 });
    result = setPhaseResult(result, "plot_generation", { plots: 5 });
    assert.deepEqual(Object.keys(result.phaseResults), ["data_load", "plot_generation"]);
  });

  test("finalizeResult stamps duration once", () => {
    const result = finalizeResult(createResult("x", START), new Date("2026-01-05T10:00:02.500Z"));
    assert.equal(result.durationMs, 2500);
    assert.equal(result.finishedAt, "2026-01-05T10:00:02.500Z");
    const again = finalizeResult(result, new Date("2026-01-05T11:00:00.000Z"));
    assert.equal(again.durationMs, 2500);
  });

  test("formatResultSummary lists errors", () => {
    const result = finalizeResult(
      addError(createResult("run", START), "no data"),
      new Date("2026-01-05T10:00:01.000Z")
    );
    assert.equal(
      formatResultSummary(result),
      "[failed] run (1.00 sec, 1 issue)\nErrors:\n  - no data"
    );
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// ERRORS
// ═══════════════════════════════════════════════════════════════════════════

describe("errors", () => {
  test("only data load errors are fatal", () => {
    assert.equal(new DataLoadError("x").fatal, true);
    assert.equal(new RegistryIOError("x").fatal, false);
    assert.equal(new RegistryIOError("x").kind, "registry_io");
  });

  test("errorMessage handles non-Error values", () => {
    assert.equal(errorMessage(new Error("a")), "a");
    assert.equal(errorMessage("b"), "b");
  });
});
