/**
 * Run summary, quality blend and state machine tests.
 *
 * Run: node --import tsx --test src/pipeline/summary.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { after, describe, test } from "node:test";

import { PipelineState } from "../types/pipeline.js";
import { createRunMetadata } from "./metadata.js";
import { isTerminalPipelineState, transitionPipelineState } from "./state-machine.js";
import {
  RunSummaryError,
  computeOverallQuality,
  deserializeRunSummary,
  exitCodeForStatus,
  getRunSummaryFilename,
  readRunSummary,
  writeRunSummary,
  type RunSummary,
} from "./summary.js";

const TMP = mkdtempSync(join(tmpdir(), "summary-"));

after(() => {
  rmSync(TMP, { recursive: true, force: true });
});

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

function summary(overrides: Partial<RunSummary> = {}): RunSummary {
  return {
    summaryVersion: "1.0",
    runId: "20260102-abc123",
    study: "demo",
    status: "partial",
    state: "finalized",
    message: "done",
    qualityScore: 86,
    dataQualityScore: 80,
    plotQualityScore: 90,
    plotsGenerated: 5,
    plotsFailed: 0,
    artifactsRegistered: 7,
    renderedReports: [],
    failedReports: [],
    reportStatus: "skipped",
    errors: [],
    warnings: ["[PLOTS] something"],
    startedAt: "2026-01-02T10:00:00.000Z",
    finishedAt: "2026-01-02T10:00:05.000Z",
    durationMs: 5000,
    registryPath: "output/artifact-registry.json",
    runMetadata: {
      runId: "20260102-abc123",
      startedAt: "2026-01-02T10:00:00.000Z",
      nodeVersion: "v20.0.0",
    },
    ...overrides,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// OVERALL QUALITY
// ═══════════════════════════════════════════════════════════════════════════

describe("computeOverallQuality", () => {
  test("data 80 and plots 90 blend to 86", () => {
    assert.equal(computeOverallQuality(80, 90), 86);
  });

  test("honours custom weights", () => {
    assert.equal(computeOverallQuality(50, 100, { dataWeight: 0.5, plotWeight: 0.5 }), 75);
  });

  test("rounds to two decimals", () => {
    assert.equal(computeOverallQuality(33.333, 66.667), 53.33);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// EXIT CODES
// ═══════════════════════════════════════════════════════════════════════════

describe("exitCodeForStatus", () => {
  test("only failed runs exit non-zero", () => {
    assert.equal(exitCodeForStatus("success"), 0);
    assert.equal(exitCodeForStatus("partial"), 0);
    assert.equal(exitCodeForStatus("failed"), 1);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// STATE MACHINE
// ═══════════════════════════════════════════════════════════════════════════

describe("state machine", () => {
  test("follows the forward path", () => {
    assert.deepEqual(transitionPipelineState(PipelineState.Initialized, PipelineState.DataLoaded), {
      success: true,
      newState: PipelineState.DataLoaded,
    });
  });

  test("rejects skipping a state", () => {
    const result = transitionPipelineState(PipelineState.Initialized, PipelineState.PlotsGenerated);
    assert.equal(result.success, false);
    assert.equal(result.error, "Invalid pipeline state transition: initialized -> plots_generated");
  });

  test("failed is reachable from every non-terminal state", () => {
    for (const state of [
      PipelineState.Initialized,
      PipelineState.DataLoaded,
      PipelineState.PlotsGenerated,
      PipelineState.ReportsRendered,
    ]) {
      assert.equal(transitionPipelineState(state, PipelineState.Failed).success, true);
      assert.equal(isTerminalPipelineState(state), false);
    }
  });

  test("terminal states have no way out", () => {
    assert.equal(transitionPipelineState(PipelineState.Failed, PipelineState.Finalized).success, false);
    assert.equal(transitionPipelineState(PipelineState.Finalized, PipelineState.Failed).success, false);
    assert.equal(isTerminalPipelineState(PipelineState.Finalized), true);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// RUN SUMMARY FILES
// ═══════════════════════════════════════════════════════════════════════════

describe("run summary files", () => {
  test("filename follows the run id", () => {
    assert.equal(getRunSummaryFilename("20260102-abc123"), "run-summary-20260102-abc123.json");
  });

  test("write then read returns the same summary", () => {
    const path = writeRunSummary(summary(), join(TMP, "nested"));
    assert.equal(path, join(TMP, "nested", "run-summary-20260102-abc123.json"));
    assert.deepEqual(readRunSummary(path), summary());
  });

  test("rejects malformed summaries", () => {
    assert.throws(() => deserializeRunSummary("{"), RunSummaryError);
    assert.throws(() => deserializeRunSummary(JSON.stringify({ runId: "x" })), RunSummaryError);
    const path = join(TMP, "bad.json");
    writeFileSync(path, JSON.stringify({ ...summary(), status: "great" }));
    assert.throws(() => readRunSummary(path), /status/);
  });

  test("run metadata records node version and optional context", () => {
    const metadata = createRunMetadata({
      runId: "20260102-abc123",
      startedAt: new Date("2026-01-02T10:00:00.000Z"),
      captureGit: false,
      captureHostname: false,
      context: { trigger: "test" },
    });
    assert.deepEqual(metadata, {
      runId: "20260102-abc123",
      startedAt: "2026-01-02T10:00:00.000Z",
      nodeVersion: process.version,
      context: { trigger: "test" },
    });
  });
});
