/**
 * Run summary: the per-run audit record written next to the registry.
 *
 * FILE NAMING CONVENTION:
 * Summaries are saved as run-summary-{runId}.json, so they line up with
 * the log lines and the registry entries of the same run.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import type { QualityWeights } from "../config/pipeline/schema.js";

export const RUN_SUMMARY_VERSION = "1.0";

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export const GitStateSchema = z
  .object({
    commitSha: z.string(),
    commitShort: z.string(),
    branch: z.string(),
    isDirty: z.boolean(),
    commitDate: z.string(),
  })
  .strict();

export type GitState = z.infer<typeof GitStateSchema>;

export const RunMetadataSchema = z
  .object({
    runId: z.string().min(1),
    startedAt: z.string().datetime(),
    nodeVersion: z.string(),
    hostname: z.string().optional(),
    git: GitStateSchema.optional(),
    context: z.record(z.unknown()).optional(),
  })
  .strict();

export type RunMetadata = z.infer<typeof RunMetadataSchema>;

const StatusSchema = z.enum(["success", "partial", "failed"]);

export const RunSummarySchema = z
  .object({
    summaryVersion: z.string(),
    runId: z.string().min(1),
    study: z.string(),
    status: StatusSchema,
    state: z.string(),
    message: z.string(),
    qualityScore: z.number().nullable(),
    dataQualityScore: z.number().nullable(),
    plotQualityScore: z.number().nullable(),
    plotsGenerated: z.number().int(),
    plotsFailed: z.number().int(),
    artifactsRegistered: z.number().int(),
    renderedReports: z.array(z.string()),
    failedReports: z.array(z.string()),
    reportStatus: z.string(),
    errors: z.array(z.string()),
    warnings: z.array(z.string()),
    startedAt: z.string().datetime(),
    finishedAt: z.string().datetime().nullable(),
    durationMs: z.number().nullable(),
    registryPath: z.string(),
    runMetadata: RunMetadataSchema,
  })
  .strict();

export type RunSummary = z.infer<typeof RunSummarySchema>;

export class RunSummaryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RunSummaryError";
  }
}

// ---------------------------------------------------------------------------
// Quality and exit codes
// ---------------------------------------------------------------------------

/**
 * Weighted blend of data and plot quality, rounded to two decimals.
 */
export function computeOverallQuality(
  dataQuality: number,
  plotQuality: number,
  weights: QualityWeights = { dataWeight: 0.4, plotWeight: 0.6 }
): number {
  const blended = dataQuality * weights.dataWeight + plotQuality * weights.plotWeight;
  return Math.round(blended * 100) / 100;
}

/**
 * Process exit code for a run status. A partial run still exits 0.
 */
export function exitCodeForStatus(status: "success" | "partial" | "failed"): number {
  return status === "failed" ? 1 : 0;
}

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

export function serializeRunSummary(summary: RunSummary, pretty = true): string {
  return JSON.stringify(summary, null, pretty ? 2 : undefined);
}

/**
 * @throws RunSummaryError if the JSON is malformed or does not match the schema
 */
export function deserializeRunSummary(json: string): RunSummary {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new RunSummaryError(
      `Failed to parse run summary JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const result = RunSummarySchema.safeParse(parsed);
  if (!result.success) {
    const errors = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new RunSummaryError(`Invalid run summary format: ${errors}`);
  }
  return result.data;
}

export function getRunSummaryFilename(runId: string): string {
  return `run-summary-${runId}.json`;
}

/**
 * Write a run summary and return its path.
 */
export function writeRunSummary(summary: RunSummary, directory: string, filename?: string): string {
  const filePath = join(directory, filename ?? getRunSummaryFilename(summary.runId));

  if (!existsSync(directory)) {
    mkdirSync(directory, { recursive: true });
  }

  writeFileSync(filePath, serializeRunSummary(summary) + "\n", "utf-8");
  return filePath;
}

export function readRunSummary(filePath: string): RunSummary {
  if (!existsSync(filePath)) {
    throw new RunSummaryError(`Run summary not found: ${filePath}`);
  }
  return deserializeRunSummary(readFileSync(filePath, "utf-8"));
}
