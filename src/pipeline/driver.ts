/**
 * Pipeline driver.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * RUN LIFECYCLE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   initialized ──load data──▶ data_loaded ──plots──▶ plots_generated
 *        │                          │                       │
 *        ▼                          ▼                       ▼
 *      failed                     failed          ──reports──▶ reports_rendered
 *                                                                  │
 *                                                                  ▼
 *                                                              finalized
 *
 * FATAL vs RECOVERABLE
 *
 *   Fatal (run status "failed"):
 *     - the data loader reports failure or throws
 *     - modules were found but not a single plot item was produced
 *
 *   Recoverable (run status at most "partial"):
 *     - module load failures, item failures, batch faults
 *     - registry read/write problems
 *     - renderer missing or a template failing to render
 *
 * Every error and warning ends up in the returned result, prefixed with the
 * phase it came from ([DATA], [PLOTS], [REGISTRY], [REPORTS]). The registry
 * is persisted on every exit path, and a run summary is written for every
 * run that got past configuration.
 */

import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import type { PipelineConfig } from "../config/pipeline/schema.js";
import type { DataLoader, DataLoadResult } from "../data/loader.js";
import type { Logger } from "../logging/logger.js";
import type { ModuleCatalog } from "../modules/catalog.js";
import { orchestratePlotGeneration, type BatchResult } from "../orchestration/orchestrator.js";
import { hashDataset } from "../registry/hash.js";
import {
  initRegistry,
  persistRegistry,
  registerArtifact,
  type RegisterArtifactInput,
} from "../registry/registry.js";
import type { Registry } from "../registry/schema.js";
import {
  renderReports as renderReportsDefault,
  type RenderReportsOptions,
  type ReportPhaseResult,
} from "../reporting/renderer.js";
import { DataLoadError, RegistryIOError, errorMessage } from "../result/errors.js";
import {
  addError,
  addRecoverableError,
  addWarning,
  createResult,
  finalizeResult,
  setPhaseResult,
  setQualityScore,
  setResultStatus,
  type Result,
} from "../result/result.js";
import { PipelinePhase, PipelineState, type ReportPhaseStatus } from "../types/pipeline.js";
import { createRunMetadata } from "./metadata.js";
import { transitionPipelineState } from "./state-machine.js";
import {
  RUN_SUMMARY_VERSION,
  computeOverallQuality,
  writeRunSummary,
  type RunSummary,
} from "./summary.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RunPipelineOptions {
  config: PipelineConfig;
  runId: string;
  logger: Logger;
  /** Directory for the run summary; defaults to the registry's directory */
  summaryDir?: string;
  /** Record git state in the run summary (default true) */
  captureGit?: boolean;
}

export interface PipelineDependencies {
  loadData: DataLoader;
  catalog: ModuleCatalog;
  renderReports?: (options: RenderReportsOptions) => ReportPhaseResult;
}

export interface PipelineRunResult extends Result {
  runId: string;
  state: PipelineState;
  dataQualityScore: number | null;
  plotQualityScore: number | null;
  plotsGenerated: number;
  plotsFailed: number;
  artifactsRegistered: number;
  renderedReports: string[];
  failedReports: string[];
  reportStatus: ReportPhaseStatus;
  registryPath: string;
  summaryPath: string | null;
}

/** Registry workflow names for each phase. */
const WORKFLOW = {
  data: "data_load",
  plots: "plot_generation",
  reports: "reporting",
} as const;

export function plotArtifactName(moduleName: string, itemId: string, runId: string): string {
  return `${moduleName}:${itemId}:${runId}`;
}

export function resultSetArtifactName(runId: string): string {
  return `plot-results:${runId}`;
}

export function reportArtifactName(template: string, runId: string): string {
  return `report:${template}:${runId}`;
}

// ---------------------------------------------------------------------------
// Driver
// ---------------------------------------------------------------------------

export async function runPipeline(
  options: RunPipelineOptions,
  dependencies: PipelineDependencies
): Promise<PipelineRunResult> {
  const { config, runId, logger } = options;
  const registryPath = config.paths.registryPath;
  const startedAt = new Date();

  let result: Result = createResult(`pipeline:${config.study.name}`, startedAt);
  let state = PipelineState.Initialized;
  let registry: Registry = initRegistry(registryPath, logger);
  let artifactsRegistered = 0;
  let dataQualityScore: number | null = null;
  let batch: BatchResult | null = null;
  let reports: ReportPhaseResult | null = null;

  const advance = (target: PipelineState): void => {
    const transition = transitionPipelineState(state, target);
    if (!transition.success || transition.newState === undefined) {
      throw new Error(transition.error ?? `Cannot move from ${state} to ${target}`);
    }
    logger.debug("Pipeline state", { from: state, to: transition.newState });
    state = transition.newState;
  };

  const registryWarning = (err: unknown): void => {
    if (!(err instanceof RegistryIOError)) {
      throw err;
    }
    logger.warn("Registry operation failed", { error: err.message });
    result = addWarning(result, `[REGISTRY] ${err.message}`);
  };

  const register = (input: Omit<RegisterArtifactInput, "runId">): boolean => {
    try {
      registry = registerArtifact(registry, { ...input, runId }, { logger });
      artifactsRegistered++;
      return true;
    } catch (err) {
      registryWarning(err);
      return false;
    }
  };

  const persist = (): void => {
    try {
      persistRegistry(registry, registryPath);
    } catch (err) {
      registryWarning(err);
    }
  };

  const finish = (): PipelineRunResult => {
    persist();
    result = finalizeResult(result);

    const run: PipelineRunResult = {
      ...result,
      runId,
      state,
      dataQualityScore,
      plotQualityScore: batch ? batch.qualityScore : null,
      plotsGenerated: batch ? batch.plotsGenerated : 0,
      plotsFailed: batch ? batch.plotsFailed : 0,
      artifactsRegistered,
      renderedReports: reports ? reports.rendered.map((r) => r.outputPath) : [],
      failedReports: reports ? reports.failed.map((f) => f.template) : [],
      reportStatus: reports ? reports.status : "skipped",
      registryPath,
      summaryPath: null,
    };

    try {
      const summaryPath = writeRunSummary(
        buildRunSummary(run, config.study.name, startedAt, options.captureGit),
        options.summaryDir ?? dirname(registryPath)
      );
      logger.info("Run summary written", { path: summaryPath });
      return { ...run, summaryPath };
    } catch (err) {
      const warning = `[SUMMARY] Could not write run summary: ${errorMessage(err)}`;
      logger.warn(warning);
      return {
        ...run,
        status: run.status === "success" ? "partial" : run.status,
        warnings: [...run.warnings, warning],
      };
    }
  };

  const fail = (message: string): PipelineRunResult => {
    result = addError(result, message);
    advance(PipelineState.Failed);
    logger.error("Pipeline failed", { state, error: message });
    return finish();
  };

  logger.info("Pipeline started", { runId, study: config.study.name });

  // ─── Phase 1: data ───────────────────────────────────────────────────────

  let data: DataLoadResult;
  try {
    data = await dependencies.loadData(config.data.sourceFile, {
      requiredColumns: config.data.requiredColumns,
      minRows: config.data.minRows,
      columnTypes: config.data.columnTypes,
    });
  } catch (err) {
    const fault = new DataLoadError(`Data loader threw: ${errorMessage(err)}`);
    result = setPhaseResult(result, PipelinePhase.DataLoad, { status: "failed", error: fault.message });
    return fail(`[DATA] ${fault.message}`);
  }

  result = setPhaseResult(result, PipelinePhase.DataLoad, {
    status: data.status,
    qualityScore: data.qualityScore,
    qualityMetrics: data.qualityMetrics,
    rowCount: data.rowCount,
    columnCount: data.columnCount,
    durationMs: data.durationMs,
  });

  if (data.status === "failed" || data.data === null) {
    const messages = data.errors.length > 0 ? data.errors : [data.message || "Data loading failed"];
    for (const message of messages.slice(0, -1)) {
      result = addError(result, `[DATA] ${message}`);
    }
    return fail(`[DATA] ${messages.at(-1) ?? "Data loading failed"}`);
  }

  const dataset = data.data;
  dataQualityScore = data.qualityScore;
  for (const warning of data.warnings) {
    result = addWarning(result, `[DATA] ${warning}`);
  }
  logger.info("Data loaded", { rows: data.rowCount, columns: data.columnCount, quality: data.qualityScore });

  const dataArtifact = config.data.artifactName;
  register({
    name: dataArtifact,
    type: "raw-data",
    workflow: WORKFLOW.data,
    filePath: config.data.sourceFile,
    metadata: {
      datasetHash: hashDataset(dataset),
      rowCount: data.rowCount,
      columnCount: data.columnCount,
      qualityScore: data.qualityScore,
    },
  });
  advance(PipelineState.DataLoaded);

  // ─── Phase 2: plots ──────────────────────────────────────────────────────

  const plots = await orchestratePlotGeneration({
    data: dataset,
    modulesRoot: config.paths.modulesRoot,
    outputRoot: config.paths.outputRoot,
    catalog: dependencies.catalog,
    runId,
    dpi: config.plots.dpi,
    continueOnError: config.plots.continueOnError,
    itemTimeoutMs: config.plots.itemTimeoutMs ?? undefined,
    params: config.plots.params,
    logger,
  });
  batch = plots;

  for (const error of plots.errors) {
    result = addRecoverableError(result, `[PLOTS] ${error}`);
  }
  for (const warning of plots.warnings) {
    result = addWarning(result, `[PLOTS] ${warning}`);
  }
  result = setPhaseResult(result, PipelinePhase.PlotGeneration, {
    status: plots.status,
    modulesFound: plots.modulesFound,
    modulesLoaded: plots.modulesLoaded,
    modulesFailed: plots.modulesFailed,
    plotsGenerated: plots.plotsGenerated,
    plotsFailed: plots.plotsFailed,
    successRate: plots.successRate,
    qualityScore: plots.qualityScore,
    durationMs: plots.durationMs,
  });

  if (plots.modulesFound > 0 && plots.plotsGenerated === 0) {
    return fail("[PLOTS] No plots were generated");
  }

  const plotArtifacts: string[] = [];
  for (const [moduleName, items] of Object.entries(plots.results)) {
    const version = plots.modules.find((m) => m.name === moduleName)?.version ?? null;
    for (const item of Object.values(items)) {
      if (item.status === "failed" || item.outputPath === null || !existsSync(item.outputPath)) {
        continue;
      }
      const name = plotArtifactName(moduleName, item.itemId, runId);
      const registered = register({
        name,
        type: "plot",
        workflow: WORKFLOW.plots,
        filePath: item.outputPath,
        inputArtifacts: [dataArtifact],
        metadata: {
          module: moduleName,
          moduleVersion: version,
          itemId: item.itemId,
          status: item.status,
          qualityScore: item.qualityScore,
        },
      });
      if (registered) {
        plotArtifacts.push(name);
      }
    }
  }

  const resultSetName = resultSetArtifactName(runId);
  const resultSetPath = join(config.paths.outputRoot, `plot-results-${runId}.json`);
  let resultSetRegistered = false;
  try {
    mkdirSync(config.paths.outputRoot, { recursive: true });
    writeFileSync(resultSetPath, JSON.stringify(plots.results, null, 2) + "\n", "utf-8");
    resultSetRegistered = register({
      name: resultSetName,
      type: "serialized-object",
      workflow: WORKFLOW.plots,
      filePath: resultSetPath,
      inputArtifacts: plotArtifacts,
      metadata: { modules: Object.keys(plots.results).length, items: plotArtifacts.length },
    });
  } catch (err) {
    result = addWarning(result, `[REGISTRY] Could not write plot result set: ${errorMessage(err)}`);
  }

  result = setPhaseResult(result, PipelinePhase.Registration, {
    artifactsRegistered,
    plotArtifacts: plotArtifacts.length,
  });
  persist();
  advance(PipelineState.PlotsGenerated);

  // ─── Phase 3: reports ────────────────────────────────────────────────────

  const render = dependencies.renderReports ?? renderReportsDefault;
  let reportPhase: ReportPhaseResult;
  try {
    reportPhase = render({ reports: config.reports, runId, registryPath, logger });
  } catch (err) {
    reportPhase = {
      status: "failed",
      rendered: [],
      failed: [],
      warnings: [`Report rendering crashed: ${errorMessage(err)}`],
      durationMs: 0,
    };
  }
  reports = reportPhase;

  for (const warning of reportPhase.warnings) {
    result = addWarning(result, `[REPORTS] ${warning}`);
  }
  for (const report of reportPhase.rendered) {
    register({
      name: reportArtifactName(report.template, runId),
      type: "report",
      workflow: WORKFLOW.reports,
      filePath: report.outputPath,
      inputArtifacts: resultSetRegistered ? [resultSetName] : [],
      metadata: { template: report.template },
    });
  }
  result = setPhaseResult(result, PipelinePhase.Reporting, {
    status: reportPhase.status,
    rendered: reportPhase.rendered.length,
    failed: reportPhase.failed.length,
    durationMs: reportPhase.durationMs,
  });
  advance(PipelineState.ReportsRendered);

  // ─── Finalize ────────────────────────────────────────────────────────────

  const overall = computeOverallQuality(data.qualityScore, plots.qualityScore, config.quality);
  result = setQualityScore(result, overall);
  result = setResultStatus(
    result,
    "success",
    `Generated ${plots.plotsGenerated} plot(s), ${plots.plotsFailed} failed; quality ${overall}/100`
  );
  advance(PipelineState.Finalized);
  logger.info("Pipeline finished", { status: result.status, quality: overall });

  return finish();
}

function buildRunSummary(
  run: PipelineRunResult,
  study: string,
  startedAt: Date,
  captureGit: boolean | undefined
): RunSummary {
  return {
    summaryVersion: RUN_SUMMARY_VERSION,
    runId: run.runId,
    study,
    status: run.status,
    state: run.state,
    message: run.message,
    qualityScore: run.qualityScore,
    dataQualityScore: run.dataQualityScore,
    plotQualityScore: run.plotQualityScore,
    plotsGenerated: run.plotsGenerated,
    plotsFailed: run.plotsFailed,
    artifactsRegistered: run.artifactsRegistered,
    renderedReports: run.renderedReports,
    failedReports: run.failedReports,
    reportStatus: run.reportStatus,
    errors: [...run.errors],
    warnings: [...run.warnings],
    startedAt: run.startedAt,
    finishedAt: run.finishedAt,
    durationMs: run.durationMs,
    registryPath: run.registryPath,
    runMetadata: createRunMetadata({ runId: run.runId, startedAt, captureGit }),
  };
}
