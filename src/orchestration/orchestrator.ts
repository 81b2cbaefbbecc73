/**
 * Batch orchestrator.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * ONE RUN OF THE PLOT PHASE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   discover  →  load all  →  plan dependencies  →  per module:
 *                                                     init → enumerate → batch → cleanup
 *                                                  →  merge + score
 *
 * Modules run one after another, each after the modules it requires. A
 * module on a dependency cycle, or whose requirements are not met, is
 * skipped and counted as failed. Each step is wrapped on its own, so a
 * module that fails to load, init or enumerate, or that throws from its
 * batch call, is recorded and the next module still runs. `cleanup` runs
 * for every module whose `init` was attempted, whatever followed.
 *
 * The orchestrator never throws for plugin faults. Everything ends up in
 * the returned BatchResult: counts, per-item results, errors and warnings.
 *
 * STATUS
 *
 *   no modules found               partial (warning, report-only run)
 *   modules found, none loaded     failed
 *   any module or item failure     partial
 *   nothing attempted              partial
 *   otherwise                      success
 */

import { mkdirSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import type { Logger } from "../logging/logger.js";
import { ModuleDiscoveryError, errorMessage } from "../result/errors.js";
import type { ResultStatus } from "../result/result.js";
import type { Dataset } from "../types/dataset.js";
import {
  ModuleStatus,
  type ModuleDescriptor,
  type ModuleMetadata,
  type PlotConfig,
  type PlotModule,
  type PlotResult,
} from "../types/module.js";
import { failedPlotResult } from "../modules/batch.js";
import type { ModuleCatalog } from "../modules/catalog.js";
import { planModuleRun } from "../modules/dependencies.js";
import { discoverModules } from "../modules/discovery.js";
import { loadModule } from "../modules/loader.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface OrchestrateOptions {
  data: Dataset;
  modulesRoot: string;
  /** Each module writes into `<outputRoot>/<module name>` */
  outputRoot: string;
  catalog: ModuleCatalog;
  runId: string;
  dpi?: number;
  /** Default true */
  continueOnError?: boolean;
  itemTimeoutMs?: number;
  params?: Readonly<Record<string, unknown>>;
  /** Checks commands modules declare; defaults to a PATH lookup */
  commandAvailable?: (command: string) => boolean;
  logger: Logger;
}

export interface ModuleRunSummary {
  name: string;
  loaded: boolean;
  version: string | null;
  itemsAttempted: number;
  error: string | null;
}

export interface BatchResult {
  status: ResultStatus;
  modulesFound: number;
  modulesLoaded: number;
  modulesFailed: number;
  plotsGenerated: number;
  plotsFailed: number;
  /** generated / attempted, 0 when nothing was attempted */
  successRate: number;
  /** 0-100 */
  qualityScore: number;
  durationMs: number;
  startedAt: string;
  errors: string[];
  warnings: string[];
  modules: ModuleRunSummary[];
  /** module name → item id → result */
  results: Record<string, Record<string, PlotResult>>;
}

const DEFAULT_DPI = 300;

const PlotResultSchema = z.object({
  itemId: z.string(),
  status: z.enum(["success", "partial", "failed"]),
  outputPath: z.string().nullable(),
  qualityScore: z.number().min(0).max(100),
  durationMs: z.number().min(0),
  error: z.string().nullable(),
  warnings: z.array(z.string()),
  message: z.string().optional(),
});

const BatchOutputSchema = z.record(z.unknown());

// ---------------------------------------------------------------------------
// Per-module execution
// ---------------------------------------------------------------------------

interface ModuleOutcome {
  results: Record<string, PlotResult>;
  itemsAttempted: number;
  error: string | null;
  warnings: string[];
}

/**
 * Coerce a batch output entry into a PlotResult keyed by `itemId`.
 */
function normalizeEntry(itemId: string, entry: unknown): PlotResult {
  const parsed = PlotResultSchema.safeParse(entry);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const detail = issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid value";
    return failedPlotResult(itemId, `Malformed result (${detail})`);
  }
  return { ...parsed.data, itemId };
}

async function runModule(
  name: string,
  module: PlotModule,
  data: Dataset,
  config: PlotConfig,
  logger: Logger
): Promise<ModuleOutcome> {
  try {
    if (module.init) {
      await module.init(config);
    }
  } catch (err) {
    const outcome = emptyOutcome(`Module "${name}" init failed: ${errorMessage(err)}`);
    return withCleanup(name, module, outcome, logger);
  }
  const outcome = await runBatch(name, module, data, config, logger);
  return withCleanup(name, module, outcome, logger);
}

function emptyOutcome(error: string): ModuleOutcome {
  return { results: {}, itemsAttempted: 0, error, warnings: [] };
}

async function withCleanup(
  name: string,
  module: PlotModule,
  outcome: ModuleOutcome,
  logger: Logger
): Promise<ModuleOutcome> {
  if (!module.cleanup) {
    return outcome;
  }
  try {
    await module.cleanup();
    return outcome;
  } catch (err) {
    const warning = `Module "${name}" cleanup failed: ${errorMessage(err)}`;
    logger.warn("Module cleanup failed", { error: errorMessage(err) });
    return { ...outcome, warnings: [...outcome.warnings, warning] };
  }
}

async function runBatch(
  name: string,
  module: PlotModule,
  data: Dataset,
  config: PlotConfig,
  logger: Logger
): Promise<ModuleOutcome> {
  let itemIds: string[];
  try {
    itemIds = module.getAvailablePlots().map((item) => item.id);
  } catch (err) {
    return emptyOutcome(`Module "${name}" failed to enumerate items: ${errorMessage(err)}`);
  }

  try {
    mkdirSync(config.outputDir, { recursive: true });
  } catch (err) {
    return emptyOutcome(`Module "${name}" output directory unavailable: ${errorMessage(err)}`);
  }

  logger.info("Generating plots", { items: itemIds.length });

  let output: unknown;
  try {
    output = await module.generatePlotsBatch(data, itemIds, config);
  } catch (err) {
    return emptyOutcome(`Module "${name}" batch failed: ${errorMessage(err)}`);
  }

  const parsedOutput = BatchOutputSchema.safeParse(output);
  if (!parsedOutput.success) {
    return emptyOutcome(`Module "${name}" returned a malformed batch result`);
  }

  const results: Record<string, PlotResult> = {};
  for (const [itemId, entry] of Object.entries(parsedOutput.data)) {
    results[itemId] = normalizeEntry(itemId, entry);
  }

  const warnings: string[] = [];
  const notAttempted = itemIds.filter((id) => !Object.hasOwn(results, id));
  if (notAttempted.length > 0) {
    warnings.push(
      `Module "${name}": ${notAttempted.length} item(s) not attempted: ${notAttempted.join(", ")}`
    );
  }

  return { results, itemsAttempted: Object.keys(results).length, error: null, warnings };
}

// ---------------------------------------------------------------------------
// Orchestration
// ---------------------------------------------------------------------------

interface LoadedModule {
  name: string;
  module: PlotModule;
  metadata: ModuleMetadata;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export async function orchestratePlotGeneration(options: OrchestrateOptions): Promise<BatchResult> {
  const { data, catalog, logger, runId } = options;
  const started = Date.now();
  const startedAt = new Date(started).toISOString();

  const errors: string[] = [];
  const warnings: string[] = [];
  const modules: ModuleRunSummary[] = [];
  const results: Record<string, Record<string, PlotResult>> = {};

  let descriptors: ModuleDescriptor[];
  try {
    descriptors = discoverModules(options.modulesRoot);
  } catch (err) {
    if (!(err instanceof ModuleDiscoveryError)) {
      throw err;
    }
    warnings.push(err.message);
    logger.warn("Module discovery failed", { error: err.message });
    descriptors = [];
  }

  if (descriptors.length === 0) {
    warnings.push(`No plot modules found under ${options.modulesRoot}`);
  }
  logger.info("Discovered plot modules", {
    count: descriptors.length,
    modules: descriptors.map((d) => d.name),
  });

  let modulesLoaded = 0;
  let modulesFailed = 0;

  const ready: LoadedModule[] = [];
  for (const descriptor of descriptors) {
    const loaded = loadModule(descriptor, catalog);

    if (loaded.status === ModuleStatus.Failed) {
      modulesFailed++;
      errors.push(loaded.error);
      modules.push({
        name: descriptor.name,
        loaded: false,
        version: null,
        itemsAttempted: 0,
        error: loaded.error,
      });
      logger.error("Module failed to load", { module: descriptor.name, error: loaded.error });
      continue;
    }

    modulesLoaded++;
    ready.push({ name: descriptor.name, module: loaded.module, metadata: loaded.metadata });
  }

  const plan = planModuleRun(
    ready.map((entry) => ({ name: entry.name, requires: entry.metadata.requires })),
    { commandAvailable: options.commandAvailable }
  );
  const byName = new Map(ready.map((entry) => [entry.name, entry]));

  for (const skip of plan.skipped) {
    modulesFailed++;
    errors.push(skip.reason);
    modules.push({
      name: skip.name,
      loaded: true,
      version: byName.get(skip.name)?.metadata.version ?? null,
      itemsAttempted: 0,
      error: skip.reason,
    });
    logger.error("Module skipped", { module: skip.name, error: skip.reason });
  }
  logger.debug("Module run order", { order: plan.order });

  for (const name of plan.order) {
    const entry = byName.get(name);
    if (entry === undefined) {
      continue;
    }
    const config: PlotConfig = {
      outputDir: join(options.outputRoot, name),
      dpi: options.dpi ?? DEFAULT_DPI,
      continueOnError: options.continueOnError ?? true,
      runId,
      itemTimeoutMs: options.itemTimeoutMs,
      params: options.params ?? {},
    };

    const moduleLogger = logger.child({ module: name });
    const outcome = await runModule(name, entry.module, data, config, moduleLogger);
    results[name] = outcome.results;
    warnings.push(...outcome.warnings);

    if (outcome.error !== null) {
      modulesFailed++;
      errors.push(outcome.error);
      moduleLogger.error("Module run failed", { error: outcome.error });
    }

    for (const result of Object.values(outcome.results)) {
      if (result.status === "failed") {
        errors.push(`${name}/${result.itemId}: ${result.error ?? "failed"}`);
      }
      for (const warning of result.warnings) {
        warnings.push(`${name}/${result.itemId}: ${warning}`);
      }
    }

    modules.push({
      name,
      loaded: true,
      version: entry.metadata.version,
      itemsAttempted: outcome.itemsAttempted,
      error: outcome.error,
    });
  }

  const allResults = Object.values(results).flatMap((byItem) => Object.values(byItem));
  const plotsFailed = allResults.filter((r) => r.status === "failed").length;
  const plotsGenerated = allResults.length - plotsFailed;
  const attempted = allResults.length;

  if (attempted === 0) {
    warnings.push("No plot items were attempted");
  }

  const successRate = attempted === 0 ? 0 : plotsGenerated / attempted;
  const qualityScore =
    attempted === 0
      ? 0
      : round2(
          allResults
            .filter((r) => r.status !== "failed")
            .reduce((sum, r) => sum + r.qualityScore, 0) / attempted
        );

  let status: ResultStatus = "success";
  if (descriptors.length > 0 && modulesLoaded === 0) {
    status = "failed";
  } else if (descriptors.length === 0 || modulesFailed > 0 || plotsFailed > 0 || attempted === 0) {
    status = "partial";
  }

  const durationMs = Date.now() - started;
  logger.info("Plot generation complete", {
    status,
    modulesLoaded,
    modulesFailed,
    plotsGenerated,
    plotsFailed,
    durationMs,
  });

  return {
    status,
    modulesFound: descriptors.length,
    modulesLoaded,
    modulesFailed,
    plotsGenerated,
    plotsFailed,
    successRate,
    qualityScore,
    durationMs,
    startedAt,
    errors,
    warnings,
    modules,
    results,
  };
}
