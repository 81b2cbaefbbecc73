/**
 * Plot module contract.
 * Modules are self-contained units that turn a dataset into plot files.
 */

import type { Dataset } from "./dataset.js";

export type ItemStatus = "success" | "partial" | "failed";

export enum ModuleStatus {
  Success = "success",
  Failed = "failed",
}

/** What a module needs before it can run. */
export interface ModuleRequirements {
  /** Other plot modules that must run first */
  readonly modules?: readonly string[];
  /** External executables looked up on PATH */
  readonly commands?: readonly string[];
}

export interface ModuleMetadata {
  readonly name: string;
  readonly version: string;
  readonly description?: string;
  readonly requires?: ModuleRequirements;
}

/** One work item a module can produce. */
export interface ItemDescriptor {
  readonly id: string;
  /** Group or category tag (e.g. "compact", "expanded") */
  readonly group: string;
  readonly displayName?: string;
}

/** Parameters handed to a module for each generation call. */
export interface PlotConfig {
  /** Directory scoped to the module; files are written here */
  readonly outputDir: string;
  readonly dpi: number;
  readonly continueOnError: boolean;
  /** Identifies the generation group the outputs belong to */
  readonly runId: string;
  /** Upper bound for one item, in milliseconds */
  readonly itemTimeoutMs?: number;
  readonly params?: Readonly<Record<string, unknown>>;
}

export interface PlotJob {
  readonly itemId: string;
  readonly config: PlotConfig;
}

export interface PlotResult {
  readonly itemId: string;
  readonly status: ItemStatus;
  readonly outputPath: string | null;
  /** 0-100 */
  readonly qualityScore: number;
  readonly durationMs: number;
  readonly error: string | null;
  readonly warnings: readonly string[];
  readonly message?: string;
}

export type PlotResultMap = Readonly<Record<string, PlotResult>>;

/**
 * Optional hooks around one module's batch. `init` runs before any item is
 * generated; `cleanup` runs after the batch, also when it failed.
 */
export interface ModuleLifecycle {
  init?(config: PlotConfig): void | Promise<void>;
  cleanup?(): void | Promise<void>;
}

export const LIFECYCLE_HOOKS = ["init", "cleanup"] as const;

export type LifecycleHook = (typeof LIFECYCLE_HOOKS)[number];

/**
 * The four capabilities every plot module exposes.
 */
export interface PlotModule extends ModuleLifecycle {
  getModuleMetadata(): ModuleMetadata;
  getAvailablePlots(): readonly ItemDescriptor[];
  generatePlot(data: Dataset, itemId: string, config: PlotConfig): Promise<PlotResult>;
  /**
   * Must keep going after a failed item when `config.continueOnError` is set.
   */
  generatePlotsBatch(
    data: Dataset,
    itemIds: readonly string[],
    config: PlotConfig
  ): Promise<PlotResultMap>;
}

export const REQUIRED_CAPABILITIES = [
  "getModuleMetadata",
  "getAvailablePlots",
  "generatePlot",
  "generatePlotsBatch",
] as const;

export type Capability = (typeof REQUIRED_CAPABILITIES)[number];

/**
 * Discovery record for a module directory. Built without loading code.
 */
export interface ModuleDescriptor {
  readonly name: string;
  /** Module directory */
  readonly path: string;
  /** Entry-point file inside the directory */
  readonly entryPoint: string;
  /** Required capability names mentioned by the entry-point source */
  readonly declaredCapabilities: readonly Capability[];
  readonly discoveredAt: string;
}

export type LoadResult =
  | {
      readonly status: ModuleStatus.Success;
      readonly moduleName: string;
      readonly module: PlotModule;
      readonly metadata: ModuleMetadata;
      readonly error: null;
    }
  | {
      readonly status: ModuleStatus.Failed;
      readonly moduleName: string;
      readonly module: null;
      readonly error: string;
      readonly missingCapabilities: readonly Capability[];
    };
