/**
 * Error taxonomy for pipeline phases.
 *
 * Only DataLoadError is fatal. Every other kind is caught at its phase
 * boundary and recorded in the run Result.
 */

export type PipelineErrorKind =
  | "data_load"
  | "module_discovery"
  | "module_load"
  | "item_generation"
  | "registry_io"
  | "report_render"
  | "release";

export class PipelineError extends Error {
  public readonly kind: PipelineErrorKind;
  public readonly fatal: boolean;

  constructor(kind: PipelineErrorKind, message: string, fatal = false) {
    super(message);
    this.name = "PipelineError";
    this.kind = kind;
    this.fatal = fatal;
  }
}

export class DataLoadError extends PipelineError {
  constructor(message: string) {
    super("data_load", message, true);
    this.name = "DataLoadError";
  }
}

export class ModuleDiscoveryError extends PipelineError {
  constructor(message: string) {
    super("module_discovery", message);
    this.name = "ModuleDiscoveryError";
  }
}

export class ModuleLoadError extends PipelineError {
  public readonly moduleName: string;

  constructor(moduleName: string, message: string) {
    super("module_load", message);
    this.name = "ModuleLoadError";
    this.moduleName = moduleName;
  }
}

export class ItemGenerationError extends PipelineError {
  public readonly itemId: string;

  constructor(itemId: string, message: string) {
    super("item_generation", message);
    this.name = "ItemGenerationError";
    this.itemId = itemId;
  }
}

export class RegistryIOError extends PipelineError {
  constructor(message: string) {
    super("registry_io", message);
    this.name = "RegistryIOError";
  }
}

export class ReportRenderError extends PipelineError {
  public readonly reportName: string;

  constructor(reportName: string, message: string) {
    super("report_render", message);
    this.name = "ReportRenderError";
    this.reportName = reportName;
  }
}

export class ReleaseError extends PipelineError {
  constructor(message: string) {
    super("release", message);
    this.name = "ReleaseError";
  }
}

/**
 * Message text of any thrown value.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
