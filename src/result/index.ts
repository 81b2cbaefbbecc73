/**
 * Result model and error taxonomy.
 */

export {
  createResult,
  addError,
  addRecoverableError,
  addWarning,
  setResultStatus,
  setPhaseResult,
  setQualityScore,
  finalizeResult,
  isResultSuccess,
  formatResultSummary,
  worseStatus,
  type Result,
  type ResultStatus,
} from "./result.js";

export {
  PipelineError,
  DataLoadError,
  ModuleDiscoveryError,
  ModuleLoadError,
  ItemGenerationError,
  RegistryIOError,
  ReportRenderError,
  ReleaseError,
  errorMessage,
  type PipelineErrorKind,
} from "./errors.js";
