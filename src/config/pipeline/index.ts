/**
 * Pipeline configuration module.
 *
 * Provides schema-validated, immutable configuration for pipeline runs.
 *
 * Usage:
 *   import { loadPipelineConfig, DEFAULT_PIPELINE_CONFIG } from "./config/pipeline/index.js";
 *
 *   const config = loadPipelineConfig({
 *     ...DEFAULT_PIPELINE_CONFIG,
 *     data: { ...DEFAULT_PIPELINE_CONFIG.data, requiredColumns: ["mass", "year"] },
 *   });
 */

// Schema types
export type {
  PipelineConfig,
  RendererConfig,
  ReportsConfig,
  QualityWeights,
  ColumnType,
} from "./schema.js";

// Schema objects
export { PipelineConfigSchema, ColumnTypeSchema } from "./schema.js";

// Loader and validation
export {
  loadPipelineConfig,
  loadPipelineConfigFile,
  validatePipelineConfig,
  PipelineConfigError,
  type ConfigValidationIssue,
} from "./loader.js";

// Defaults
export { DEFAULT_PIPELINE_CONFIG } from "./defaults.js";
