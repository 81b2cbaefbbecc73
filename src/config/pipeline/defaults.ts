/**
 * Default pipeline configuration.
 *
 * Paths are relative to the working directory. The renderer defaults to the
 * Quarto CLI; when it is not installed the reporting phase is skipped.
 */

import type { PipelineConfig } from "./schema.js";

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  study: {
    name: "study",
  },

  data: {
    sourceFile: "data/data.csv",
    requiredColumns: [],
    minRows: 10,
    columnTypes: {},
    artifactName: "study-data",
  },

  paths: {
    modulesRoot: "src/plugins",
    outputRoot: "output/plots",
    registryPath: "output/artifact-registry.json",
    logDir: "output/logs",
  },

  plots: {
    dpi: 300,
    continueOnError: true,
    itemTimeoutMs: 60_000,
    params: {},
  },

  reports: {
    enabled: true,
    templatesDir: "reports",
    templates: ["analysis_report.qmd"],
    outputDir: "output/reports",
    renderer: {
      command: "quarto",
      args: ["render", "{input}", "--output-dir", "{outputDir}"],
      versionArgs: ["--version"],
      outputExtension: ".html",
      timeoutMs: 300_000,
    },
  },

  // Blend used for the overall run quality score
  quality: {
    dataWeight: 0.4,
    plotWeight: 0.6,
  },

  retention: {
    keepGenerations: 3,
  },
};
