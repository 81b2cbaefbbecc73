#!/usr/bin/env node
/**
 * Entry point: runs the full pipeline from the configured JSON file.
 *
 * Usage:
 *   npx tsx src/index.ts [options]
 *   npm start
 *
 * Options:
 *   --config <path>    Pipeline configuration (default: $PIPELINE_CONFIG or config/pipeline.json)
 *   --run-id <id>      Use this run ID instead of generating one
 *   --skip-reports     Do not render reports for this run
 *   -h, --help         Show help
 *
 * Exit codes:
 *   0 - success, or partial success with warnings
 *   1 - the run failed, or the configuration is invalid
 */

import { parseArgs } from "node:util";

import {
  ConfigError,
  PipelineConfigError,
  loadConfig,
  loadPipelineConfigFile,
  resolveLogLevel,
  validateConfig,
} from "./config/index.js";
import { loadAndValidateData } from "./data/index.js";
import { createLogger, generateRunId, isRunId } from "./logging/index.js";
import { exitCodeForStatus, runPipeline } from "./pipeline/index.js";
import { createBuiltinCatalog } from "./plugins/index.js";
import { formatResultSummary } from "./result/index.js";

const HELP = `
Usage: study-plot-pipeline [options]

Options:
  --config <path>    Pipeline configuration (default: $PIPELINE_CONFIG or config/pipeline.json)
  --run-id <id>      Use this run ID instead of generating one
  --skip-reports     Do not render reports for this run
  -h, --help         Show this help message
`;

async function main(): Promise<number> {
  const app = loadConfig();
  validateConfig(app);

  const { values } = parseArgs({
    options: {
      config: { type: "string", default: app.pipelineConfigPath },
      "run-id": { type: "string" },
      "skip-reports": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(HELP);
    return 0;
  }

  const requestedRunId = values["run-id"];
  if (requestedRunId !== undefined && !isRunId(requestedRunId)) {
    console.error(`--run-id must look like 20240115-a1b2c3, got: ${requestedRunId}`);
    return 1;
  }

  const loaded = loadPipelineConfigFile(values.config);
  const pipelineConfig = values["skip-reports"]
    ? { ...loaded, reports: { ...loaded.reports, enabled: false } }
    : loaded;

  const runId = requestedRunId ?? generateRunId();
  const logger = createLogger({
    level: resolveLogLevel(app),
    runId,
    logDir: pipelineConfig.paths.logDir,
  });

  logger.info("Configuration loaded", {
    app: app.appName,
    env: app.env,
    config: values.config,
    study: pipelineConfig.study.name,
  });

  const run = await runPipeline(
    { config: pipelineConfig, runId, logger },
    { loadData: loadAndValidateData, catalog: createBuiltinCatalog() }
  );

  console.log(formatResultSummary(run));
  if (run.status === "partial") {
    console.warn(`Completed with ${run.warnings.length} warning(s); see ${run.summaryPath ?? "the log"}`);
  }
  return exitCodeForStatus(run.status);
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    if (err instanceof PipelineConfigError) {
      console.error(err.format());
    } else if (err instanceof ConfigError) {
      console.error(`Configuration error: ${err.message}`);
    } else {
      console.error("Fatal error:", err);
    }
    process.exit(1);
  });
