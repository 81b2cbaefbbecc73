#!/usr/bin/env node
/**
 * Bundle one run's artifacts into a release directory with a hash manifest.
 *
 * Usage:
 *   npx tsx src/cli/create-release.ts [options]
 *   npm run release -- --run-id 20260101-abcdef --exclude reports
 *
 * Options:
 *   --registry <path>    Registry file (default: paths.registryPath from the pipeline config)
 *   --run-id <id>        Run to release (default: the newest run in the registry)
 *   --output <dir>       Releases directory (default: "releases" beside the registry)
 *   --exclude <section>  Leave a section out (repeatable)
 *   --json               Output the manifest as JSON
 *   -h, --help           Show help
 *
 * Exit codes:
 *   0 - release written (skipped artifacts are printed but do not fail)
 *   1 - invalid arguments, nothing to release, or the release could not be written
 */

import { existsSync } from "node:fs";
import { dirname, join } from "node:path";
import { parseArgs } from "node:util";

import {
  DEFAULT_PIPELINE_CONFIG,
  loadConfig,
  loadPipelineConfigFile,
  resolveLogLevel,
} from "../config/index.js";
import { createLogger } from "../logging/index.js";
import { initRegistry } from "../registry/index.js";
import {
  RELEASE_SECTIONS,
  ReleaseSectionSchema,
  createReleaseBundle,
  verifyRelease,
  type ReleaseSection,
} from "../release/index.js";
import { errorMessage } from "../result/index.js";

const HELP = `
Usage: create-release [options]

Options:
  --registry <path>    Registry file (default: paths.registryPath from the pipeline config)
  --run-id <id>        Run to release (default: the newest run in the registry)
  --output <dir>       Releases directory (default: "releases" beside the registry)
  --exclude <section>  Leave out one of: ${RELEASE_SECTIONS.join(", ")} (repeatable)
  --json               Output the manifest as JSON
  -h, --help           Show this help message
`;

function main(): number {
  const { values } = parseArgs({
    options: {
      registry: { type: "string" },
      "run-id": { type: "string" },
      output: { type: "string" },
      exclude: { type: "string", multiple: true, default: [] },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(HELP);
    return 0;
  }

  const exclude: ReleaseSection[] = [];
  for (const raw of values.exclude) {
    const parsed = ReleaseSectionSchema.safeParse(raw);
    if (!parsed.success) {
      console.error(`--exclude must be one of: ${RELEASE_SECTIONS.join(", ")}`);
      return 1;
    }
    exclude.push(parsed.data);
  }

  const app = loadConfig();
  const hasConfigFile = existsSync(app.pipelineConfigPath);
  const pipeline = hasConfigFile ? loadPipelineConfigFile(app.pipelineConfigPath) : DEFAULT_PIPELINE_CONFIG;
  const registryPath = values.registry ?? pipeline.paths.registryPath;
  const outputDir = values.output ?? join(dirname(registryPath), "releases");

  const logger = createLogger({
    level: resolveLogLevel(app),
    runId: "release",
    console: !values.json,
    logDir: pipeline.paths.logDir,
  });

  const registry = initRegistry(registryPath, logger);
  const result = createReleaseBundle(registry, {
    outputDir,
    study: pipeline.study.name,
    runId: values["run-id"],
    exclude,
    configPath: hasConfigFile ? app.pipelineConfigPath : undefined,
    logger,
  });

  const mismatched = verifyRelease(result.releaseDir, result.manifest);

  if (values.json) {
    console.log(
      JSON.stringify(
        { releaseDir: result.releaseDir, skipped: result.skipped, warnings: result.warnings, mismatched, manifest: result.manifest },
        null,
        2
      )
    );
    return mismatched.length === 0 ? 0 : 1;
  }

  console.log(`Release ${result.manifest.releaseName}: ${result.manifest.fileCount} file(s)`);
  console.log(`  ${result.releaseDir}`);
  for (const warning of result.warnings) {
    console.warn(`  ! ${warning}`);
  }
  for (const path of mismatched) {
    console.error(`  ✗ ${path} does not match the manifest`);
  }
  return mismatched.length === 0 ? 0 : 1;
}

try {
  process.exit(main());
} catch (err) {
  console.error(`Release failed: ${errorMessage(err)}`);
  process.exit(1);
}
