#!/usr/bin/env node
/**
 * Remove old artifact generations from the registry and disk.
 *
 * Usage:
 *   npx tsx src/cli/cleanup-artifacts.ts --type plot [options]
 *   npm run cleanup -- --type plot --keep 2 --dry-run
 *
 * Options:
 *   --registry <path>  Registry file (default: paths.registryPath from the pipeline config)
 *   --type <type>      Artifact type to clean (required)
 *   --keep <n>         Generation groups to keep (default: retention.keepGenerations)
 *   --dry-run          Report what would be deleted without deleting
 *   --json             Output the result as JSON
 *   -h, --help         Show help
 *
 * Exit codes:
 *   0 - cleanup finished (warnings are printed but do not fail)
 *   1 - invalid arguments or the registry could not be written
 */

import { existsSync } from "node:fs";
import { parseArgs } from "node:util";

import {
  DEFAULT_PIPELINE_CONFIG,
  loadConfig,
  loadPipelineConfigFile,
  resolveLogLevel,
  type PipelineConfig,
} from "../config/index.js";
import { createLogger } from "../logging/index.js";
import { ArtifactTypeSchema, cleanupArtifacts, initRegistry } from "../registry/index.js";
import { errorMessage } from "../result/index.js";

const HELP = `
Usage: cleanup-artifacts --type <type> [options]

Options:
  --registry <path>  Registry file (default: paths.registryPath from the pipeline config)
  --type <type>      Artifact type: ${ArtifactTypeSchema.options.join(", ")}
  --keep <n>         Generation groups to keep (default: retention.keepGenerations)
  --dry-run          Report what would be deleted without deleting
  --json             Output the result as JSON
  -h, --help         Show this help message
`;

function pipelineDefaults(path: string): Readonly<PipelineConfig> {
  return existsSync(path) ? loadPipelineConfigFile(path) : DEFAULT_PIPELINE_CONFIG;
}

function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

function main(): number {
  const { values } = parseArgs({
    options: {
      registry: { type: "string" },
      type: { type: "string" },
      keep: { type: "string" },
      "dry-run": { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(HELP);
    return 0;
  }

  const app = loadConfig();
  const defaults = pipelineDefaults(app.pipelineConfigPath);

  const type = ArtifactTypeSchema.safeParse(values.type);
  if (!type.success) {
    console.error(`--type must be one of: ${ArtifactTypeSchema.options.join(", ")}`);
    return 1;
  }

  const keepCount = values.keep === undefined ? defaults.retention.keepGenerations : Number(values.keep);
  if (!Number.isInteger(keepCount) || keepCount < 1) {
    console.error(`--keep must be a positive integer, got: ${values.keep}`);
    return 1;
  }

  const registryPath = values.registry ?? defaults.paths.registryPath;
  const logger = createLogger({
    level: resolveLogLevel(app),
    runId: "cleanup",
    console: !values.json,
    logDir: defaults.paths.logDir,
  });

  const registry = initRegistry(registryPath, logger);
  const result = cleanupArtifacts(registry, {
    artifactType: type.data,
    keepCount,
    dryRun: values["dry-run"],
    registryPath,
    logger,
  });

  if (values.json) {
    const { registry: _registry, ...report } = result;
    console.log(JSON.stringify({ registryPath, artifactType: type.data, keepCount, ...report }, null, 2));
    return 0;
  }

  const verb = result.dryRun ? "Would delete" : "Deleted";
  console.log(`${verb} ${result.deletedCount} ${type.data} artifact(s), ${formatBytes(result.freedBytes)}`);
  console.log(`Kept ${result.keptGroups.length} generation(s): ${result.keptGroups.join(", ") || "(none)"}`);
  for (const name of result.deleted) {
    console.log(`  - ${name}`);
  }
  for (const warning of result.warnings) {
    console.warn(`  ! ${warning}`);
  }
  return 0;
}

try {
  process.exit(main());
} catch (err) {
  console.error(`Cleanup failed: ${errorMessage(err)}`);
  process.exit(1);
}
