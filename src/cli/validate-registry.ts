#!/usr/bin/env node
/**
 * Audit an artifact registry.
 *
 * Checks for an empty registry, missing required types, missing files,
 * dangling dependency edges and (optionally) content hash mismatches.
 *
 * Usage:
 *   npx tsx src/cli/validate-registry.ts [options]
 *   npm run validate-registry -- --require-type plot --check-hashes
 *
 * Options:
 *   --registry <path>      Registry file (default: paths.registryPath from the pipeline config)
 *   --require-type <type>  Type that must be present (repeatable)
 *   --check-hashes         Re-hash every file and compare
 *   --json                 Output the result as JSON
 *   -h, --help             Show help
 *
 * Exit codes:
 *   0 - registry is valid
 *   1 - issues found, or invalid arguments
 */

import { existsSync } from "node:fs";
import { parseArgs } from "node:util";

import {
  DEFAULT_PIPELINE_CONFIG,
  loadConfig,
  loadPipelineConfigFile,
} from "../config/index.js";
import { createLogger } from "../logging/index.js";
import {
  ArtifactTypeSchema,
  formatRegistryIssues,
  initRegistry,
  validateRegistry,
  type ArtifactType,
} from "../registry/index.js";
import { errorMessage } from "../result/index.js";

const HELP = `
Usage: validate-registry [options]

Options:
  --registry <path>      Registry file (default: paths.registryPath from the pipeline config)
  --require-type <type>  Type that must be present (repeatable)
  --check-hashes         Re-hash every file and compare
  --json                 Output the result as JSON
  -h, --help             Show this help message
`;

function main(): number {
  const { values } = parseArgs({
    options: {
      registry: { type: "string" },
      "require-type": { type: "string", multiple: true, default: [] },
      "check-hashes": { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(HELP);
    return 0;
  }

  const requiredTypes: ArtifactType[] = [];
  for (const raw of values["require-type"]) {
    const parsed = ArtifactTypeSchema.safeParse(raw);
    if (!parsed.success) {
      console.error(`Unknown artifact type: ${raw}`);
      return 1;
    }
    requiredTypes.push(parsed.data);
  }

  const app = loadConfig();
  const registryPath =
    values.registry ??
    (existsSync(app.pipelineConfigPath)
      ? loadPipelineConfigFile(app.pipelineConfigPath)
      : DEFAULT_PIPELINE_CONFIG
    ).paths.registryPath;

  const logger = createLogger({ level: "warn", runId: "validate", file: false, console: !values.json });
  const registry = initRegistry(registryPath, logger);
  const result = validateRegistry(registry, { requiredTypes, checkHashes: values["check-hashes"] });

  if (values.json) {
    console.log(JSON.stringify({ registryPath, ...result }, null, 2));
  } else {
    console.log(formatRegistryIssues(result));
  }
  return result.valid ? 0 : 1;
}

try {
  process.exit(main());
} catch (err) {
  console.error(`Validation failed: ${errorMessage(err)}`);
  process.exit(1);
}
