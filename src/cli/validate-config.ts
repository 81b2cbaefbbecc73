#!/usr/bin/env node
/**
 * CLI command to check that a pipeline run can start.
 *
 * Validates:
 * - Environment settings
 * - Pipeline configuration JSON
 * - Source data file presence
 * - Plot modules under the modules root and their catalog entries
 * - Report templates and renderer availability
 *
 * Usage:
 *   npx tsx src/cli/validate-config.ts [options]
 *   npm run validate-config
 *
 * Options:
 *   --config <path>  Pipeline config JSON (default: $PIPELINE_CONFIG or config/pipeline.json)
 *   --json           Output the report as JSON (for CI parsing)
 *   -h, --help       Show help
 *
 * Exit codes:
 *   0 - All validations passed
 *   1 - One or more validations failed
 */

import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { parseArgs } from "node:util";

import {
  loadConfig,
  validateConfig,
  validatePipelineConfig,
  type PipelineConfig,
} from "../config/index.js";
import { discoverModules } from "../modules/index.js";
import { createBuiltinCatalog } from "../plugins/index.js";
import { isRendererAvailable } from "../reporting/index.js";
import { errorMessage } from "../result/index.js";

// ============================================================
// Types
// ============================================================

type StepOutcome = "pass" | "warn" | "fail";

interface StepResult {
  outcome: StepOutcome;
  component: string;
  message: string;
  details?: string[];
}

interface ValidationReport {
  timestamp: string;
  configPath: string;
  steps: StepResult[];
  summary: {
    stepsPassed: number;
    stepsWarned: number;
    stepsFailed: number;
    stepsTotal: number;
  };
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
};

const useColors = process.stdout.isTTY && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

const MARKS: Record<StepOutcome, string> = {
  pass: c("green", "✓"),
  warn: c("yellow", "!"),
  fail: c("red", "✗"),
};

function printStep(step: StepResult): void {
  console.log(`${MARKS[step.outcome]} ${c("bold", step.component)}: ${step.message}`);
  for (const detail of step.details ?? []) {
    console.log(c("dim", `    ${detail}`));
  }
}

// ============================================================
// Validation Steps
// ============================================================

function checkEnvironment(): StepResult {
  try {
    validateConfig(loadConfig());
    return { outcome: "pass", component: "Environment", message: "settings are valid" };
  } catch (err) {
    return { outcome: "fail", component: "Environment", message: errorMessage(err) };
  }
}

function checkPipelineConfig(configPath: string): { step: StepResult; config?: PipelineConfig } {
  const component = "Pipeline config";
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (err) {
    return { step: { outcome: "fail", component, message: `cannot read ${configPath}: ${errorMessage(err)}` } };
  }

  const result = validatePipelineConfig(raw);
  if (!result.success || result.config === undefined) {
    const details = (result.errors ?? []).map(
      (issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`
    );
    return { step: { outcome: "fail", component, message: `${details.length} validation error(s)`, details } };
  }

  return {
    step: { outcome: "pass", component, message: `study "${result.config.study.name}"` },
    config: result.config,
  };
}

function checkDataSource(config: PipelineConfig): StepResult {
  const path = resolve(config.data.sourceFile);
  return existsSync(path)
    ? { outcome: "pass", component: "Data source", message: config.data.sourceFile }
    : { outcome: "fail", component: "Data source", message: `not found: ${config.data.sourceFile}` };
}

function checkModules(config: PipelineConfig): StepResult {
  const component = "Plot modules";
  try {
    const descriptors = discoverModules(config.paths.modulesRoot);
    const catalog = createBuiltinCatalog();
    const unregistered = descriptors.filter((d) => !catalog.has(d.name)).map((d) => d.name);

    if (descriptors.length === 0) {
      return { outcome: "fail", component, message: `none found under ${config.paths.modulesRoot}` };
    }
    if (unregistered.length > 0) {
      return {
        outcome: "warn",
        component,
        message: `${descriptors.length} found, ${unregistered.length} without a catalog entry`,
        details: unregistered,
      };
    }
    return {
      outcome: "pass",
      component,
      message: `${descriptors.length} found`,
      details: descriptors.map((d) => d.name),
    };
  } catch (err) {
    return { outcome: "fail", component, message: errorMessage(err) };
  }
}

function checkReports(config: PipelineConfig): StepResult[] {
  const { reports } = config;
  if (!reports.enabled || reports.templates.length === 0) {
    return [{ outcome: "pass", component: "Reports", message: "disabled" }];
  }

  const missing = reports.templates.filter((t) => !existsSync(join(reports.templatesDir, t)));
  const templates: StepResult =
    missing.length === 0
      ? { outcome: "pass", component: "Report templates", message: `${reports.templates.length} found` }
      : { outcome: "fail", component: "Report templates", message: `${missing.length} missing`, details: missing };

  const renderer: StepResult = isRendererAvailable(reports.renderer)
    ? { outcome: "pass", component: "Renderer", message: reports.renderer.command }
    : {
        outcome: "warn",
        component: "Renderer",
        message: `${reports.renderer.command} not available; reports will be skipped`,
      };

  return [templates, renderer];
}

// ============================================================
// Main
// ============================================================

function main(): number {
  const { values } = parseArgs({
    options: {
      config: { type: "string" },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(`
Usage: validate-config [options]

Options:
  --config <path>  Pipeline config JSON (default: $PIPELINE_CONFIG or config/pipeline.json)
  --json           Output the report as JSON (for CI parsing)
  -h, --help       Show this help message
`);
    return 0;
  }

  const configPath = values.config ?? loadConfig().pipelineConfigPath;
  const steps: StepResult[] = [checkEnvironment()];

  const { step, config } = checkPipelineConfig(configPath);
  steps.push(step);
  if (config !== undefined) {
    steps.push(checkDataSource(config), checkModules(config), ...checkReports(config));
  }

  const report: ValidationReport = {
    timestamp: new Date().toISOString(),
    configPath,
    steps,
    summary: {
      stepsPassed: steps.filter((s) => s.outcome === "pass").length,
      stepsWarned: steps.filter((s) => s.outcome === "warn").length,
      stepsFailed: steps.filter((s) => s.outcome === "fail").length,
      stepsTotal: steps.length,
    },
  };

  if (values.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    console.log("");
    console.log(c("bold", "═".repeat(60)));
    console.log(c("bold", " Pipeline Configuration Validation"));
    console.log(c("bold", "═".repeat(60)));
    console.log("");
    steps.forEach(printStep);
    console.log("");
    const { stepsPassed, stepsWarned, stepsFailed, stepsTotal } = report.summary;
    console.log(`${stepsPassed}/${stepsTotal} passed, ${stepsWarned} warning(s), ${stepsFailed} failed`);
  }

  return report.summary.stepsFailed > 0 ? 1 : 0;
}

try {
  process.exit(main());
} catch (err) {
  console.error(`Validation failed: ${errorMessage(err)}`);
  process.exit(1);
}
