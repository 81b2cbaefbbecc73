/**
 * Report rendering through an external command (Quarto by default).
 *
 * Each configured template is rendered on its own:
 *
 *   <command> <args with {input} and {outputDir} replaced>
 *
 * A render succeeds when the command exits 0 AND the expected output file
 * `<outputDir>/<template name><outputExtension>` exists afterwards. The
 * command sees PIPELINE_RUN_ID and PIPELINE_REGISTRY in its environment so
 * templates can read the run's artifacts from the registry.
 *
 * Nothing here is fatal to a run. A missing renderer skips the phase and a
 * failed template is reported alongside the ones that worked.
 */

import { spawnSync } from "node:child_process";
import { existsSync, mkdirSync } from "node:fs";
import { basename, extname, join, resolve } from "node:path";
import type { RendererConfig, ReportsConfig } from "../config/pipeline/schema.js";
import type { Logger } from "../logging/logger.js";
import { ReportRenderError, errorMessage } from "../result/errors.js";
import type { ReportPhaseStatus } from "../types/pipeline.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RenderedReport {
  template: string;
  outputPath: string;
  durationMs: number;
}

export interface FailedReport {
  template: string;
  error: string;
}

export interface ReportPhaseResult {
  status: ReportPhaseStatus;
  rendered: RenderedReport[];
  failed: FailedReport[];
  warnings: string[];
  durationMs: number;
}

export interface RenderReportsOptions {
  reports: ReportsConfig;
  runId: string;
  registryPath: string;
  logger: Logger;
}

// ---------------------------------------------------------------------------
// Renderer availability
// ---------------------------------------------------------------------------

/**
 * Whether the renderer command can be started and answers its version check.
 */
export function isRendererAvailable(renderer: RendererConfig): boolean {
  const check = spawnSync(renderer.command, renderer.versionArgs, {
    stdio: "pipe",
    timeout: 30_000,
  });
  return check.error === undefined && check.status === 0;
}

export function expandArgs(
  args: readonly string[],
  values: { input: string; outputDir: string }
): string[] {
  return args.map((arg) =>
    arg.replaceAll("{input}", values.input).replaceAll("{outputDir}", values.outputDir)
  );
}

/**
 * Per-run output directory. Each run's reports live apart so a later run
 * never overwrites a file an earlier run registered.
 */
export function runOutputDir(outputDir: string, runId: string): string {
  return join(outputDir, runId);
}

export function expectedOutputPath(
  templatePath: string,
  outputDir: string,
  outputExtension: string
): string {
  const name = basename(templatePath, extname(templatePath));
  return join(outputDir, `${name}${outputExtension}`);
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

/**
 * Render one template.
 *
 * @throws ReportRenderError when the template is missing, the command fails
 *   or the expected output is not produced
 */
export function renderReport(
  templatePath: string,
  outputDir: string,
  renderer: RendererConfig,
  env: Readonly<Record<string, string>> = {}
): RenderedReport {
  const started = Date.now();
  const template = basename(templatePath);
  const input = resolve(templatePath);
  const output = resolve(outputDir);

  if (!existsSync(input)) {
    throw new ReportRenderError(template, `Template not found: ${templatePath}`);
  }

  mkdirSync(output, { recursive: true });

  const run = spawnSync(renderer.command, expandArgs(renderer.args, { input, outputDir: output }), {
    stdio: "pipe",
    encoding: "utf-8",
    timeout: renderer.timeoutMs,
    env: { ...process.env, ...env },
  });

  if (run.error) {
    throw new ReportRenderError(template, `Renderer failed to start: ${run.error.message}`);
  }
  if (run.status !== 0) {
    const detail = run.stderr.trim().split("\n").at(-1) ?? "";
    throw new ReportRenderError(
      template,
      `Renderer exited with ${run.status ?? run.signal}${detail ? `: ${detail}` : ""}`
    );
  }

  const outputPath = expectedOutputPath(input, output, renderer.outputExtension);
  if (!existsSync(outputPath)) {
    throw new ReportRenderError(template, `Renderer produced no output at ${outputPath}`);
  }

  return { template, outputPath, durationMs: Date.now() - started };
}

export function renderReports(options: RenderReportsOptions): ReportPhaseResult {
  const { reports, logger } = options;
  const started = Date.now();
  const result = (
    status: ReportPhaseStatus,
    rendered: RenderedReport[] = [],
    failed: FailedReport[] = [],
    warnings: string[] = []
  ): ReportPhaseResult => ({ status, rendered, failed, warnings, durationMs: Date.now() - started });

  if (!reports.enabled) {
    logger.info("Report rendering disabled");
    return result("skipped");
  }
  if (reports.templates.length === 0) {
    return result("skipped", [], [], ["No report templates configured"]);
  }
  if (!isRendererAvailable(reports.renderer)) {
    const warning = `Report renderer not available: ${reports.renderer.command}`;
    logger.warn(warning);
    return result("unavailable", [], [], [warning]);
  }

  const rendered: RenderedReport[] = [];
  const failed: FailedReport[] = [];
  const env = { PIPELINE_RUN_ID: options.runId, PIPELINE_REGISTRY: resolve(options.registryPath) };

  for (const template of reports.templates) {
    try {
      const report = renderReport(
        join(reports.templatesDir, template),
        runOutputDir(reports.outputDir, options.runId),
        reports.renderer,
        env
      );
      rendered.push(report);
      logger.info("Rendered report", { template, output: report.outputPath });
    } catch (err) {
      const error = errorMessage(err);
      failed.push({ template, error });
      logger.warn("Report rendering failed", { template, error });
    }
  }

  const warnings = failed.map((f) => `Report ${f.template} failed: ${f.error}`);
  let status: ReportPhaseStatus = "success";
  if (rendered.length === 0) {
    status = "failed";
  } else if (failed.length > 0) {
    status = "partial";
  }
  return result(status, rendered, failed, warnings);
}
