/**
 * Pipeline configuration loader and validator.
 *
 * Responsible for:
 * - Loading configuration from a JSON file or an in-memory object
 * - Validating against the schema with fail-fast behavior
 * - Producing structured error messages
 * - Freezing configuration to enforce immutability
 */

import { readFileSync } from "node:fs";
import type { ZodIssue } from "zod";
import { PipelineConfigSchema, type PipelineConfig } from "./schema.js";

/**
 * Structured validation error for pipeline configuration.
 */
export class PipelineConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "PipelineConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Pipeline configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code, or "file" for read/parse failures */
  code: string;
}

function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }

  return Object.freeze(obj);
}

/**
 * Validate and load pipeline configuration.
 *
 * @param input - Raw configuration object to validate
 * @returns Validated and frozen PipelineConfig
 * @throws PipelineConfigError if validation fails
 */
export function loadPipelineConfig(input: unknown): Readonly<PipelineConfig> {
  const result = PipelineConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new PipelineConfigError(
      `Invalid pipeline configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Validate pipeline configuration without throwing.
 */
export function validatePipelineConfig(input: unknown): {
  success: boolean;
  config?: PipelineConfig;
  errors?: ConfigValidationIssue[];
} {
  const result = PipelineConfigSchema.safeParse(input);

  if (result.success) {
    return { success: true, config: result.data };
  }

  return {
    success: false,
    errors: formatZodIssues(result.error.issues),
  };
}

/**
 * Read, parse and validate a JSON configuration file.
 *
 * @throws PipelineConfigError if the file cannot be read, is not JSON, or
 *   fails validation
 */
export function loadPipelineConfigFile(filePath: string): Readonly<PipelineConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new PipelineConfigError(`Cannot read pipeline configuration: ${filePath}`, [
      { path: [], message, code: "file" },
    ]);
  }
  return loadPipelineConfig(raw);
}
