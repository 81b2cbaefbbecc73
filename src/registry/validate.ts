/**
 * Registry audit.
 *
 * Collects every problem instead of stopping at the first, so a single
 * pass over a registry reports everything that needs attention.
 */

import { existsSync } from "node:fs";
import { hashFile } from "./hash.js";
import type { ArtifactType, Registry } from "./schema.js";

export interface ValidateRegistryOptions {
  /** Types that must have at least one artifact */
  requiredTypes?: readonly ArtifactType[];
  /** Re-hash every file present on disk */
  checkHashes?: boolean;
}

export type RegistryIssueCode =
  | "empty_registry"
  | "missing_type"
  | "missing_file"
  | "hash_mismatch"
  | "dangling_dependency"
  | "name_mismatch";

export interface RegistryIssue {
  code: RegistryIssueCode;
  artifact: string | null;
  message: string;
}

export interface RegistryValidationResult {
  valid: boolean;
  artifactCount: number;
  issues: RegistryIssue[];
}

export function validateRegistry(
  registry: Registry,
  options: ValidateRegistryOptions = {}
): RegistryValidationResult {
  const issues: RegistryIssue[] = [];
  const entries = Object.entries(registry.artifacts);
  const artifacts = entries.map(([, artifact]) => artifact);

  if (artifacts.length === 0) {
    issues.push({ code: "empty_registry", artifact: null, message: "Registry has no artifacts" });
  }

  for (const type of options.requiredTypes ?? []) {
    if (!artifacts.some((a) => a.type === type)) {
      issues.push({
        code: "missing_type",
        artifact: null,
        message: `No artifacts of required type: ${type}`,
      });
    }
  }

  for (const [key, artifact] of entries) {
    if (key !== artifact.name) {
      issues.push({
        code: "name_mismatch",
        artifact: key,
        message: `Registry key does not match artifact name: ${artifact.name}`,
      });
    }

    if (!existsSync(artifact.filePath)) {
      issues.push({
        code: "missing_file",
        artifact: artifact.name,
        message: `File not found: ${artifact.filePath}`,
      });
    } else if (options.checkHashes && hashFile(artifact.filePath) !== artifact.contentHash) {
      issues.push({
        code: "hash_mismatch",
        artifact: artifact.name,
        message: `Content hash mismatch: ${artifact.filePath}`,
      });
    }

    for (const dependency of artifact.inputArtifacts) {
      if (!Object.hasOwn(registry.artifacts, dependency)) {
        issues.push({
          code: "dangling_dependency",
          artifact: artifact.name,
          message: `Input artifact not in registry: ${dependency}`,
        });
      }
    }
  }

  return { valid: issues.length === 0, artifactCount: artifacts.length, issues };
}

export function formatRegistryIssues(result: RegistryValidationResult): string {
  if (result.valid) {
    return `Registry OK (${result.artifactCount} artifacts)`;
  }
  const lines = result.issues.map(
    (issue) => `  - [${issue.code}]${issue.artifact ? ` ${issue.artifact}:` : ""} ${issue.message}`
  );
  return [`Registry has ${result.issues.length} issue(s):`, ...lines].join("\n");
}
