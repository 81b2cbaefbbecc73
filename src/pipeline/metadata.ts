/**
 * Run metadata: when, where and from which commit a run was started.
 */

import { execSync } from "node:child_process";
import { hostname } from "node:os";
import type { GitState, RunMetadata } from "./summary.js";

/**
 * Current git state, or undefined outside a repository or without git.
 */
export function captureGitState(cwd?: string): GitState | undefined {
  const git = (command: string): string =>
    execSync(`git ${command}`, { stdio: "pipe", cwd }).toString().trim();

  try {
    git("rev-parse --git-dir");
    const commitSha = git("rev-parse HEAD");
    return {
      commitSha,
      commitShort: commitSha.substring(0, 7),
      branch: git("rev-parse --abbrev-ref HEAD"),
      isDirty: git("status --porcelain").length > 0,
      commitDate: git("log -1 --format=%cI"),
    };
  } catch {
    return undefined;
  }
}

export interface RunMetadataOptions {
  runId: string;
  /** Defaults to now */
  startedAt?: Date;
  /** Default true */
  captureGit?: boolean;
  /** Default true */
  captureHostname?: boolean;
  context?: Record<string, unknown>;
}

export function createRunMetadata(options: RunMetadataOptions): RunMetadata {
  const metadata: RunMetadata = {
    runId: options.runId,
    startedAt: (options.startedAt ?? new Date()).toISOString(),
    nodeVersion: process.version,
  };

  if (options.captureHostname !== false) {
    metadata.hostname = hostname();
  }

  if (options.captureGit !== false) {
    const git = captureGitState();
    if (git) {
      metadata.git = git;
    }
  }

  if (options.context && Object.keys(options.context).length > 0) {
    metadata.context = options.context;
  }

  return metadata;
}
