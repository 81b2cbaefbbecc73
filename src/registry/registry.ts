/**
 * Persistent artifact registry.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * PROVENANCE CONTRACT
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * The registry is the single source of truth for "what was produced, from
 * what, when, with what hash". Report renderers and audit tools query it
 * instead of re-scanning output directories.
 *
 * Every entry records:
 *   - the SHA-256 of the file bytes (integrity)
 *   - the names of the artifacts it was derived from (dependency edges)
 *   - the run that produced it (generation group, used for retention)
 *
 * LIFECYCLE
 *
 *   initRegistry      load persisted state, or start empty
 *   registerArtifact  add or overwrite one entry (returns a new registry)
 *   persistRegistry   write temp file, then rename over the old one
 *
 * Registry values are never mutated in place. Each operation returns a new
 * registry and the caller decides when to persist.
 *
 * A malformed registry file is not fatal: it is logged and the run starts
 * from an empty registry. The broken file stays on disk until the next
 * successful persist replaces it.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, statSync, writeFileSync } from "node:fs";
import { dirname, join, basename } from "node:path";
import type { Logger } from "../logging/logger.js";
import { RegistryIOError, errorMessage } from "../result/errors.js";
import { hashFile } from "./hash.js";
import {
  PIPELINE_VERSION,
  REGISTRY_VERSION,
  RegistrySchema,
  type Artifact,
  type ArtifactType,
  type Registry,
} from "./schema.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RegisterArtifactInput {
  name: string;
  type: ArtifactType;
  workflow: string;
  filePath: string;
  inputArtifacts?: readonly string[];
  metadata?: Readonly<Record<string, unknown>>;
  /** Supplied hash; computed from filePath when omitted */
  contentHash?: string;
  runId?: string | null;
}

export interface RegisterArtifactOptions {
  /** Override the registration time (for testing). */
  now?: Date;
  logger?: Logger;
}

export interface ArtifactFilter {
  type?: ArtifactType;
  workflow?: string;
  runId?: string;
}

export interface ArtifactVerifyResult {
  valid: boolean;
  storedHash: string | null;
  computedHash: string | null;
  reason?: string;
}

// ---------------------------------------------------------------------------
// Initialization
// ---------------------------------------------------------------------------

export function createEmptyRegistry(now: Date = new Date()): Registry {
  return {
    registryVersion: REGISTRY_VERSION,
    pipelineVersion: PIPELINE_VERSION,
    createdUtc: now.toISOString(),
    lastModifiedUtc: null,
    artifacts: {},
  };
}

/**
 * Load the registry persisted at `registryPath`, or start an empty one.
 *
 * Never throws: unreadable or malformed state is logged and replaced by an
 * empty registry.
 */
export function initRegistry(registryPath: string, logger: Logger): Registry {
  if (!existsSync(registryPath)) {
    logger.info("Created new artifact registry", { path: registryPath });
    return createEmptyRegistry();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(registryPath, "utf-8"));
  } catch (err) {
    logger.warn("Artifact registry unreadable, starting empty", {
      path: registryPath,
      error: errorMessage(err),
    });
    return createEmptyRegistry();
  }

  const parsed = RegistrySchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .slice(0, 3)
      .map((i) => `${i.path.join(".")}: ${i.message}`);
    logger.warn("Artifact registry malformed, starting empty", {
      path: registryPath,
      issues: problems,
    });
    return createEmptyRegistry();
  }

  logger.info("Loaded artifact registry", {
    path: registryPath,
    artifacts: Object.keys(parsed.data.artifacts).length,
  });
  return parsed.data;
}

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

/**
 * Add (or overwrite) an artifact entry.
 *
 * Dependency edges that do not resolve to a registered artifact are kept,
 * and recorded in the entry's `integrityWarnings`; registration is never
 * blocked by them.
 *
 * @throws RegistryIOError when no hash is supplied and the file cannot be read
 */
export function registerArtifact(
  registry: Registry,
  input: RegisterArtifactInput,
  options: RegisterArtifactOptions = {}
): Registry {
  const now = (options.now ?? new Date()).toISOString();
  const fileExists = existsSync(input.filePath);

  let contentHash = input.contentHash;
  if (contentHash === undefined) {
    if (!fileExists) {
      throw new RegistryIOError(`Artifact file not found: ${input.filePath}`);
    }
    try {
      contentHash = hashFile(input.filePath);
    } catch (err) {
      throw new RegistryIOError(`Cannot hash ${input.filePath}: ${errorMessage(err)}`);
    }
  }

  const inputArtifacts = [...(input.inputArtifacts ?? [])];
  const integrityWarnings: string[] = [];
  for (const dependency of inputArtifacts) {
    if (!Object.hasOwn(registry.artifacts, dependency)) {
      integrityWarnings.push(`Unresolved input artifact: ${dependency}`);
    }
  }
  if (!fileExists) {
    integrityWarnings.push(`File not found at registration: ${input.filePath}`);
  }

  for (const warning of integrityWarnings) {
    options.logger?.warn(warning, { artifact: input.name });
  }

  const artifact: Artifact = {
    name: input.name,
    type: input.type,
    workflow: input.workflow,
    filePath: input.filePath,
    contentHash,
    fileSizeBytes: fileExists ? statSync(input.filePath).size : 0,
    inputArtifacts,
    metadata: { ...(input.metadata ?? {}) },
    createdUtc: now,
    runId: input.runId ?? null,
    pipelineVersion: PIPELINE_VERSION,
    integrityWarnings,
  };

  options.logger?.debug("Registered artifact", { name: input.name, type: input.type });

  return {
    ...registry,
    lastModifiedUtc: now,
    artifacts: { ...registry.artifacts, [input.name]: artifact },
  };
}

/**
 * Drop entries by name. Files are left alone.
 */
export function removeArtifacts(
  registry: Registry,
  names: readonly string[],
  now: Date = new Date()
): Registry {
  if (names.length === 0) {
    return registry;
  }
  const drop = new Set(names);
  const artifacts: Record<string, Artifact> = {};
  for (const [name, artifact] of Object.entries(registry.artifacts)) {
    if (!drop.has(name)) {
      artifacts[name] = artifact;
    }
  }
  return { ...registry, lastModifiedUtc: now.toISOString(), artifacts };
}

// ---------------------------------------------------------------------------
// Persistence
// ---------------------------------------------------------------------------

/**
 * Write the registry as JSON, atomically.
 *
 * The content goes to a temporary file in the target directory first and is
 * then renamed over the target, so a crash mid-write leaves the previous
 * file intact.
 *
 * @throws RegistryIOError on any filesystem failure
 */
export function persistRegistry(registry: Registry, registryPath: string): void {
  const dir = dirname(registryPath);
  const tempPath = join(dir, `.${basename(registryPath)}.${process.pid}.tmp`);

  try {
    mkdirSync(dir, { recursive: true });
    writeFileSync(tempPath, JSON.stringify(registry, null, 2) + "\n", "utf-8");
    renameSync(tempPath, registryPath);
  } catch (err) {
    rmSync(tempPath, { force: true });
    throw new RegistryIOError(`Failed to persist registry to ${registryPath}: ${errorMessage(err)}`);
  }
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

export function getArtifact(registry: Registry, name: string): Artifact | undefined {
  return registry.artifacts[name];
}

/**
 * Artifacts matching every given filter field, oldest first
 * (ties broken by name).
 */
export function listArtifacts(registry: Registry, filter: ArtifactFilter = {}): Artifact[] {
  return Object.values(registry.artifacts)
    .filter((a) => filter.type === undefined || a.type === filter.type)
    .filter((a) => filter.workflow === undefined || a.workflow === filter.workflow)
    .filter((a) => filter.runId === undefined || a.runId === filter.runId)
    .sort((a, b) => a.createdUtc.localeCompare(b.createdUtc) || a.name.localeCompare(b.name));
}

export function getLatestArtifact(registry: Registry, type: ArtifactType): Artifact | undefined {
  return listArtifacts(registry, { type }).at(-1);
}

/**
 * Re-hash an artifact's file and compare with the registered hash.
 */
export function verifyArtifact(registry: Registry, name: string): ArtifactVerifyResult {
  const artifact = registry.artifacts[name];
  if (!artifact) {
    return { valid: false, storedHash: null, computedHash: null, reason: "not registered" };
  }
  if (!existsSync(artifact.filePath)) {
    return {
      valid: false,
      storedHash: artifact.contentHash,
      computedHash: null,
      reason: "file not found",
    };
  }
  const computedHash = hashFile(artifact.filePath);
  const valid = computedHash === artifact.contentHash;
  return {
    valid,
    storedHash: artifact.contentHash,
    computedHash,
    ...(valid ? {} : { reason: "hash mismatch" }),
  };
}
