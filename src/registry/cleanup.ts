/**
 * Generation-based artifact retention.
 *
 * Artifacts of one type are grouped by the run that produced them. The
 * newest `keepCount` groups survive; every older group loses both its
 * files and its registry entries. An artifact with no run id forms a group
 * of its own.
 *
 * A file that a surviving artifact still references is never deleted; only
 * the evicted entry goes.
 */

import { rmSync, statSync } from "node:fs";
import { resolve } from "node:path";
import type { Logger } from "../logging/logger.js";
import { errorMessage, RegistryIOError } from "../result/errors.js";
import { persistRegistry, removeArtifacts } from "./registry.js";
import type { Artifact, ArtifactType, Registry } from "./schema.js";

export interface CleanupOptions {
  artifactType: ArtifactType;
  /** Generation groups to keep; at least 1 */
  keepCount: number;
  dryRun?: boolean;
  /** Persist target; omitted means the caller persists */
  registryPath?: string;
  logger: Logger;
}

export interface CleanupResult {
  registry: Registry;
  deletedCount: number;
  freedBytes: number;
  /** Names of the removed (or, on a dry run, removable) artifacts */
  deleted: string[];
  /** Group keys kept, newest first */
  keptGroups: string[];
  warnings: string[];
  dryRun: boolean;
}

interface GenerationGroup {
  key: string;
  newestUtc: string;
  artifacts: Artifact[];
}

function groupKey(artifact: Artifact): string {
  return artifact.runId ?? `artifact:${artifact.name}`;
}

/**
 * Generation groups for one type, newest first.
 */
export function groupGenerations(registry: Registry, artifactType: ArtifactType): GenerationGroup[] {
  const candidates = Object.values(registry.artifacts)
    .filter((a) => a.type === artifactType)
    .sort((a, b) => b.createdUtc.localeCompare(a.createdUtc) || a.name.localeCompare(b.name));

  const groups = new Map<string, GenerationGroup>();
  for (const artifact of candidates) {
    const key = groupKey(artifact);
    const group = groups.get(key);
    if (group) {
      group.artifacts.push(artifact);
    } else {
      // Candidates are sorted, so the first member seen is the newest
      groups.set(key, { key, newestUtc: artifact.createdUtc, artifacts: [artifact] });
    }
  }
  return [...groups.values()];
}

function fileSize(path: string): number {
  try {
    return statSync(path).size;
  } catch {
    return 0;
  }
}

export function cleanupArtifacts(registry: Registry, options: CleanupOptions): CleanupResult {
  const { artifactType, keepCount, logger } = options;
  const dryRun = options.dryRun ?? false;

  if (!Number.isInteger(keepCount) || keepCount < 1) {
    throw new RangeError(`keepCount must be a positive integer, got ${keepCount}`);
  }

  const groups = groupGenerations(registry, artifactType);
  const kept = groups.slice(0, keepCount);
  const evicted = groups.slice(keepCount);

  const evictedNames = new Set(evicted.flatMap((g) => g.artifacts.map((a) => a.name)));
  const survivingPaths = new Set(
    Object.values(registry.artifacts)
      .filter((a) => !evictedNames.has(a.name))
      .map((a) => resolve(a.filePath))
  );

  const deleted: string[] = [];
  const warnings: string[] = [];
  let freedBytes = 0;

  for (const group of evicted) {
    for (const artifact of group.artifacts) {
      if (survivingPaths.has(resolve(artifact.filePath))) {
        deleted.push(artifact.name);
        logger.debug("File still referenced, removing entry only", {
          artifact: artifact.name,
          path: artifact.filePath,
        });
        continue;
      }

      const size = fileSize(artifact.filePath);
      if (dryRun) {
        deleted.push(artifact.name);
        freedBytes += size;
        continue;
      }
      try {
        // force: a file that is already gone counts as cleaned
        rmSync(artifact.filePath, { force: true });
        deleted.push(artifact.name);
        freedBytes += size;
      } catch (err) {
        const warning = `Could not delete ${artifact.filePath}: ${errorMessage(err)}`;
        warnings.push(warning);
        logger.warn(warning, { artifact: artifact.name });
      }
    }
  }

  let next = registry;
  if (!dryRun && deleted.length > 0) {
    next = removeArtifacts(registry, deleted);
    if (options.registryPath !== undefined) {
      try {
        persistRegistry(next, options.registryPath);
      } catch (err) {
        if (!(err instanceof RegistryIOError)) {
          throw err;
        }
        warnings.push(err.message);
        logger.warn("Cleaned registry not persisted", { error: err.message });
      }
    }
  }

  logger.info(dryRun ? "Cleanup dry run complete" : "Cleanup complete", {
    type: artifactType,
    groups: groups.length,
    kept: kept.length,
    deleted: deleted.length,
    freedBytes,
  });

  return {
    registry: next,
    deletedCount: deleted.length,
    freedBytes,
    deleted,
    keptGroups: kept.map((g) => g.key),
    warnings,
    dryRun,
  };
}
