/**
 * Release bundles.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * WHAT GOES IN
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * A release captures one run: every artifact the registry attributes to the
 * run id, plus everything those artifacts were derived from (followed
 * through `inputArtifacts`). Files are copied into a directory laid out by
 * artifact type:
 *
 *   <study>-<runId>/
 *     data/                     raw-data, processed-data
 *     plots/<module>/           plot
 *     reports/                  report
 *     results/                  serialized-object, validation-report
 *     config/                   pipeline config + registry snapshot
 *     manifest.json             every file with its SHA-256
 *
 * Each artifact is re-hashed before it is copied. A missing file or a hash
 * that no longer matches the registry leaves the artifact out with a
 * warning; the release still gets written.
 *
 * The bundle is staged in a hidden sibling directory and renamed into place
 * at the end, so an interrupted run never leaves a half-written release
 * under the final name.
 */

import { copyFileSync, existsSync, mkdirSync, renameSync, rmSync, statSync, writeFileSync } from "node:fs";
import { basename, dirname, join } from "node:path";
import { z } from "zod";
import type { Logger } from "../logging/logger.js";
import { ReleaseError, errorMessage } from "../result/errors.js";
import { hashFile } from "../registry/hash.js";
import { listArtifacts, verifyArtifact } from "../registry/registry.js";
import { PIPELINE_VERSION, type Artifact, type ArtifactType, type Registry } from "../registry/schema.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const RELEASE_SECTIONS = ["data", "plots", "reports", "results", "config"] as const;

export const ReleaseSectionSchema = z.enum(RELEASE_SECTIONS);

export type ReleaseSection = z.infer<typeof ReleaseSectionSchema>;

export const ReleaseFileSchema = z
  .object({
    /** Relative to the release directory, always with forward slashes */
    path: z.string().min(1),
    /** Registry name; null for config files */
    artifact: z.string().nullable(),
    section: ReleaseSectionSchema,
    sha256: z.string().regex(/^[0-9a-f]{64}$/),
    sizeBytes: z.number().int().min(0),
  })
  .strict();

export type ReleaseFile = z.infer<typeof ReleaseFileSchema>;

export const ReleaseManifestSchema = z
  .object({
    releaseName: z.string().min(1),
    createdUtc: z.string().datetime(),
    pipelineVersion: z.string(),
    study: z.string().min(1),
    runId: z.string().min(1),
    sections: z.array(ReleaseSectionSchema),
    files: z.array(ReleaseFileSchema),
    fileCount: z.number().int().min(0),
    totalBytes: z.number().int().min(0),
  })
  .strict();

export type ReleaseManifest = z.infer<typeof ReleaseManifestSchema>;

export interface ReleaseOptions {
  /** Directory the release directory is created in */
  outputDir: string;
  study: string;
  /** Run to release; defaults to the newest run in the registry */
  runId?: string;
  /** Sections left out of the bundle */
  exclude?: readonly ReleaseSection[];
  /** Pipeline config file copied into config/ */
  configPath?: string;
  now?: Date;
  logger: Logger;
}

export interface ReleaseResult {
  releaseDir: string;
  manifest: ReleaseManifest;
  /** Artifacts left out because their file was missing or changed */
  skipped: string[];
  warnings: string[];
}

export const MANIFEST_FILENAME = "manifest.json";
export const REGISTRY_SNAPSHOT_FILENAME = "registry.json";

const SECTION_BY_TYPE: Record<ArtifactType, ReleaseSection> = {
  "raw-data": "data",
  "processed-data": "data",
  plot: "plots",
  report: "reports",
  "serialized-object": "results",
  "validation-report": "results",
};

// ---------------------------------------------------------------------------
// Selection
// ---------------------------------------------------------------------------

/**
 * Run id of the most recently registered artifact that has one.
 */
export function latestRunId(registry: Registry): string | null {
  const withRun = listArtifacts(registry).filter((a) => a.runId !== null);
  return withRun.at(-1)?.runId ?? null;
}

/**
 * The run's artifacts plus their transitive inputs, oldest first.
 * Input names that are not registered are returned separately.
 */
export function selectReleaseArtifacts(
  registry: Registry,
  runId: string
): { artifacts: Artifact[]; unresolved: string[] } {
  const selected = new Set<string>();
  const unresolved = new Set<string>();
  const queue = listArtifacts(registry, { runId }).map((a) => a.name);

  while (queue.length > 0) {
    const name = queue.shift();
    if (name === undefined || selected.has(name)) {
      continue;
    }
    const artifact = registry.artifacts[name];
    if (!artifact) {
      unresolved.add(name);
      continue;
    }
    selected.add(name);
    queue.push(...artifact.inputArtifacts);
  }

  return {
    artifacts: listArtifacts(registry).filter((a) => selected.has(a.name)),
    unresolved: [...unresolved].sort(),
  };
}

/** Release-relative path for an artifact's copy. */
export function releasePath(artifact: Artifact): string {
  const section = SECTION_BY_TYPE[artifact.type];
  const file = basename(artifact.filePath);
  if (section !== "plots") {
    return `${section}/${file}`;
  }
  const module = artifact.metadata["module"];
  const group = typeof module === "string" && module.length > 0 ? module : artifact.workflow;
  return `plots/${group}/${file}`;
}

function slug(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

export function releaseName(study: string, runId: string): string {
  return `${slug(study) || "study"}-${runId}`;
}

// ---------------------------------------------------------------------------
// Bundle
// ---------------------------------------------------------------------------

/**
 * Copy a run's artifacts into a new release directory and write its manifest.
 *
 * @throws ReleaseError when the registry has no such run, the release
 *   directory already exists, or the bundle cannot be written
 */
export function createReleaseBundle(registry: Registry, options: ReleaseOptions): ReleaseResult {
  const { logger } = options;
  const runId = options.runId ?? latestRunId(registry);
  if (runId === null) {
    throw new ReleaseError("Registry has no runs to release");
  }

  const { artifacts, unresolved } = selectReleaseArtifacts(registry, runId);
  if (!artifacts.some((a) => a.runId === runId)) {
    throw new ReleaseError(`No artifacts registered for run ${runId}`);
  }

  const name = releaseName(options.study, runId);
  const releaseDir = join(options.outputDir, name);
  if (existsSync(releaseDir)) {
    throw new ReleaseError(`Release already exists: ${releaseDir}`);
  }

  const excluded = new Set(options.exclude ?? []);
  const sections = RELEASE_SECTIONS.filter((section) => !excluded.has(section));
  const stagingDir = join(options.outputDir, `.${name}.staging`);
  const warnings = unresolved.map((dep) => `Input artifact not in registry: ${dep}`);
  const skipped: string[] = [];
  const files: ReleaseFile[] = [];
  const taken = new Map<string, string>();

  function place(relative: string, write: (target: string) => void): string {
    const target = join(stagingDir, ...relative.split("/"));
    mkdirSync(dirname(target), { recursive: true });
    write(target);
    return hashFile(target);
  }

  logger.info("Creating release", { release: name, artifacts: artifacts.length });

  try {
    rmSync(stagingDir, { recursive: true, force: true });
    mkdirSync(stagingDir, { recursive: true });

    for (const artifact of artifacts) {
      const section = SECTION_BY_TYPE[artifact.type];
      if (excluded.has(section)) {
        continue;
      }

      const check = verifyArtifact(registry, artifact.name);
      if (!check.valid) {
        skipped.push(artifact.name);
        warnings.push(`Skipped ${artifact.name}: ${check.reason ?? "verification failed"}`);
        logger.warn("Artifact left out of release", { artifact: artifact.name, reason: check.reason });
        continue;
      }

      const relative = releasePath(artifact);
      const owner = taken.get(relative);
      if (owner !== undefined) {
        skipped.push(artifact.name);
        warnings.push(`Skipped ${artifact.name}: ${relative} already holds ${owner}`);
        continue;
      }
      taken.set(relative, artifact.name);

      const sha256 = place(relative, (target) => copyFileSync(artifact.filePath, target));
      files.push({ path: relative, artifact: artifact.name, section, sha256, sizeBytes: artifact.fileSizeBytes });
    }

    if (!excluded.has("config")) {
      if (options.configPath !== undefined) {
        if (existsSync(options.configPath)) {
          const relative = `config/${basename(options.configPath)}`;
          const configPath = options.configPath;
          const sha256 = place(relative, (target) => copyFileSync(configPath, target));
          files.push({
            path: relative,
            artifact: null,
            section: "config",
            sha256,
            sizeBytes: statSync(configPath).size,
          });
        } else {
          warnings.push(`Config file not found: ${options.configPath}`);
        }
      }

      const bundled = new Set(files.flatMap((f) => (f.artifact === null ? [] : [f.artifact])));
      const snapshot: Registry = {
        ...registry,
        artifacts: Object.fromEntries(
          Object.entries(registry.artifacts).filter(([key]) => bundled.has(key))
        ),
      };
      const relative = `config/${REGISTRY_SNAPSHOT_FILENAME}`;
      const body = JSON.stringify(snapshot, null, 2) + "\n";
      const sha256 = place(relative, (target) => writeFileSync(target, body, "utf-8"));
      files.push({
        path: relative,
        artifact: null,
        section: "config",
        sha256,
        sizeBytes: Buffer.byteLength(body),
      });
    }

    files.sort((a, b) => a.path.localeCompare(b.path));
    const manifest = ReleaseManifestSchema.parse({
      releaseName: name,
      createdUtc: (options.now ?? new Date()).toISOString(),
      pipelineVersion: PIPELINE_VERSION,
      study: options.study,
      runId,
      sections,
      files,
      fileCount: files.length,
      totalBytes: files.reduce((sum, f) => sum + f.sizeBytes, 0),
    });
    writeFileSync(join(stagingDir, MANIFEST_FILENAME), JSON.stringify(manifest, null, 2) + "\n", "utf-8");

    renameSync(stagingDir, releaseDir);
    logger.info("Release created", { release: name, files: manifest.fileCount, skipped: skipped.length });
    return { releaseDir, manifest, skipped, warnings };
  } catch (err) {
    rmSync(stagingDir, { recursive: true, force: true });
    throw new ReleaseError(`Failed to create release ${name}: ${errorMessage(err)}`);
  }
}

/**
 * Re-hash every file listed in a release manifest.
 *
 * @returns paths whose file is missing or whose hash differs
 */
export function verifyRelease(releaseDir: string, manifest: ReleaseManifest): string[] {
  return manifest.files
    .filter((file) => {
      const path = join(releaseDir, ...file.path.split("/"));
      return !existsSync(path) || hashFile(path) !== file.sha256;
    })
    .map((file) => file.path);
}
