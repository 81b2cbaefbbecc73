/**
 * Artifact registry schema.
 *
 * The persisted file is this schema serialized field-for-field as JSON.
 */

import { z } from "zod";

export const REGISTRY_VERSION = "1.0";
export const PIPELINE_VERSION = "1.0";

export const ArtifactTypeSchema = z.enum([
  "raw-data",
  "processed-data",
  "plot",
  "report",
  "serialized-object",
  "validation-report",
]);

export type ArtifactType = z.infer<typeof ArtifactTypeSchema>;

export const ArtifactSchema = z
  .object({
    /** Registry key; unique within a registry */
    name: z.string().min(1),
    type: ArtifactTypeSchema,
    /** Workflow that produced the artifact (e.g. "plot_generation") */
    workflow: z.string().min(1),
    filePath: z.string().min(1),
    /** SHA-256 of the file bytes, lowercase hex */
    contentHash: z.string().min(1),
    fileSizeBytes: z.number().int().min(0),
    /** Names of the artifacts this one was derived from */
    inputArtifacts: z.array(z.string()),
    metadata: z.record(z.unknown()),
    createdUtc: z.string().datetime(),
    /** Generation group; null for artifacts registered outside a run */
    runId: z.string().nullable(),
    pipelineVersion: z.string(),
    /** Problems found at registration time, e.g. unresolved inputs */
    integrityWarnings: z.array(z.string()),
  })
  .strict();

export type Artifact = z.infer<typeof ArtifactSchema>;

export const RegistrySchema = z
  .object({
    registryVersion: z.string(),
    pipelineVersion: z.string(),
    createdUtc: z.string().datetime(),
    lastModifiedUtc: z.string().datetime().nullable(),
    artifacts: z.record(ArtifactSchema),
  })
  .strict();

export type Registry = z.infer<typeof RegistrySchema>;
