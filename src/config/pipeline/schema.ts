/**
 * Pipeline configuration schema definition.
 *
 * IMMUTABILITY RATIONALE:
 * Configuration is validated once before a run and then frozen. Every
 * artifact the run registers is traceable to one configuration; changing
 * paths or thresholds requires a new run with a new run ID.
 */

import { z } from "zod";

export const ColumnTypeSchema = z.enum(["number", "string"]);

export type ColumnType = z.infer<typeof ColumnTypeSchema>;

/**
 * Study identification.
 */
export const StudySchema = z
  .object({
    name: z.string().min(1).describe("Short study name used in run summaries"),
    description: z.string().optional(),
  })
  .strict();

/**
 * Input dataset and its validation thresholds.
 */
export const DataSchema = z
  .object({
    /** CSV file with the study observations */
    sourceFile: z.string().min(1).describe("Path to the source CSV file"),

    requiredColumns: z
      .array(z.string().min(1))
      .describe("Columns that must be present; a missing one fails the run"),

    minRows: z.number().int().min(0).describe("Rows below this count lower the quality score"),

    /** Expected column types used for the schema-match metric */
    columnTypes: z.record(ColumnTypeSchema),

    artifactName: z
      .string()
      .min(1)
      .describe("Registry name for the raw dataset artifact"),
  })
  .strict();

export const PathsSchema = z
  .object({
    modulesRoot: z.string().min(1).describe("Directory scanned for plot modules"),
    outputRoot: z.string().min(1).describe("Plot output base; one subdirectory per module"),
    registryPath: z.string().min(1).describe("Persisted artifact registry (JSON)"),
    logDir: z.string().min(1),
  })
  .strict();

export const PlotsSchema = z
  .object({
    dpi: z.number().int().positive(),
    continueOnError: z.boolean(),
    /** null disables the per-item time bound */
    itemTimeoutMs: z.number().int().positive().nullable(),
    /** Free-form parameters passed through to every module */
    params: z.record(z.unknown()),
  })
  .strict();

export const RendererSchema = z
  .object({
    command: z.string().min(1),
    /** May contain {input} and {outputDir} placeholders */
    args: z.array(z.string()),
    /** Arguments used to check whether the command is installed */
    versionArgs: z.array(z.string()),
    outputExtension: z.string().regex(/^\.[A-Za-z0-9]+$/),
    timeoutMs: z.number().int().positive(),
  })
  .strict();

export const ReportsSchema = z
  .object({
    enabled: z.boolean(),
    templatesDir: z.string().min(1),
    templates: z.array(z.string().min(1)),
    outputDir: z.string().min(1),
    renderer: RendererSchema,
  })
  .strict();

export const QualityWeightsSchema = z
  .object({
    dataWeight: z.number().min(0).max(1),
    plotWeight: z.number().min(0).max(1),
  })
  .strict()
  .refine((w) => Math.abs(w.dataWeight + w.plotWeight - 1) < 1e-9, {
    message: "dataWeight and plotWeight must sum to 1",
  });

export const RetentionSchema = z
  .object({
    /** Generation groups kept by artifact cleanup */
    keepGenerations: z.number().int().min(1),
  })
  .strict();

export const PipelineConfigSchema = z
  .object({
    study: StudySchema,
    data: DataSchema,
    paths: PathsSchema,
    plots: PlotsSchema,
    reports: ReportsSchema,
    quality: QualityWeightsSchema,
    retention: RetentionSchema,
  })
  .strict();

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type RendererConfig = z.infer<typeof RendererSchema>;
export type ReportsConfig = z.infer<typeof ReportsSchema>;
export type QualityWeights = z.infer<typeof QualityWeightsSchema>;
