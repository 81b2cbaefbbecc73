/**
 * CSV data loading with quality assessment.
 *
 * The loader is the pipeline's only data collaborator. It never throws:
 * every problem is reported through the returned DataLoadResult, and a
 * "failed" status tells the driver to stop the run.
 */

import { existsSync, readFileSync } from "node:fs";
import { basename } from "node:path";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { errorMessage } from "../result/errors.js";
import type { ResultStatus } from "../result/result.js";
import type { CellValue, DataRow, Dataset } from "../types/dataset.js";
import {
  calculateQualityScore,
  computeQualityMetrics,
  qualityStatus,
  type QualityMetrics,
  type QualityOptions,
} from "./quality.js";

export type DataLoadOptions = QualityOptions;

export interface DataLoadResult {
  data: Dataset | null;
  rowCount: number;
  columnCount: number;
  /** 0-100 */
  qualityScore: number;
  qualityMetrics: QualityMetrics | null;
  status: ResultStatus;
  message: string;
  warnings: string[];
  errors: string[];
  durationMs: number;
}

export type DataLoader = (filePath: string, options: DataLoadOptions) => Promise<DataLoadResult>;

/** Cell values read as missing. */
export const MISSING_VALUES: ReadonlySet<string> = new Set(["", "NA"]);

const RecordsSchema = z.array(z.array(z.string()));

function toCell(raw: string): CellValue {
  return MISSING_VALUES.has(raw) ? null : raw;
}

/**
 * Parse CSV text into a dataset. The first record is the header.
 *
 * @throws on malformed CSV (e.g. inconsistent column counts)
 */
export function parseCsv(text: string): Dataset {
  const records = RecordsSchema.parse(
    parse(text, { bom: true, skip_empty_lines: true, trim: true })
  );
  const [header, ...body] = records;
  if (!header) {
    return { columns: [], rows: [] };
  }

  const rows: DataRow[] = body.map((record) => {
    const row: Record<string, CellValue> = {};
    header.forEach((column, i) => {
      row[column] = toCell(record[i] ?? "");
    });
    return row;
  });

  return { columns: header, rows };
}

function failure(message: string, started: number, warnings: string[] = []): DataLoadResult {
  return {
    data: null,
    rowCount: 0,
    columnCount: 0,
    qualityScore: 0,
    qualityMetrics: null,
    status: "failed",
    message,
    warnings,
    errors: [message],
    durationMs: Date.now() - started,
  };
}

export const loadAndValidateData: DataLoader = async (filePath, options) => {
  const started = Date.now();

  if (!existsSync(filePath)) {
    return failure(`File not found: ${basename(filePath)}`, started);
  }

  let data: Dataset;
  try {
    data = parseCsv(readFileSync(filePath, "utf-8"));
  } catch (err) {
    return failure(`Cannot parse ${basename(filePath)}: ${errorMessage(err)}`, started);
  }

  const missing = options.requiredColumns.filter((column) => !data.columns.includes(column));
  if (missing.length > 0) {
    return failure(`Missing required columns: ${missing.join(", ")}`, started);
  }

  const metrics = computeQualityMetrics(data, options);
  const qualityScore = calculateQualityScore(metrics);
  const status = qualityStatus(qualityScore);

  const warnings: string[] = [];
  if (!metrics.rowCountOk) {
    warnings.push(`Only ${metrics.rowCount} rows found, minimum ${metrics.minRows} required`);
  }
  if (metrics.schemaMatch < 100) {
    warnings.push(`Schema match ${metrics.schemaMatch.toFixed(1)}%: some columns have unexpected types`);
  }

  const errors =
    status === "failed" ? [`Data quality score ${qualityScore} is below 50`] : [];

  return {
    data,
    rowCount: data.rows.length,
    columnCount: data.columns.length,
    qualityScore,
    qualityMetrics: metrics,
    status,
    message:
      status === "failed"
        ? errors.join("; ")
        : `Loaded ${data.rows.length} rows × ${data.columns.length} columns (quality ${qualityScore}/100)`,
    warnings,
    errors,
    durationMs: Date.now() - started,
  };
};
