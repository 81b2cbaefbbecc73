/**
 * Dataset quality metrics.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * SCORING
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   score = completeness × 0.4 + schemaMatch × 0.4 + rowScore × 0.2
 *
 *   completeness   % of cells that are not missing (0 for an empty table)
 *   schemaMatch    % of required columns present with the expected type
 *                  (100 when nothing is required)
 *   rowScore       100 once minRows is reached, proportional below it
 *
 * The score is clamped to 0-100 and rounded to one decimal.
 *
 *   ≥ 90   success
 *   ≥ 50   partial
 *   < 50   failed
 */

import type { ColumnType } from "../config/pipeline/schema.js";
import type { Dataset } from "../types/dataset.js";
import type { ResultStatus } from "../result/result.js";

export interface QualityMetrics {
  completeness: number;
  schemaMatch: number;
  rowCountOk: boolean;
  rowCount: number;
  minRows: number;
  missingCells: number;
}

export interface QualityOptions {
  requiredColumns: readonly string[];
  minRows: number;
  columnTypes: Readonly<Record<string, ColumnType>>;
}

const WEIGHTS = { completeness: 0.4, schema: 0.4, rowCount: 0.2 } as const;

export function isNumericCell(cell: string): boolean {
  return cell.trim() !== "" && Number.isFinite(Number(cell));
}

function columnHasType(data: Dataset, column: string, type: ColumnType): boolean {
  if (type === "string") {
    return true;
  }
  return data.rows.every((row) => {
    const cell = row[column] ?? null;
    return cell === null || isNumericCell(cell);
  });
}

export function computeQualityMetrics(data: Dataset, options: QualityOptions): QualityMetrics {
  const totalCells = data.rows.length * data.columns.length;
  let missingCells = 0;
  for (const row of data.rows) {
    for (const column of data.columns) {
      if ((row[column] ?? null) === null) {
        missingCells++;
      }
    }
  }

  const completeness = totalCells === 0 ? 0 : ((totalCells - missingCells) / totalCells) * 100;

  const required = options.requiredColumns;
  const matching = required.filter((column) => {
    if (!data.columns.includes(column)) {
      return false;
    }
    const type = options.columnTypes[column];
    return type === undefined || columnHasType(data, column, type);
  }).length;
  const schemaMatch = required.length === 0 ? 100 : (matching / required.length) * 100;

  return {
    completeness,
    schemaMatch,
    rowCountOk: data.rows.length >= options.minRows,
    rowCount: data.rows.length,
    minRows: options.minRows,
    missingCells,
  };
}

export function calculateQualityScore(metrics: QualityMetrics): number {
  const rowScore = metrics.rowCountOk
    ? 100
    : Math.min(100, (metrics.rowCount / Math.max(metrics.minRows, 1)) * 100);

  const raw =
    metrics.completeness * WEIGHTS.completeness +
    metrics.schemaMatch * WEIGHTS.schema +
    rowScore * WEIGHTS.rowCount;

  return Math.round(Math.min(100, Math.max(0, raw)) * 10) / 10;
}

export function qualityStatus(score: number): ResultStatus {
  if (score >= 90) return "success";
  if (score >= 50) return "partial";
  return "failed";
}
