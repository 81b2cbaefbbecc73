/**
 * Numeric summaries across every numeric column.
 *
 * A column is numeric when all of its non-missing cells parse as finite
 * numbers. Columns mixing numbers and text are skipped with a warning and
 * lower the item's quality score; pure text columns are ignored.
 */

import { failedPlotResult, generateBatch } from "../../modules/batch.js";
import type { Dataset } from "../../types/dataset.js";
import type {
  ItemDescriptor,
  PlotConfig,
  PlotModule,
  PlotResult,
  PlotResultMap,
} from "../../types/module.js";
import { renderBarChart, writeSvgPlot, type Bar } from "../svg.js";

const ITEMS: readonly ItemDescriptor[] = [
  { id: "column-means", group: "compact", displayName: "Column means" },
  { id: "column-ranges", group: "compact", displayName: "Column ranges" },
];

export interface NumericColumn {
  name: string;
  values: number[];
}

export interface NumericProfile {
  numeric: NumericColumn[];
  /** Columns with both numeric and non-numeric cells */
  mixed: string[];
}

function parseNumber(cell: string): number | null {
  if (cell.trim() === "") {
    return null;
  }
  const value = Number(cell);
  return Number.isFinite(value) ? value : null;
}

export function profileColumns(data: Dataset): NumericProfile {
  const numeric: NumericColumn[] = [];
  const mixed: string[] = [];

  for (const column of data.columns) {
    const values: number[] = [];
    let textCells = 0;
    for (const row of data.rows) {
      const cell = row[column] ?? null;
      if (cell === null) {
        continue;
      }
      const value = parseNumber(cell);
      if (value === null) {
        textCells++;
      } else {
        values.push(value);
      }
    }

    if (values.length > 0 && textCells === 0) {
      numeric.push({ name: column, values });
    } else if (values.length > 0) {
      mixed.push(column);
    }
  }

  return { numeric, mixed };
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function meanBars(columns: readonly NumericColumn[]): Bar[] {
  return columns.map(({ name, values }) => {
    const mean = round2(values.reduce((sum, v) => sum + v, 0) / values.length);
    return { label: name, start: Math.min(0, mean), end: Math.max(0, mean) };
  });
}

function rangeBars(columns: readonly NumericColumn[]): Bar[] {
  return columns.map(({ name, values }) => ({
    label: name,
    start: Math.min(...values),
    end: Math.max(...values),
  }));
}

export function createNumericProfileModule(): PlotModule {
  async function generatePlot(data: Dataset, itemId: string, config: PlotConfig): Promise<PlotResult> {
    const started = Date.now();

    if (!ITEMS.some((item) => item.id === itemId)) {
      return failedPlotResult(itemId, `Unknown item: ${itemId}`);
    }

    const { numeric, mixed } = profileColumns(data);
    if (numeric.length === 0) {
      return failedPlotResult(itemId, "No numeric columns", Date.now() - started);
    }

    const bars = itemId === "column-means" ? meanBars(numeric) : rangeBars(numeric);
    const svg = renderBarChart({
      title: itemId === "column-means" ? "Column means" : "Column ranges",
      axisLabel: "value",
      bars,
      dpi: config.dpi,
    });
    const outputPath = writeSvgPlot(config, itemId, svg);

    const warnings = mixed.map((column) => `Skipped column with non-numeric values: ${column}`);
    const qualityScore = round2((numeric.length / (numeric.length + mixed.length)) * 100);

    return {
      itemId,
      status: mixed.length > 0 ? "partial" : "success",
      outputPath,
      qualityScore,
      durationMs: Date.now() - started,
      error: null,
      warnings,
    };
  }

  return {
    getModuleMetadata: () => ({
      name: "numeric-profile",
      version: "1.0.0",
      description: "Means and ranges of numeric columns",
    }),
    getAvailablePlots: () => ITEMS,
    generatePlot,
    generatePlotsBatch: (data, itemIds, config): Promise<PlotResultMap> =>
      generateBatch(itemIds, (itemId) => generatePlot(data, itemId, config), {
        continueOnError: config.continueOnError,
        itemTimeoutMs: config.itemTimeoutMs,
      }),
  };
}
