/**
 * Completeness plots: how much of the dataset is actually filled in.
 *
 * Items:
 *   column-completeness     percentage of non-missing cells per column
 *   missing-by-row-bucket   missing cells per block of consecutive rows
 *
 * Params:
 *   bucketSize   rows per block for missing-by-row-bucket (default 10)
 */

import { z } from "zod";
import { failedPlotResult, generateBatch } from "../../modules/batch.js";
import type { Dataset } from "../../types/dataset.js";
import type {
  ItemDescriptor,
  ModuleMetadata,
  PlotConfig,
  PlotModule,
  PlotResult,
  PlotResultMap,
} from "../../types/module.js";
import { renderBarChart, writeSvgPlot, type Bar } from "../svg.js";

const ITEMS: readonly ItemDescriptor[] = [
  { id: "column-completeness", group: "compact", displayName: "Column completeness" },
  { id: "missing-by-row-bucket", group: "expanded", displayName: "Missing cells by row block" },
];

const BucketSizeSchema = z.number().int().positive().catch(10);

function completenessBars(data: Dataset): Bar[] {
  return data.columns.map((column) => {
    const present = data.rows.filter((row) => (row[column] ?? null) !== null).length;
    return { label: column, start: 0, end: Math.round((present / data.rows.length) * 1000) / 10 };
  });
}

function rowBucketBars(data: Dataset, bucketSize: number): Bar[] {
  const bars: Bar[] = [];
  for (let first = 0; first < data.rows.length; first += bucketSize) {
    const block = data.rows.slice(first, first + bucketSize);
    const missing = block.reduce(
      (sum, row) => sum + data.columns.filter((column) => (row[column] ?? null) === null).length,
      0
    );
    bars.push({ label: `rows ${first + 1}-${first + block.length}`, start: 0, end: missing });
  }
  return bars;
}

export function createCompletenessModule(): PlotModule {
  const metadata: ModuleMetadata = {
    name: "completeness",
    version: "1.0.0",
    description: "Missing-value coverage by column and by row block",
  };

  async function generatePlot(data: Dataset, itemId: string, config: PlotConfig): Promise<PlotResult> {
    const started = Date.now();

    if (!ITEMS.some((item) => item.id === itemId)) {
      return failedPlotResult(itemId, `Unknown item: ${itemId}`);
    }
    if (data.rows.length === 0 || data.columns.length === 0) {
      return failedPlotResult(itemId, "Dataset is empty", Date.now() - started);
    }

    let svg: string;
    if (itemId === "column-completeness") {
      svg = renderBarChart({
        title: "Column completeness",
        axisLabel: "% non-missing",
        bars: completenessBars(data),
        dpi: config.dpi,
      });
    } else {
      const bucketSize = BucketSizeSchema.parse(config.params?.["bucketSize"]);
      svg = renderBarChart({
        title: `Missing cells per ${bucketSize} rows`,
        axisLabel: "missing cells",
        bars: rowBucketBars(data, bucketSize),
        dpi: config.dpi,
      });
    }

    const outputPath = writeSvgPlot(config, itemId, svg);
    return {
      itemId,
      status: "success",
      outputPath,
      qualityScore: 100,
      durationMs: Date.now() - started,
      error: null,
      warnings: [],
    };
  }

  return {
    getModuleMetadata: () => metadata,
    getAvailablePlots: () => ITEMS,
    generatePlot,
    generatePlotsBatch: (data, itemIds, config): Promise<PlotResultMap> =>
      generateBatch(itemIds, (itemId) => generatePlot(data, itemId, config), {
        continueOnError: config.continueOnError,
        itemTimeoutMs: config.itemTimeoutMs,
      }),
  };
}
