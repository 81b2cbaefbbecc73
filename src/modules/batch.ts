/**
 * Resilient batch execution for plot modules.
 *
 * Plugins build their `generatePlotsBatch` on top of generateBatch so that
 * every module shares one failure policy:
 *
 *   - items run strictly in order, one at a time
 *   - a thrown fault or a timeout becomes a failed PlotResult
 *   - with continueOnError=false the batch stops after the first failed item
 */

import type { Logger } from "../logging/logger.js";
import { ItemGenerationError, errorMessage } from "../result/errors.js";
import type { PlotResult } from "../types/module.js";

export interface BatchOptions {
  continueOnError: boolean;
  /** Per-item limit; unset means no limit */
  itemTimeoutMs?: number;
  logger?: Logger;
}

export type ItemGenerator = (itemId: string) => Promise<PlotResult>;

export function failedPlotResult(itemId: string, error: string, durationMs = 0): PlotResult {
  return {
    itemId,
    status: "failed",
    outputPath: null,
    qualityScore: 0,
    durationMs,
    error,
    warnings: [],
  };
}

async function withTimeout<T>(
  work: Promise<T>,
  itemId: string,
  timeoutMs: number | undefined
): Promise<T> {
  if (timeoutMs === undefined) {
    return work;
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new ItemGenerationError(itemId, `Item "${itemId}" timed out after ${timeoutMs} ms`)),
      timeoutMs
    );
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export async function generateBatch(
  itemIds: readonly string[],
  generate: ItemGenerator,
  options: BatchOptions
): Promise<Record<string, PlotResult>> {
  const results: Record<string, PlotResult> = {};

  for (const itemId of itemIds) {
    const started = Date.now();
    let result: PlotResult;

    try {
      result = await withTimeout(
        Promise.resolve().then(() => generate(itemId)),
        itemId,
        options.itemTimeoutMs
      );
    } catch (err) {
      const failure =
        err instanceof ItemGenerationError ? err : new ItemGenerationError(itemId, errorMessage(err));
      options.logger?.warn("Item generation failed", { item: itemId, error: failure.message });
      result = failedPlotResult(itemId, failure.message, Date.now() - started);
    }

    results[itemId] = result;

    if (result.status === "failed" && !options.continueOnError) {
      options.logger?.info("Stopping batch after failed item", { item: itemId });
      break;
    }
  }

  return results;
}
