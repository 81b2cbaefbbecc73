#!/usr/bin/env node
/**
 * Scaffolding for the pipeline workspace.
 *
 *   npx tsx scripts/scaffold-module.ts                 create the standard folder layout
 *   npx tsx scripts/scaffold-module.ts --module <name> create src/plugins/<name>/module.ts
 *
 * A scaffolded module still has to be added to createBuiltinCatalog() in
 * src/plugins/index.ts before the loader can build it.
 */

import { mkdir, writeFile, access } from "node:fs/promises";
import { join } from "node:path";
import { parseArgs } from "node:util";

const DIRECTORIES = ["config", "data", "reports", "output"] as const;

const MODULE_NAME = /^[a-z][a-z0-9]*(-[a-z0-9]+)*$/;

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

function toFactoryName(moduleName: string): string {
  const pascal = moduleName
    .split("-")
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join("");
  return `create${pascal}Module`;
}

function moduleTemplate(moduleName: string): string {
  return `/**
 * ${moduleName} plots.
 */

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
import { renderBarChart, writeSvgPlot } from "../svg.js";

const ITEMS: readonly ItemDescriptor[] = [
  { id: "row-count", group: "compact", displayName: "Row count" },
];

export function ${toFactoryName(moduleName)}(): PlotModule {
  const metadata: ModuleMetadata = {
    name: "${moduleName}",
    version: "0.1.0",
  };

  async function generatePlot(data: Dataset, itemId: string, config: PlotConfig): Promise<PlotResult> {
    const started = Date.now();
    if (!ITEMS.some((item) => item.id === itemId)) {
      return failedPlotResult(itemId, \`Unknown item: \${itemId}\`);
    }

    const svg = renderBarChart({
      title: "Row count",
      axisLabel: "rows",
      bars: [{ label: "rows", start: 0, end: data.rows.length }],
      dpi: config.dpi,
    });

    return {
      itemId,
      status: "success",
      outputPath: writeSvgPlot(config, itemId, svg),
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
`;
}

async function scaffoldDirectories(rootDir: string): Promise<void> {
  console.log(`Scaffolding project structure in: ${rootDir}`);

  for (const dir of DIRECTORIES) {
    const dirPath = join(rootDir, dir);
    const gitkeepPath = join(dirPath, ".gitkeep");

    if (await exists(dirPath)) {
      console.log(`  [exists] ${dir}/`);
    } else {
      await mkdir(dirPath, { recursive: true });
      console.log(`  [created] ${dir}/`);
    }

    if (!(await exists(gitkeepPath))) {
      await writeFile(gitkeepPath, "");
      console.log(`  [created] ${dir}/.gitkeep`);
    }
  }

  console.log("\nScaffolding complete.");
}

async function scaffoldModule(rootDir: string, moduleName: string): Promise<void> {
  if (!MODULE_NAME.test(moduleName)) {
    throw new Error(`Module name must be kebab-case, got: ${moduleName}`);
  }

  const moduleDir = join(rootDir, "src", "plugins", moduleName);
  const entryPath = join(moduleDir, "module.ts");
  if (await exists(entryPath)) {
    throw new Error(`Refusing to overwrite ${entryPath}`);
  }

  await mkdir(moduleDir, { recursive: true });
  await writeFile(entryPath, moduleTemplate(moduleName));
  console.log(`  [created] src/plugins/${moduleName}/module.ts`);
  console.log(
    `\nRegister it in src/plugins/index.ts:\n  .register("${moduleName}", ${toFactoryName(moduleName)})`
  );
}

const { values, positionals } = parseArgs({
  options: { module: { type: "string" } },
  allowPositionals: true,
});

const rootDir = positionals[0] ?? process.cwd();
const task = values.module === undefined ? scaffoldDirectories(rootDir) : scaffoldModule(rootDir, values.module);

task.catch((err: unknown) => {
  console.error("Scaffolding failed:", err);
  process.exit(1);
});
