/**
 * Batch orchestrator tests.
 *
 * These tests verify:
 *   1. Item and module failures stay isolated and set the status
 *   2. init and cleanup hooks wrap each module's batch
 *   3. Modules run after the modules they require, and unmet requirements skip them
 *
 * Run: node --import tsx --test src/orchestration/orchestrator.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { after, describe, test } from "node:test";

import { createLogger } from "../logging/logger.js";
import { failedPlotResult, generateBatch } from "../modules/batch.js";
import { ModuleCatalog } from "../modules/catalog.js";
import type { Dataset } from "../types/dataset.js";
import type { PlotConfig, PlotModule, PlotResult } from "../types/module.js";
import { orchestratePlotGeneration, type OrchestrateOptions } from "./orchestrator.js";

const TMP = mkdtempSync(join(tmpdir(), "orchestrator-"));
const logger = createLogger({ console: false, file: false });
const DATA: Dataset = { columns: ["x"], rows: [{ x: "1" }] };

after(() => {
  rmSync(TMP, { recursive: true, force: true });
});

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

/** Plugin root with one `module.ts` directory per name. */
function pluginRoot(...names: string[]): string {
  const root = mkdtempSync(join(TMP, "plugins-"));
  for (const name of names) {
    mkdirSync(join(root, name));
    writeFileSync(join(root, name, "module.ts"), "export {};\n");
  }
  return root;
}

/**
 * Module with `count` items; the ids listed in `failing` return failed
 * results, everything else succeeds with `quality`.
 */
function fakeModule(count: number, failing: readonly string[] = [], quality = 80): PlotModule {
  const ids = Array.from({ length: count }, (_, i) => `item-${i + 1}`);
  async function generatePlot(_data: Dataset, itemId: string, config: PlotConfig): Promise<PlotResult> {
    if (failing.includes(itemId)) {
      return failedPlotResult(itemId, "forced failure");
    }
    return {
      itemId,
      status: "success",
      outputPath: join(config.outputDir, `${itemId}_${config.runId}.svg`),
      qualityScore: quality,
      durationMs: 0,
      error: null,
      warnings: [],
    };
  }
  return {
    getModuleMetadata: () => ({ name: "fake", version: "0.1.0" }),
    getAvailablePlots: () => ids.map((id) => ({ id, group: "compact" })),
    generatePlot,
    generatePlotsBatch: (data, itemIds, config) =>
      generateBatch(itemIds, (id) => generatePlot(data, id, config), {
        continueOnError: config.continueOnError,
      }),
  };
}

function options(overrides: Partial<OrchestrateOptions>): OrchestrateOptions {
  return {
    data: DATA,
    modulesRoot: pluginRoot(),
    outputRoot: join(TMP, "out"),
    catalog: new ModuleCatalog(),
    runId: "20260101-aaaaaa",
    logger,
    ...overrides,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// TESTS
// ═══════════════════════════════════════════════════════════════════════════

describe("orchestratePlotGeneration", () => {
  test("N items with M independent failures", async () => {
    const catalog = new ModuleCatalog().register("m", () => fakeModule(6, ["item-2", "item-5"]));
    const result = await orchestratePlotGeneration(
      options({ modulesRoot: pluginRoot("m"), catalog })
    );

    assert.equal(result.plotsGenerated, 4);
    assert.equal(result.plotsFailed, 2);
    assert.equal(result.status, "partial");
    assert.equal(result.successRate, 4 / 6);
    // 4 × 80 / 6 attempted
    assert.equal(result.qualityScore, 53.33);
    assert.deepEqual(result.errors, ["m/item-2: forced failure", "m/item-5: forced failure"]);
  });

  test("all items succeeding gives success", async () => {
    const catalog = new ModuleCatalog().register("m", () => fakeModule(3));
    const result = await orchestratePlotGeneration(
      options({ modulesRoot: pluginRoot("m"), catalog })
    );
    assert.equal(result.status, "success");
    assert.equal(result.plotsGenerated, 3);
    assert.equal(result.qualityScore, 80);
    assert.equal(result.successRate, 1);
    assert.deepEqual(result.errors, []);
  });

  test("one module loads and one fails to load", async () => {
    const catalog = new ModuleCatalog()
      .register("good", () => fakeModule(5))
      .register("broken", () => ({ getModuleMetadata: () => ({ name: "broken", version: "1" }) }));
    const result = await orchestratePlotGeneration(
      options({ modulesRoot: pluginRoot("broken", "good"), catalog })
    );

    assert.equal(result.modulesFound, 2);
    assert.equal(result.modulesLoaded, 1);
    assert.equal(result.modulesFailed, 1);
    assert.equal(result.plotsGenerated, 5);
    assert.equal(result.plotsFailed, 0);
    assert.equal(result.status, "partial");
    assert.equal(result.errors.length, 1);
    assert.ok(result.errors[0]?.startsWith('Module "broken" is missing required capabilities'));
    assert.deepEqual(
      result.modules.map((m) => [m.name, m.loaded, m.version]),
      [
        ["broken", false, null],
        ["good", true, "0.1.0"],
      ]
    );
  });

  test("no modules found is partial with a warning", async () => {
    const result = await orchestratePlotGeneration(options({}));
    assert.equal(result.status, "partial");
    assert.equal(result.modulesFound, 0);
    assert.equal(result.successRate, 0);
    assert.ok(result.warnings[0]?.startsWith("No plot modules found under "));
    assert.ok(result.warnings.includes("No plot items were attempted"));
  });

  test("modules found but none loaded is failed", async () => {
    const result = await orchestratePlotGeneration(
      options({ modulesRoot: pluginRoot("a", "b") })
    );
    assert.equal(result.status, "failed");
    assert.equal(result.modulesFailed, 2);
  });

  test("a throwing batch call counts the module as failed but loaded", async () => {
    const catalog = new ModuleCatalog().register("thrower", () => ({
      ...fakeModule(2),
      generatePlotsBatch: async () => {
        throw new Error("device lost");
      },
    }));
    const result = await orchestratePlotGeneration(
      options({ modulesRoot: pluginRoot("thrower"), catalog })
    );
    assert.equal(result.modulesLoaded, 1);
    assert.equal(result.modulesFailed, 1);
    assert.deepEqual(result.errors, ['Module "thrower" batch failed: device lost']);
    assert.equal(result.status, "partial");
  });

  test("continueOnError=false stops within a module, not across modules", async () => {
    const catalog = new ModuleCatalog()
      .register("first", () => fakeModule(4, ["item-1"]))
      .register("second", () => fakeModule(2));
    const result = await orchestratePlotGeneration(
      options({ modulesRoot: pluginRoot("first", "second"), catalog, continueOnError: false })
    );
    assert.deepEqual(Object.keys(result.results["first"] ?? {}), ["item-1"]);
    assert.deepEqual(Object.keys(result.results["second"] ?? {}), ["item-1", "item-2"]);
    assert.ok(
      result.warnings.includes('Module "first": 3 item(s) not attempted: item-2, item-3, item-4')
    );
  });

  test("malformed batch entries become failed results", async () => {
    const catalog = new ModuleCatalog().register("sloppy", () => ({
      ...fakeModule(2),
      generatePlotsBatch: async () => ({
        "item-1": { itemId: "item-1", status: "done" },
        "item-2": failedPlotResult("item-2", "x"),
      }),
    }));
    const result = await orchestratePlotGeneration(
      options({ modulesRoot: pluginRoot("sloppy"), catalog })
    );
    const entry = result.results["sloppy"]?.["item-1"];
    assert.equal(entry?.status, "failed");
    assert.ok(entry?.error?.startsWith("Malformed result (status: "));
    assert.equal(result.plotsFailed, 2);
  });

  test("passes run settings to the module", async () => {
    let seen: PlotConfig | undefined;
    const catalog = new ModuleCatalog().register("spy", () => ({
      ...fakeModule(1),
      generatePlotsBatch: async (_data: Dataset, itemIds: readonly string[], config: PlotConfig) => {
        seen = config;
        return Object.fromEntries(itemIds.map((id) => [id, failedPlotResult(id, "skip")]));
      },
    }));
    await orchestratePlotGeneration(
      options({
        modulesRoot: pluginRoot("spy"),
        catalog,
        dpi: 150,
        itemTimeoutMs: 500,
        params: { bucketSize: 5 },
      })
    );
    assert.deepEqual(seen, {
      outputDir: join(TMP, "out", "spy"),
      dpi: 150,
      continueOnError: true,
      runId: "20260101-aaaaaa",
      itemTimeoutMs: 500,
      params: { bucketSize: 5 },
    });
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// LIFECYCLE
// ═══════════════════════════════════════════════════════════════════════════

describe("module lifecycle hooks", () => {
  test("init runs before the batch and cleanup after it", async () => {
    const calls: string[] = [];
    const catalog = new ModuleCatalog().register("hooked", () => {
      const base = fakeModule(1);
      return {
        ...base,
        init: (config: PlotConfig) => {
          calls.push(`init ${config.runId}`);
        },
        generatePlotsBatch: async (data: Dataset, itemIds: readonly string[], config: PlotConfig) => {
          calls.push("batch");
          return base.generatePlotsBatch(data, itemIds, config);
        },
        cleanup: async () => {
          calls.push("cleanup");
        },
      };
    });
    const result = await orchestratePlotGeneration(
      options({ modulesRoot: pluginRoot("hooked"), catalog })
    );
    assert.deepEqual(calls, ["init 20260101-aaaaaa", "batch", "cleanup"]);
    assert.equal(result.status, "success");
  });

  test("a failing init skips the batch but still cleans up", async () => {
    const calls: string[] = [];
    const catalog = new ModuleCatalog().register("flaky", () => ({
      ...fakeModule(2),
      init: () => {
        throw new Error("no fonts");
      },
      cleanup: () => {
        calls.push("cleanup");
      },
    }));
    const result = await orchestratePlotGeneration(
      options({ modulesRoot: pluginRoot("flaky"), catalog })
    );
    assert.deepEqual(calls, ["cleanup"]);
    assert.deepEqual(result.errors, ['Module "flaky" init failed: no fonts']);
    assert.equal(result.modulesLoaded, 1);
    assert.equal(result.modulesFailed, 1);
    assert.equal(result.plotsGenerated, 0);
  });

  test("a failing cleanup is a warning and keeps the results", async () => {
    const catalog = new ModuleCatalog().register("messy", () => ({
      ...fakeModule(2),
      cleanup: () => {
        throw new Error("temp dir busy");
      },
    }));
    const result = await orchestratePlotGeneration(
      options({ modulesRoot: pluginRoot("messy"), catalog })
    );
    assert.equal(result.plotsGenerated, 2);
    assert.deepEqual(result.errors, []);
    assert.ok(result.warnings.includes('Module "messy" cleanup failed: temp dir busy'));
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// DEPENDENCIES
// ═══════════════════════════════════════════════════════════════════════════

describe("module dependencies", () => {
  function requiring(
    name: string,
    requires: { modules?: string[]; commands?: string[] },
    calls: string[] = []
  ): PlotModule {
    const base = fakeModule(1);
    return {
      ...base,
      getModuleMetadata: () => ({ name, version: "1.0.0", requires }),
      generatePlotsBatch: async (data, itemIds, config) => {
        calls.push(name);
        return base.generatePlotsBatch(data, itemIds, config);
      },
    };
  }

  test("required modules run first", async () => {
    const calls: string[] = [];
    const catalog = new ModuleCatalog()
      .register("alpha", () => requiring("alpha", { modules: ["zeta"] }, calls))
      .register("zeta", () => requiring("zeta", {}, calls));
    const result = await orchestratePlotGeneration(
      options({ modulesRoot: pluginRoot("alpha", "zeta"), catalog })
    );
    assert.deepEqual(calls, ["zeta", "alpha"]);
    assert.deepEqual(
      result.modules.map((m) => m.name),
      ["zeta", "alpha"]
    );
    assert.equal(result.status, "success");
  });

  test("a module requiring a missing module is skipped with its dependents", async () => {
    const calls: string[] = [];
    const catalog = new ModuleCatalog()
      .register("base", () => requiring("base", { modules: ["absent"] }, calls))
      .register("derived", () => requiring("derived", { modules: ["base"] }, calls))
      .register("plain", () => requiring("plain", {}, calls));
    const result = await orchestratePlotGeneration(
      options({ modulesRoot: pluginRoot("base", "derived", "plain"), catalog })
    );
    assert.deepEqual(calls, ["plain"]);
    assert.deepEqual(result.errors, [
      'Module "base" requires unavailable module(s): absent',
      'Module "derived" requires unavailable module(s): base',
    ]);
    assert.equal(result.modulesLoaded, 3);
    assert.equal(result.modulesFailed, 2);
    assert.equal(result.status, "partial");
  });

  test("a missing command skips the module", async () => {
    const catalog = new ModuleCatalog()
      .register("render", () => requiring("render", { commands: ["inkscape", "node"] }));
    const result = await orchestratePlotGeneration(
      options({
        modulesRoot: pluginRoot("render"),
        catalog,
        commandAvailable: (command) => command === "node",
      })
    );
    assert.deepEqual(result.errors, ['Module "render" requires missing command(s): inkscape']);
    assert.equal(result.modulesLoaded, 1);
    assert.equal(result.status, "partial");
  });

  test("modules on a cycle are skipped and the rest run", async () => {
    const calls: string[] = [];
    const catalog = new ModuleCatalog()
      .register("a", () => requiring("a", { modules: ["b"] }, calls))
      .register("b", () => requiring("b", { modules: ["a"] }, calls))
      .register("c", () => requiring("c", {}, calls));
    const result = await orchestratePlotGeneration(
      options({ modulesRoot: pluginRoot("a", "b", "c"), catalog })
    );
    assert.deepEqual(calls, ["c"]);
    assert.deepEqual(result.errors, [
      'Module "a" is on a dependency cycle: a -> b -> a',
      'Module "b" is on a dependency cycle: a -> b -> a',
    ]);
    assert.equal(result.modulesFailed, 2);
  });
});
