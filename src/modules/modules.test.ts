/**
 * Module discovery, loading and batch execution tests.
 *
 * Run: node --import tsx --test src/modules/modules.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { after, describe, test } from "node:test";

import { ItemGenerationError, ModuleDiscoveryError } from "../result/errors.js";
import { ModuleStatus, type ModuleDescriptor, type PlotResult } from "../types/module.js";
import { failedPlotResult, generateBatch } from "./batch.js";
import { ModuleCatalog } from "./catalog.js";
import {
  buildDependencyGraph,
  findDependencyCycles,
  isCommandAvailable,
  planModuleRun,
  topologicalOrder,
} from "./dependencies.js";
import { discoverModules } from "./discovery.js";
import { loadModule, missingCapabilities } from "./loader.js";

const TMP = mkdtempSync(join(tmpdir(), "modules-"));

after(() => {
  rmSync(TMP, { recursive: true, force: true });
});

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

function descriptor(name: string): ModuleDescriptor {
  return {
    name,
    path: join(TMP, name),
    entryPoint: join(TMP, name, "module.ts"),
    declaredCapabilities: [],
    discoveredAt: "2026-01-01T00:00:00.000Z",
  };
}

function success(itemId: string): PlotResult {
  return {
    itemId,
    status: "success",
    outputPath: `/plots/${itemId}.svg`,
    qualityScore: 100,
    durationMs: 1,
    error: null,
    warnings: [],
  };
}

function completeModule(version = "1.0.0") {
  return {
    getModuleMetadata: () => ({ name: "fake", version }),
    getAvailablePlots: () => [{ id: "a", group: "compact" }],
    generatePlot: async (_data: unknown, itemId: string) => success(itemId),
    generatePlotsBatch: async () => ({ a: success("a") }),
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// DISCOVERY
// ═══════════════════════════════════════════════════════════════════════════

describe("discoverModules", () => {
  test("missing root yields an empty list", () => {
    assert.deepEqual(discoverModules(join(TMP, "no-such-root")), []);
  });

  test("root without qualifying directories yields an empty list", () => {
    const root = join(TMP, "empty-root");
    mkdirSync(join(root, "not-a-module"), { recursive: true });
    writeFileSync(join(root, "not-a-module", "index.ts"), "export {};\n");
    writeFileSync(join(root, "loose-file.ts"), "export {};\n");
    assert.deepEqual(discoverModules(root), []);
  });

  test("finds module directories in name order", () => {
    const root = join(TMP, "plugins");
    for (const name of ["zeta", "alpha"]) {
      mkdirSync(join(root, name), { recursive: true });
    }
    writeFileSync(
      join(root, "zeta", "module.js"),
      "export function getModuleMetadata() {}\nexport function generatePlot() {}\n"
    );
    writeFileSync(join(root, "alpha", "module.ts"), "// getAvailablePlots only\n");

    const found = discoverModules(root, { now: new Date("2026-02-01T00:00:00.000Z") });
    assert.deepEqual(
      found.map((d) => d.name),
      ["alpha", "zeta"]
    );
    assert.equal(found[0]?.entryPoint, join(root, "alpha", "module.ts"));
    assert.deepEqual(found[0]?.declaredCapabilities, ["getAvailablePlots"]);
    assert.deepEqual(found[1]?.declaredCapabilities, ["getModuleMetadata", "generatePlot"]);
    assert.equal(found[1]?.discoveredAt, "2026-02-01T00:00:00.000Z");
    assert.ok(Object.isFrozen(found[0]));
  });

  test("prefers module.ts over module.js", () => {
    const root = join(TMP, "both");
    mkdirSync(join(root, "dual"), { recursive: true });
    writeFileSync(join(root, "dual", "module.js"), "");
    writeFileSync(join(root, "dual", "module.ts"), "");
    assert.equal(discoverModules(root)[0]?.entryPoint, join(root, "dual", "module.ts"));
  });

  test("a root that is not a directory raises ModuleDiscoveryError", () => {
    const file = join(TMP, "root-is-a-file");
    writeFileSync(file, "");
    assert.throws(() => discoverModules(file), ModuleDiscoveryError);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// CATALOG + LOADER
// ═══════════════════════════════════════════════════════════════════════════

describe("ModuleCatalog", () => {
  test("later registration replaces the earlier factory", () => {
    const catalog = new ModuleCatalog()
      .register("m", () => completeModule("1.0.0"))
      .register("m", () => completeModule("2.0.0"));
    const result = loadModule(descriptor("m"), catalog);
    assert.equal(result.status, ModuleStatus.Success);
    assert.equal(result.status === ModuleStatus.Success && result.metadata.version, "2.0.0");
    assert.deepEqual(catalog.names(), ["m"]);
  });

  test("each load creates a fresh instance", () => {
    const catalog = new ModuleCatalog().register("m", () => completeModule());
    const first = loadModule(descriptor("m"), catalog);
    const second = loadModule(descriptor("m"), catalog);
    assert.ok(first.module);
    assert.notEqual(first.module, second.module);
  });
});

describe("loadModule", () => {
  test("loads a complete module", () => {
    const catalog = new ModuleCatalog().register("m", () => completeModule());
    const result = loadModule(descriptor("m"), catalog);
    assert.equal(result.status, ModuleStatus.Success);
    assert.equal(result.error, null);
    assert.equal(result.moduleName, "m");
  });

  test("names every missing capability", () => {
    const catalog = new ModuleCatalog().register("partial", () => ({
      getModuleMetadata: () => ({ name: "partial", version: "1" }),
      generatePlot: "not a function",
    }));
    const result = loadModule(descriptor("partial"), catalog);
    assert.equal(result.status, ModuleStatus.Failed);
    assert.equal(result.module, null);
    assert.equal(
      result.error,
      'Module "partial" is missing required capabilities: getAvailablePlots, generatePlot, generatePlotsBatch'
    );
    assert.deepEqual(result.status === ModuleStatus.Failed && result.missingCapabilities, [
      "getAvailablePlots",
      "generatePlot",
      "generatePlotsBatch",
    ]);
  });

  test("unregistered name fails without throwing", () => {
    const result = loadModule(descriptor("unknown"), new ModuleCatalog());
    assert.equal(result.status, ModuleStatus.Failed);
    assert.equal(result.error, 'Module "unknown" has no registered factory');
  });

  test("throwing factory fails without throwing", () => {
    const catalog = new ModuleCatalog().register("boom", () => {
      throw new Error("init failed");
    });
    const result = loadModule(descriptor("boom"), catalog);
    assert.equal(result.error, 'Module "boom" factory threw: init failed');
  });

  test("invalid metadata fails", () => {
    const catalog = new ModuleCatalog().register("bad-meta", () => ({
      ...completeModule(),
      getModuleMetadata: () => ({ name: "bad-meta" }),
    }));
    const result = loadModule(descriptor("bad-meta"), catalog);
    assert.equal(result.status, ModuleStatus.Failed);
    assert.ok(result.error?.startsWith('Module "bad-meta" returned invalid metadata: version'));
  });

  test("a lifecycle hook that is not a function fails the load", () => {
    const catalog = new ModuleCatalog().register("hooked", () => ({
      ...completeModule(),
      init: "setup.sh",
      cleanup: () => undefined,
    }));
    const result = loadModule(descriptor("hooked"), catalog);
    assert.equal(result.status, ModuleStatus.Failed);
    assert.equal(result.error, 'Module "hooked" has non-function lifecycle hooks: init');
  });

  test("declared requirements are kept in the metadata", () => {
    const catalog = new ModuleCatalog().register("needs", () => ({
      ...completeModule(),
      getModuleMetadata: () => ({
        name: "needs",
        version: "1",
        requires: { modules: ["completeness"], commands: ["quarto"] },
      }),
    }));
    const result = loadModule(descriptor("needs"), catalog);
    assert.equal(result.status, ModuleStatus.Success);
    assert.deepEqual(result.status === ModuleStatus.Success && result.metadata.requires, {
      modules: ["completeness"],
      commands: ["quarto"],
    });
  });

  test("unknown requirement keys are rejected", () => {
    const catalog = new ModuleCatalog().register("needs", () => ({
      ...completeModule(),
      getModuleMetadata: () => ({ name: "needs", version: "1", requires: { packages: ["x"] } }),
    }));
    const result = loadModule(descriptor("needs"), catalog);
    assert.equal(result.status, ModuleStatus.Failed);
    assert.ok(result.error?.startsWith('Module "needs" returned invalid metadata: requires'));
  });

  test("missingCapabilities treats non-objects as missing everything", () => {
    assert.equal(missingCapabilities(null).length, 4);
    assert.equal(missingCapabilities(42).length, 4);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// BATCH
// ═══════════════════════════════════════════════════════════════════════════

describe("generateBatch", () => {
  const ids = ["one", "two", "three", "four"];

  async function flaky(itemId: string): Promise<PlotResult> {
    if (itemId === "two") {
      throw new Error("render crashed");
    }
    if (itemId === "three") {
      return failedPlotResult(itemId, "no data");
    }
    return success(itemId);
  }

  test("continues past failures when continueOnError is true", async () => {
    const results = await generateBatch(ids, flaky, { continueOnError: true });
    assert.deepEqual(Object.keys(results), ids);
    assert.equal(results["two"]?.status, "failed");
    assert.equal(results["two"]?.error, "render crashed");
    assert.equal(results["three"]?.error, "no data");
    assert.equal(results["four"]?.status, "success");
  });

  test("stops after the first failure when continueOnError is false", async () => {
    const results = await generateBatch(ids, flaky, { continueOnError: false });
    assert.deepEqual(Object.keys(results), ["one", "two"]);
  });

  test("runs items strictly in order", async () => {
    const order: string[] = [];
    await generateBatch(
      ids,
      async (itemId) => {
        order.push(`start:${itemId}`);
        await new Promise((resolve) => setTimeout(resolve, 1));
        order.push(`end:${itemId}`);
        return success(itemId);
      },
      { continueOnError: true }
    );
    assert.deepEqual(order.slice(0, 4), ["start:one", "end:one", "start:two", "end:two"]);
  });

  test("converts a timeout into a failed result", async () => {
    const results = await generateBatch(
      ["slow", "fast"],
      async (itemId) => {
        if (itemId === "slow") {
          await new Promise((resolve) => setTimeout(resolve, 200));
        }
        return success(itemId);
      },
      { continueOnError: true, itemTimeoutMs: 20 }
    );
    assert.equal(results["slow"]?.status, "failed");
    assert.equal(results["slow"]?.error, 'Item "slow" timed out after 20 ms');
    assert.equal(results["fast"]?.status, "success");
  });

  test("synchronous throws are caught", async () => {
    const results = await generateBatch(
      ["x"],
      () => {
        throw new ItemGenerationError("x", "sync failure");
      },
      { continueOnError: true }
    );
    assert.equal(results["x"]?.error, "sync failure");
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// DEPENDENCIES
// ═══════════════════════════════════════════════════════════════════════════

describe("module dependencies", () => {
  test("topologicalOrder puts requirements first and breaks ties by name", () => {
    const graph = buildDependencyGraph([
      { name: "report", requires: { modules: ["profile", "completeness"] } },
      { name: "profile" },
      { name: "completeness" },
      { name: "extra", requires: { modules: ["not-loaded"] } },
    ]);
    assert.deepEqual(topologicalOrder(graph), ["completeness", "extra", "profile", "report"]);
  });

  test("topologicalOrder is null for a cyclic graph", () => {
    const graph = buildDependencyGraph([
      { name: "a", requires: { modules: ["b"] } },
      { name: "b", requires: { modules: ["a"] } },
    ]);
    assert.equal(topologicalOrder(graph), null);
  });

  test("findDependencyCycles reports closed paths", () => {
    const graph = buildDependencyGraph([
      { name: "a", requires: { modules: ["b"] } },
      { name: "b", requires: { modules: ["c"] } },
      { name: "c", requires: { modules: ["a"] } },
      { name: "self", requires: { modules: ["self"] } },
      { name: "free" },
    ]);
    assert.deepEqual(findDependencyCycles(graph), [
      ["a", "b", "c", "a"],
      ["self", "self"],
    ]);
  });

  test("planModuleRun skips transitively and keeps the rest in order", () => {
    const plan = planModuleRun(
      [
        { name: "chart", requires: { commands: ["gnuplot"] } },
        { name: "summary", requires: { modules: ["chart"] } },
        { name: "table" },
      ],
      { commandAvailable: () => false }
    );
    assert.deepEqual(plan.order, ["table"]);
    assert.deepEqual(plan.skipped, [
      { name: "chart", reason: 'Module "chart" requires missing command(s): gnuplot' },
      { name: "summary", reason: 'Module "summary" requires unavailable module(s): chart' },
    ]);
    assert.deepEqual(plan.cycles, []);
  });

  test("isCommandAvailable looks through the given PATH", () => {
    const bin = join(TMP, "bin");
    mkdirSync(bin, { recursive: true });
    writeFileSync(join(bin, "plotter"), "");
    assert.equal(isCommandAvailable("plotter", bin), true);
    assert.equal(isCommandAvailable("plotter", join(TMP, "empty")), false);
    assert.equal(isCommandAvailable(process.execPath), true);
  });
});
