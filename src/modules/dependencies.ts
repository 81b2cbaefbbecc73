/**
 * Module dependency resolution.
 *
 * Modules may declare other plot modules they build on and external
 * commands they shell out to. Before the plot phase runs, the loaded set is
 * turned into a run plan:
 *
 *   1. modules on a dependency cycle are skipped
 *   2. the rest are ordered so every module runs after what it requires
 *      (ties broken alphabetically)
 *   3. walking that order, a module is skipped when a command is missing or
 *      a required module was not loaded or was itself skipped
 *
 * Skips are reported as error strings; nothing here throws.
 */

import { existsSync } from "node:fs";
import { delimiter, join } from "node:path";
import type { ModuleRequirements } from "../types/module.js";

export interface DependencyEntry {
  readonly name: string;
  readonly requires?: ModuleRequirements;
}

/** name → names it requires, in declaration order */
export type DependencyGraph = ReadonlyMap<string, readonly string[]>;

export interface SkippedModule {
  readonly name: string;
  readonly reason: string;
}

export interface ModuleRunPlan {
  /** Modules to run, dependencies first */
  readonly order: readonly string[];
  readonly skipped: readonly SkippedModule[];
  /** Each cycle as a closed path, e.g. ["a", "b", "a"] */
  readonly cycles: readonly (readonly string[])[];
}

export interface PlanOptions {
  /** Defaults to a PATH lookup */
  commandAvailable?: (command: string) => boolean;
}

export function buildDependencyGraph(entries: readonly DependencyEntry[]): DependencyGraph {
  const graph = new Map<string, readonly string[]>();
  for (const entry of entries) {
    graph.set(entry.name, [...new Set(entry.requires?.modules ?? [])]);
  }
  return graph;
}

/**
 * Every distinct cycle reachable in `graph`. Edges to names outside the
 * graph are ignored.
 */
export function findDependencyCycles(graph: DependencyGraph): string[][] {
  const cycles: string[][] = [];
  const seen = new Set<string>();
  const done = new Set<string>();
  const stack: string[] = [];

  function visit(name: string): void {
    seen.add(name);
    stack.push(name);
    for (const dep of graph.get(name) ?? []) {
      if (!graph.has(dep) || done.has(dep)) {
        continue;
      }
      const at = stack.indexOf(dep);
      if (at >= 0) {
        cycles.push([...stack.slice(at), dep]);
      } else if (!seen.has(dep)) {
        visit(dep);
      }
    }
    stack.pop();
    done.add(name);
  }

  for (const name of [...graph.keys()].sort()) {
    if (!seen.has(name)) {
      visit(name);
    }
  }
  return cycles;
}

/**
 * Dependencies-first order, alphabetical among modules that are ready at
 * the same time. Null when the graph has a cycle.
 */
export function topologicalOrder(graph: DependencyGraph): string[] | null {
  const pending = new Map<string, number>();
  const dependents = new Map<string, string[]>();

  for (const [name, deps] of graph) {
    const known = deps.filter((dep) => graph.has(dep));
    pending.set(name, known.length);
    for (const dep of known) {
      dependents.set(dep, [...(dependents.get(dep) ?? []), name]);
    }
  }

  const ready = [...pending].filter(([, count]) => count === 0).map(([name]) => name);
  const order: string[] = [];

  while (ready.length > 0) {
    ready.sort();
    const next = ready.shift();
    if (next === undefined) {
      break;
    }
    order.push(next);
    for (const dependent of dependents.get(next) ?? []) {
      const left = (pending.get(dependent) ?? 0) - 1;
      pending.set(dependent, left);
      if (left === 0) {
        ready.push(dependent);
      }
    }
  }

  return order.length === graph.size ? order : null;
}

/**
 * Whether `command` resolves to an existing file, either as a path or
 * through the PATH entries in `pathEnv`.
 */
export function isCommandAvailable(command: string, pathEnv = process.env.PATH ?? ""): boolean {
  if (command.includes("/") || command.includes("\\")) {
    return existsSync(command);
  }
  const extensions =
    process.platform === "win32" ? (process.env.PATHEXT ?? ".EXE;.CMD;.BAT").split(";") : [""];
  return pathEnv
    .split(delimiter)
    .filter((dir) => dir.length > 0)
    .some((dir) => extensions.some((ext) => existsSync(join(dir, command + ext))));
}

export function planModuleRun(
  entries: readonly DependencyEntry[],
  options: PlanOptions = {}
): ModuleRunPlan {
  const commandAvailable = options.commandAvailable ?? ((command: string) => isCommandAvailable(command));
  const graph = buildDependencyGraph(entries);
  const cycles = findDependencyCycles(graph);
  const skipped: SkippedModule[] = [];

  const onCycle = new Map<string, readonly string[]>();
  for (const cycle of cycles) {
    for (const name of cycle) {
      if (!onCycle.has(name)) {
        onCycle.set(name, cycle);
      }
    }
  }
  for (const name of [...onCycle.keys()].sort()) {
    const cycle = onCycle.get(name) ?? [];
    skipped.push({
      name,
      reason: `Module "${name}" is on a dependency cycle: ${cycle.join(" -> ")}`,
    });
  }

  const acyclic = new Map<string, readonly string[]>();
  for (const [name, deps] of graph) {
    if (!onCycle.has(name)) {
      acyclic.set(name, deps);
    }
  }
  const ordered = topologicalOrder(acyclic) ?? [...acyclic.keys()].sort();

  const requirements = new Map(entries.map((entry) => [entry.name, entry.requires]));
  const runnable = new Set<string>();
  const order: string[] = [];

  for (const name of ordered) {
    const requires = requirements.get(name);
    const missingCommands = (requires?.commands ?? []).filter((command) => !commandAvailable(command));
    if (missingCommands.length > 0) {
      skipped.push({
        name,
        reason: `Module "${name}" requires missing command(s): ${missingCommands.join(", ")}`,
      });
      continue;
    }
    const unavailable = (acyclic.get(name) ?? []).filter((dep) => !runnable.has(dep));
    if (unavailable.length > 0) {
      skipped.push({
        name,
        reason: `Module "${name}" requires unavailable module(s): ${unavailable.join(", ")}`,
      });
      continue;
    }
    runnable.add(name);
    order.push(name);
  }

  return { order, skipped, cycles };
}
