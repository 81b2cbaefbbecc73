/**
 * Module loader.
 *
 * Turns a discovery descriptor into a ready-to-run plot module:
 *
 *   1. look the name up in the catalog
 *   2. build a fresh instance with its factory
 *   3. check the four required capabilities and any lifecycle hooks
 *   4. validate the metadata the module reports about itself
 *
 * Every problem along the way becomes a failed LoadResult. loadModule never
 * throws, so one broken plugin cannot take the run down with it.
 */

import { z } from "zod";
import { errorMessage } from "../result/errors.js";
import {
  LIFECYCLE_HOOKS,
  ModuleStatus,
  REQUIRED_CAPABILITIES,
  type Capability,
  type LifecycleHook,
  type LoadResult,
  type ModuleDescriptor,
  type PlotModule,
} from "../types/module.js";
import type { ModuleCatalog } from "./catalog.js";

export const ModuleMetadataSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  description: z.string().optional(),
  requires: z
    .object({
      modules: z.array(z.string().min(1)).optional(),
      commands: z.array(z.string().min(1)).optional(),
    })
    .strict()
    .optional(),
});

/**
 * Required capabilities `candidate` does not expose as functions.
 */
export function missingCapabilities(candidate: unknown): Capability[] {
  if (typeof candidate !== "object" || candidate === null) {
    return [...REQUIRED_CAPABILITIES];
  }
  return REQUIRED_CAPABILITIES.filter(
    (capability) => typeof Reflect.get(candidate, capability) !== "function"
  );
}

/**
 * Lifecycle hooks `candidate` defines as something other than a function.
 * Absent hooks are fine.
 */
export function invalidLifecycleHooks(candidate: object): LifecycleHook[] {
  return LIFECYCLE_HOOKS.filter((hook) => {
    const value: unknown = Reflect.get(candidate, hook);
    return value !== undefined && typeof value !== "function";
  });
}

export function isPlotModule(candidate: unknown): candidate is PlotModule {
  return missingCapabilities(candidate).length === 0;
}

function failed(
  moduleName: string,
  error: string,
  missing: readonly Capability[] = []
): LoadResult {
  return {
    status: ModuleStatus.Failed,
    moduleName,
    module: null,
    error,
    missingCapabilities: missing,
  };
}

export function loadModule(descriptor: ModuleDescriptor, catalog: ModuleCatalog): LoadResult {
  const name = descriptor.name;

  if (!catalog.has(name)) {
    return failed(name, `Module "${name}" has no registered factory`);
  }

  let candidate: unknown;
  try {
    candidate = catalog.create(name);
  } catch (err) {
    return failed(name, `Module "${name}" factory threw: ${errorMessage(err)}`);
  }

  const missing = missingCapabilities(candidate);
  if (!isPlotModule(candidate)) {
    return failed(
      name,
      `Module "${name}" is missing required capabilities: ${missing.join(", ")}`,
      missing
    );
  }

  const badHooks = invalidLifecycleHooks(candidate);
  if (badHooks.length > 0) {
    return failed(name, `Module "${name}" has non-function lifecycle hooks: ${badHooks.join(", ")}`);
  }

  let rawMetadata: unknown;
  try {
    rawMetadata = candidate.getModuleMetadata();
  } catch (err) {
    return failed(name, `Module "${name}" getModuleMetadata threw: ${errorMessage(err)}`);
  }

  const parsed = ModuleMetadataSchema.safeParse(rawMetadata);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    return failed(name, `Module "${name}" returned invalid metadata: ${detail}`);
  }

  return {
    status: ModuleStatus.Success,
    moduleName: name,
    module: candidate,
    metadata: parsed.data,
    error: null,
  };
}
