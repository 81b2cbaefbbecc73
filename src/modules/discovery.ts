/**
 * Plugin module discovery.
 *
 * A plugin root holds one directory per module. A directory takes part in
 * a run when it contains a `module.ts` or `module.js` entry point. Nothing
 * is imported here: the entry point is only read as text to note which
 * capabilities it mentions.
 */

import { existsSync, readFileSync, readdirSync, statSync } from "node:fs";
import { join, resolve } from "node:path";
import { ModuleDiscoveryError, errorMessage } from "../result/errors.js";
import {
  REQUIRED_CAPABILITIES,
  type Capability,
  type ModuleDescriptor,
} from "../types/module.js";

/** Entry-point file names, in order of preference. */
export const ENTRY_POINT_NAMES = ["module.ts", "module.js"] as const;

export interface DiscoveryOptions {
  /** Override the discovery timestamp (for testing). */
  now?: Date;
}

function findEntryPoint(moduleDir: string): string | null {
  for (const name of ENTRY_POINT_NAMES) {
    const candidate = join(moduleDir, name);
    if (existsSync(candidate) && statSync(candidate).isFile()) {
      return candidate;
    }
  }
  return null;
}

function scanCapabilities(entryPoint: string): Capability[] {
  let source: string;
  try {
    source = readFileSync(entryPoint, "utf-8");
  } catch {
    return [];
  }
  return REQUIRED_CAPABILITIES.filter((capability) => source.includes(capability));
}

/**
 * Descriptors for every qualifying module directory under `pluginRoot`,
 * in directory-name order.
 *
 * @throws ModuleDiscoveryError when the root exists but cannot be listed
 */
export function discoverModules(
  pluginRoot: string,
  options: DiscoveryOptions = {}
): ModuleDescriptor[] {
  const root = resolve(pluginRoot);
  if (!existsSync(root)) {
    return [];
  }

  let names: string[];
  try {
    names = readdirSync(root, { withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
  } catch (err) {
    throw new ModuleDiscoveryError(`Cannot read plugin root ${root}: ${errorMessage(err)}`);
  }

  const discoveredAt = (options.now ?? new Date()).toISOString();
  const descriptors: ModuleDescriptor[] = [];

  for (const name of names) {
    const path = join(root, name);
    const entryPoint = findEntryPoint(path);
    if (entryPoint === null) {
      continue;
    }
    descriptors.push(
      Object.freeze({
        name,
        path,
        entryPoint,
        declaredCapabilities: Object.freeze(scanCapabilities(entryPoint)),
        discoveredAt,
      })
    );
  }

  return descriptors;
}
