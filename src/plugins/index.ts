/**
 * Built-in plot modules.
 *
 * Each name matches a directory under src/plugins/ holding the module's
 * entry point. Add new modules with `scripts/scaffold-module.ts` and
 * register them here.
 */

import { ModuleCatalog } from "../modules/catalog.js";
import { createCompletenessModule } from "./completeness/module.js";
import { createNumericProfileModule } from "./numeric-profile/module.js";

export function createBuiltinCatalog(): ModuleCatalog {
  return new ModuleCatalog()
    .register("completeness", createCompletenessModule)
    .register("numeric-profile", createNumericProfileModule);
}

export { createCompletenessModule, createNumericProfileModule };
