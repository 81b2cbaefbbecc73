/**
 * Module catalog.
 *
 * Maps a module directory name to the factory that builds its plot module.
 * Discovery decides which modules take part in a run; the catalog decides
 * what code runs for each of them.
 *
 * USAGE:
 *
 *   const catalog = new ModuleCatalog()
 *     .register("completeness", () => createCompletenessModule());
 *
 *   catalog.has("completeness");       // true
 *   const mod = catalog.create("completeness");   // fresh instance
 */

/**
 * Builds a new module instance. Called once per load, so two loads never
 * share state. The result is only a candidate until the loader has checked
 * its capabilities.
 */
export type ModuleFactory = () => unknown;

export class ModuleCatalog {
  private readonly factories = new Map<string, ModuleFactory>();

  /** Registering a name twice replaces the earlier factory. */
  register(name: string, factory: ModuleFactory): this {
    this.factories.set(name, factory);
    return this;
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  /**
   * @throws Error when no factory is registered under `name`
   */
  create(name: string): unknown {
    const factory = this.factories.get(name);
    if (!factory) {
      throw new Error(`No module registered under "${name}"`);
    }
    return factory();
  }

  names(): string[] {
    return [...this.factories.keys()].sort();
  }
}
