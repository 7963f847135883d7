import { UnknownFrameworkError } from "../core/errors.js";
import type { FrameworkDefinition } from "../benchmark/frameworks.js";
import type { FrameworkAdapter } from "./types.js";

/** Adapters keyed by module name, resolved once when a benchmark is created. */
export class AdapterRegistry {
  private readonly adapters = new Map<string, FrameworkAdapter>();

  constructor(entries: Iterable<readonly [string, FrameworkAdapter]> = []) {
    for (const [name, adapter] of entries) this.register(name, adapter);
  }

  register(moduleName: string, adapter: FrameworkAdapter): this {
    const key = moduleName.toLowerCase();
    if (this.adapters.has(key)) throw new Error(`adapter already registered: ${moduleName}`);
    this.adapters.set(key, adapter);
    return this;
  }

  has(moduleName: string): boolean {
    return this.adapters.has(moduleName.toLowerCase());
  }

  resolve(def: FrameworkDefinition): FrameworkAdapter {
    const adapter = this.adapters.get(def.module.toLowerCase());
    if (!adapter) throw new UnknownFrameworkError(`${def.name} (no adapter registered for module ${def.module})`);
    return adapter;
  }
}
