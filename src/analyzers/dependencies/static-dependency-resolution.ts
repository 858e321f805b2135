/**
 * static-dependency-resolution.ts
 * DependencyResolution backed by an already resolved dependency list, such
 * as the `dependencies` section of a planner configuration.
 */

import type {
  Dependency,
  DependencyResolution,
  ModuleDescriptor,
} from '../../models/dependency.js';
import type { DependencyConfig } from '../../models/planner-config.js';

export class StaticDependencyResolution implements DependencyResolution {
  readonly dependencies: ReadonlyMap<Dependency, string>;
  private readonly _descriptors: ReadonlyMap<string, ModuleDescriptor>;

  /**
   * @param entries - Dependencies in resolution order. When two entries share
   *                  a path, the first module declaration wins.
   */
  constructor(entries: readonly DependencyConfig[]) {
    const dependencies = new Map<Dependency, string>();
    const descriptors = new Map<string, ModuleDescriptor>();
    for (const entry of entries) {
      dependencies.set({ id: entry.id, scope: entry.scope }, entry.path);
      if (entry.module !== undefined && !descriptors.has(entry.path)) {
        descriptors.set(entry.path, {
          name: entry.module.name,
          requires: [...(entry.module.requires ?? [])],
        });
      }
    }
    this.dependencies = dependencies;
    this._descriptors = descriptors;
  }

  moduleName(path: string): string | undefined {
    return this._descriptors.get(path)?.name;
  }

  moduleDescriptor(path: string): ModuleDescriptor | undefined {
    return this._descriptors.get(path);
  }
}
