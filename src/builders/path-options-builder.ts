/**
 * path-options-builder.ts
 * Builds `--module-path`, `--class-path` and `--patch-module` options.
 *
 * Dependencies are filtered by scope for the compilation being planned
 * (see dependency-scopes.ts). In a modular compilation, named modules go on
 * the module path and unnamed artifacts on the class path; otherwise
 * everything goes on the class path. For test compilations the main output
 * directory comes first.
 */

import * as path from 'node:path';
import type { CompilerOption } from '../models/compiler-options.js';
import { CompilerOptions } from '../models/compiler-options.js';
import type { DependencyResolution } from '../models/dependency.js';
import type { CompileScope, PlanMode } from '../models/planner-config.js';
import type { SourceDirectory } from '../models/source.js';
import { isPathScope } from '../analyzers/dependencies/dependency-scopes.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';

export interface PathOptionsInput {
  resolution?: DependencyResolution;
  scope: CompileScope;
  mode: PlanMode;
  modular: boolean;
  /** Main output directory, when it exists and this is a test compilation. */
  mainOutputDirectory?: string;
}

export class PathOptionsBuilder {
  private readonly _log: Logger;

  constructor(logger?: Logger) {
    this._log = logger ?? new SilentLogger();
  }

  build(input: PathOptionsInput): CompilerOptions {
    const modulePath = new Set<string>();
    const classPath = new Set<string>();

    if (input.scope === 'test' && input.mainOutputDirectory !== undefined) {
      (input.modular ? modulePath : classPath).add(input.mainOutputDirectory);
    }

    let skipped = 0;
    if (input.resolution !== undefined) {
      for (const [dependency, artifact] of input.resolution.dependencies) {
        if (!isPathScope(dependency.scope, input.scope, input.mode)) {
          skipped++;
          continue;
        }
        const named = input.resolution.moduleName(artifact) !== undefined;
        (input.modular && named ? modulePath : classPath).add(artifact);
      }
    }

    this._log.debug('Path options', {
      modulePath: modulePath.size,
      classPath: classPath.size,
      skippedByScope: skipped,
    });

    const options = new CompilerOptions();
    options.addIfNonBlank('--module-path', [...modulePath].join(path.delimiter));
    options.addIfNonBlank('--class-path', [...classPath].join(path.delimiter));
    return options;
  }

  /**
   * `--patch-module <module>=<roots>` for test source directories. A root
   * belongs to its own module or, failing that, to `mainModuleName`; roots
   * with neither are skipped.
   */
  static patchModuleOptions(
    directories: readonly SourceDirectory[],
    mainModuleName?: string,
  ): CompilerOption[] {
    const rootsByModule = new Map<string, Set<string>>();
    for (const directory of directories) {
      const name = directory.moduleName ?? mainModuleName ?? '';
      if (name.trim() === '') continue;
      let roots = rootsByModule.get(name);
      if (roots === undefined) {
        roots = new Set<string>();
        rootsByModule.set(name, roots);
      }
      roots.add(directory.root);
    }
    return [...rootsByModule].map(([name, roots]) => ({
      name: '--patch-module',
      value: `${name}=${[...roots].join(path.delimiter)}`,
    }));
  }
}
