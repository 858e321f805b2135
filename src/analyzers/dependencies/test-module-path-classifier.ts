/**
 * test-module-path-classifier.ts
 * Expands the TEST-MODULE-PATH shorthand of a module patch into concrete
 * `--add-modules` / `--add-reads` / `--add-exports` values.
 *
 * Walks the resolved dependencies in resolution order:
 *   - non-test scopes are skipped (`test-only` is compile-only, `test-runtime`
 *     runtime-only);
 *   - an unnamed dependency makes the module read ALL-UNNAMED;
 *   - a named dependency not seen yet is added and/or read, and when that
 *     changed anything, the modules it requires are marked as seen so they
 *     are not listed again.
 *
 * The pruning keeps the command line short. It is a heuristic: a module
 * required by an earlier dependency is never listed on its own, whatever
 * comes later.
 */

import type { DependencyResolution } from '../../models/dependency.js';
import { ALL_UNNAMED } from '../../parsers/patch/patch-parser.js';
import type { AddModulesContext } from '../../patch/add-modules-context.js';
import { SilentLogger } from '../../services/logger.js';
import type { Logger } from '../../services/logger.js';
import { isTestModulePathScope } from './dependency-scopes.js';

/** The parts of a module patch the classifier reads and updates. */
export interface TestModulePathTarget {
  readonly moduleName: string | undefined;
  readonly addAllTestModulePath: boolean;
  readonly readAllTestModulePath: boolean;
  readonly addReads: Set<string>;
  readonly addModules: AddModulesContext;
  readonly addExports: Map<string, Set<string>>;
  readonly exportsToTestModulePath: ReadonlySet<string>;
}

export interface ClassificationSummary {
  /** Test dependencies that passed the scope filter. */
  considered: number;
  /** Module names newly added to `--add-modules`. */
  added: number;
  /** Entries newly added to `--add-reads` (ALL-UNNAMED included). */
  read: number;
  /** Required modules marked as already processed. */
  pruned: number;
}

const EMPTY_SUMMARY: ClassificationSummary = { considered: 0, added: 0, read: 0, pruned: 0 };

export class TestModulePathClassifier {
  private readonly _log: Logger;

  constructor(logger?: Logger) {
    this._log = logger ?? new SilentLogger();
  }

  /**
   * Update `target` in place from `resolution`.
   *
   * @param runtime - true for an execution pass, false for compilation.
   */
  classify(
    target: TestModulePathTarget,
    resolution: DependencyResolution | undefined,
    runtime: boolean,
  ): ClassificationSummary {
    const addAll = target.addAllTestModulePath;
    const readAll = target.readAllTestModulePath;
    const exportPackages = [...target.exportsToTestModulePath];

    if (resolution === undefined || (!addAll && !readAll)) {
      return { ...EMPTY_SUMMARY };
    }

    const summary: ClassificationSummary = { ...EMPTY_SUMMARY };
    const done = new Set<string>();

    for (const [dependency, path] of resolution.dependencies) {
      if (!isTestModulePathScope(dependency.scope, runtime)) continue;
      summary.considered++;

      const name = resolution.moduleName(path);

      if (name === undefined) {
        if (readAll && !target.addReads.has(ALL_UNNAMED)) {
          target.addReads.add(ALL_UNNAMED);
          summary.read++;
        }
        continue;
      }

      for (const packageName of exportPackages) {
        getOrCreate(target.addExports, packageName).add(name);
      }

      if (done.has(name)) {
        this._log.debug('Module already processed', { dependency: dependency.id, module: name });
        continue;
      }
      done.add(name);

      let modified = false;
      if (addAll && target.addModules.add(name)) {
        summary.added++;
        modified = true;
      }
      if (readAll && !target.addReads.has(name)) {
        target.addReads.add(name);
        summary.read++;
        modified = true;
      }

      if (modified) {
        const descriptor = resolution.moduleDescriptor(path);
        for (const required of descriptor?.requires ?? []) {
          if (!done.has(required)) {
            done.add(required);
            summary.pruned++;
          }
        }
      }
    }

    this._log.debug('Test module path expanded', {
      module: target.moduleName ?? '(unnamed)',
      ...summary,
    });
    return summary;
  }
}

function getOrCreate(map: Map<string, Set<string>>, key: string): Set<string> {
  let value = map.get(key);
  if (value === undefined) {
    value = new Set<string>();
    map.set(key, value);
  }
  return value;
}
