/**
 * dependency-scopes.ts
 * Which dependency scopes apply to which compilation.
 */

import type { DependencyScope } from '../../models/dependency.js';
import type { CompileScope, PlanMode } from '../../models/planner-config.js';

const MAIN_COMPILE: readonly DependencyScope[] = ['compile-only', 'compile', 'provided', 'system'];
const MAIN_RUNTIME: readonly DependencyScope[] = ['compile', 'runtime', 'provided', 'system'];

const PATH_SCOPES: Record<CompileScope, Record<PlanMode, ReadonlySet<DependencyScope>>> = {
  main: {
    compile: new Set(MAIN_COMPILE),
    runtime: new Set(MAIN_RUNTIME),
  },
  test: {
    compile: new Set<DependencyScope>([...MAIN_COMPILE, 'test', 'test-only']),
    runtime: new Set<DependencyScope>([...MAIN_RUNTIME, 'test', 'test-runtime']),
  },
};

/**
 * Whether a dependency takes part in the TEST-MODULE-PATH expansion.
 * `test` always does; `test-only` only when compiling; `test-runtime` only
 * when running.
 */
export function isTestModulePathScope(scope: DependencyScope, runtime: boolean): boolean {
  switch (scope) {
    case 'test':
      return true;
    case 'test-only':
      return !runtime;
    case 'test-runtime':
      return runtime;
    default:
      return false;
  }
}

/** Whether a dependency belongs on the class or module path of a compilation. */
export function isPathScope(scope: DependencyScope, compileScope: CompileScope, mode: PlanMode): boolean {
  return PATH_SCOPES[compileScope][mode].has(scope);
}
