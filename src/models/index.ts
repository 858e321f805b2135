/**
 * models/index.ts
 * Barrel export for the planner data model.
 */

export type { Dependency, DependencyScope, DependencyResolution, ModuleDescriptor } from './dependency.js';
export { DEPENDENCY_SCOPES } from './dependency.js';
export type { FileKind, SourceDirectory, SourceFile, SourcesForRelease } from './source.js';
export { NO_RELEASE } from './source.js';
export type { CompilerOption } from './compiler-options.js';
export { CompilerOptions } from './compiler-options.js';
export type {
  CompileScope,
  PlanMode,
  PlannerConfig,
  SourceRootConfig,
  DependencyConfig,
} from './planner-config.js';
export type { CompilePlan, CompilationUnit, CompilePlanStats } from './compile-plan.js';
