/**
 * compile-plan.ts
 * Output of a planning run: what to compile, where, and with which options.
 */

import type { CompilerOption } from './compiler-options.js';
import type { CompileScope, PlanMode } from './planner-config.js';

/** One compiler invocation: all sources of one release. */
export interface CompilationUnit {
  /** 0 for sources without a specific release. */
  release: number;
  /** Source files in discovery order. */
  files: string[];
  /** Root directories per module name ('' = no module). */
  roots: Record<string, string[]>;
  /** Distinct output directories of the contributing roots. */
  outputDirectories: string[];
  /** Options specific to this unit (`--release`, `-d`, `--patch-module`). */
  options: CompilerOption[];
}

export interface CompilePlanStats {
  sourceRoots: number;
  sourceFiles: number;
  units: number;
  modulePatches: number;
  patchFiles: number;
}

export interface CompilePlan {
  scope: CompileScope;
  mode: PlanMode;
  /** Whether sources are compiled as named modules. */
  modular: boolean;
  /** Module-graph options (`--add-modules`, `--add-reads`, ...), shared by all units. */
  moduleOptions: CompilerOption[];
  /** `--module-path` / `--class-path`. */
  pathOptions: CompilerOption[];
  /** Sorted by ascending release. */
  units: CompilationUnit[];
  stats: CompilePlanStats;
}
