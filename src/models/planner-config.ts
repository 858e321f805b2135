/**
 * planner-config.ts
 * Configuration of one planning run, usually loaded from a JSON file.
 */

import type { DependencyScope } from './dependency.js';

/**
 * Which compilation is being planned.
 * - main: the application sources.
 * - test: the test sources, patched into the main module.
 */
export type CompileScope = 'main' | 'test';

/**
 * Whether dependencies are selected for compiling or for running.
 * Affects `test-only` / `test-runtime` handling and path options.
 */
export type PlanMode = 'compile' | 'runtime';

export interface SourceRootConfig {
  path: string;
  /** Module the root belongs to (module source hierarchy). */
  module?: string;
  /** Release the root targets (multi-release layout). */
  release?: number;
}

export interface DependencyConfig {
  id: string;
  scope: DependencyScope;
  /** Resolved artifact path. */
  path: string;
  /** Present for named modules. */
  module?: {
    name: string;
    requires?: string[];
  };
}

/**
 * Planner configuration.
 * After `PlanValidator.resolvePaths`, every path is absolute.
 */
export interface PlannerConfig {
  /** Repository root directory. */
  projectRoot: string;
  /** Defaults to 'main'. */
  scope?: CompileScope;
  /** Defaults to 'compile'. */
  mode?: PlanMode;
  /** Base output directory of the compilation. */
  outputDirectory: string;
  /** Output directory of the main classes; put on the path of test compilations. */
  mainOutputDirectory?: string;
  /** Name of the main module, when the main code is modular. */
  mainModuleName?: string;
  /** Default `--release` for sources that target no specific release. */
  release?: number;
  sourceRoots: SourceRootConfig[];
  /** Include globs relative to each source root. Defaults to `**\/*.java`. */
  includes?: string[];
  excludes?: string[];
  /** Base name of the compiler argument files. */
  debugFileName?: string;
  /** Pre-resolved dependencies, in resolution order. */
  dependencies?: DependencyConfig[];
}
