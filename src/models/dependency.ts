/**
 * dependency.ts
 * Resolved-dependency view consumed by the planner.
 *
 * Dependency resolution itself happens elsewhere; the planner only sees the
 * result: an ordered mapping from dependency to resolved file path, plus a way
 * to ask what module (if any) lives at that path.
 */

/**
 * Scope of a resolved dependency.
 * Only `test`, `test-only` and `test-runtime` take part in the
 * TEST-MODULE-PATH expansion; the others feed path options.
 */
export type DependencyScope =
  | 'compile-only'
  | 'compile'
  | 'runtime'
  | 'provided'
  | 'system'
  | 'test-only'
  | 'test'
  | 'test-runtime'
  | 'none';

export const DEPENDENCY_SCOPES: ReadonlySet<DependencyScope> = new Set<DependencyScope>([
  'compile-only',
  'compile',
  'runtime',
  'provided',
  'system',
  'test-only',
  'test',
  'test-runtime',
  'none',
]);

export interface Dependency {
  /** Coordinates or any other stable identifier, e.g. `org.junit:junit-api:5.10.0`. */
  id: string;
  scope: DependencyScope;
}

/**
 * Module descriptor of a named dependency.
 * Only the names of the required modules are of interest here.
 */
export interface ModuleDescriptor {
  name: string;
  requires: string[];
}

/**
 * Result of dependency resolution.
 *
 * `dependencies` iteration order is significant: the test-module-path
 * expansion processes entries in that order.
 */
export interface DependencyResolution {
  readonly dependencies: ReadonlyMap<Dependency, string>;
  /** Module name of the artifact at `path`, or undefined for an unnamed (class-path) artifact. */
  moduleName(path: string): string | undefined;
  /** Module descriptor of the artifact at `path`, when it has one. May throw on I/O failure. */
  moduleDescriptor(path: string): ModuleDescriptor | undefined;
}
