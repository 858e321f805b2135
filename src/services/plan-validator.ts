/**
 * plan-validator.ts
 * Checks planner configurations and compile plans.
 * Throws a descriptive ValidationError on the first violation found.
 *
 * Configuration rules:
 *   1. Required fields are present with the right type.
 *   2. scope, mode and dependency scopes use known values.
 *   3. Releases are positive integers.
 *   4. Module names are dotted identifiers.
 *   5. A source root path is configured only once.
 *
 * Plan rules:
 *   6. Units are in strictly ascending release order.
 *   7. `--add-modules` appears at most once in the module options.
 *   8. No per-module option (`--add-reads`, `--add-exports`, `--add-opens`)
 *      is repeated with the same value. `--limit-modules` is written by every
 *      patch and may repeat.
 */

import * as path from 'node:path';
import type { CompilePlan } from '../models/compile-plan.js';
import { DEPENDENCY_SCOPES } from '../models/dependency.js';
import type {
  CompileScope,
  DependencyConfig,
  PlanMode,
  PlannerConfig,
  SourceRootConfig,
} from '../models/planner-config.js';
import { isValidQualifiedName } from '../parsers/patch/identifiers.js';

const SCOPES: readonly CompileScope[] = ['main', 'test'];
const MODES: readonly PlanMode[] = ['compile', 'runtime'];
const PER_MODULE_OPTIONS: ReadonlySet<string> = new Set(['--add-reads', '--add-exports', '--add-opens']);

export class PlanValidator {
  // ---------------------------------------------------------------------------
  // Configuration
  // ---------------------------------------------------------------------------

  /**
   * Turn parsed JSON into a PlannerConfig.
   * Paths are returned as written; see `resolvePaths`.
   */
  static parseConfig(raw: unknown): PlannerConfig {
    const obj = requireRecord(raw, 'configuration');

    const config: PlannerConfig = {
      projectRoot: optionalString(obj, 'projectRoot') ?? '.',
      outputDirectory: requireString(obj, 'outputDirectory'),
      sourceRoots: PlanValidator._sourceRoots(obj['sourceRoots']),
    };

    const scope = optionalString(obj, 'scope');
    if (scope !== undefined) config.scope = oneOf(scope, SCOPES, 'scope');
    const mode = optionalString(obj, 'mode');
    if (mode !== undefined) config.mode = oneOf(mode, MODES, 'mode');

    const mainOutputDirectory = optionalString(obj, 'mainOutputDirectory');
    if (mainOutputDirectory !== undefined) config.mainOutputDirectory = mainOutputDirectory;

    const mainModuleName = optionalString(obj, 'mainModuleName');
    if (mainModuleName !== undefined) {
      config.mainModuleName = requireModuleName(mainModuleName, 'mainModuleName');
    }

    const release = optionalRelease(obj['release'], 'release');
    if (release !== undefined) config.release = release;

    const includes = optionalStringArray(obj['includes'], 'includes');
    if (includes !== undefined) config.includes = includes;
    const excludes = optionalStringArray(obj['excludes'], 'excludes');
    if (excludes !== undefined) config.excludes = excludes;

    const debugFileName = optionalString(obj, 'debugFileName');
    if (debugFileName !== undefined) config.debugFileName = debugFileName;

    if (obj['dependencies'] !== undefined) {
      config.dependencies = PlanValidator._dependencies(obj['dependencies']);
    }
    return config;
  }

  /**
   * Make every path of the configuration absolute. `projectRoot` resolves
   * against `baseDir`; everything else resolves against `projectRoot`.
   */
  static resolvePaths(config: PlannerConfig, baseDir: string): PlannerConfig {
    const projectRoot = path.resolve(baseDir, config.projectRoot);
    const abs = (p: string): string => path.resolve(projectRoot, p);
    return {
      ...config,
      projectRoot,
      outputDirectory: abs(config.outputDirectory),
      ...(config.mainOutputDirectory !== undefined && {
        mainOutputDirectory: abs(config.mainOutputDirectory),
      }),
      sourceRoots: config.sourceRoots.map((root) => ({ ...root, path: abs(root.path) })),
      ...(config.dependencies !== undefined && {
        dependencies: config.dependencies.map((dep) => ({ ...dep, path: abs(dep.path) })),
      }),
    };
  }

  private static _sourceRoots(raw: unknown): SourceRootConfig[] {
    if (!Array.isArray(raw)) {
      throw new ValidationError('Invalid plan configuration: "sourceRoots" must be an array');
    }
    const seen = new Set<string>();
    return raw.map((item: unknown, i) => {
      const label = `sourceRoots[${i}]`;
      const obj = requireRecord(item, label);
      const root: SourceRootConfig = { path: requireString(obj, 'path', label) };
      const moduleName = optionalString(obj, 'module', label);
      if (moduleName !== undefined) root.module = requireModuleName(moduleName, `${label}.module`);
      const release = optionalRelease(obj['release'], `${label}.release`);
      if (release !== undefined) root.release = release;

      if (seen.has(root.path)) {
        throw new ValidationError(
          `Invalid plan configuration: source root "${root.path}" is configured more than once`,
        );
      }
      seen.add(root.path);
      return root;
    });
  }

  private static _dependencies(raw: unknown): DependencyConfig[] {
    if (!Array.isArray(raw)) {
      throw new ValidationError('Invalid plan configuration: "dependencies" must be an array');
    }
    return raw.map((item: unknown, i) => {
      const label = `dependencies[${i}]`;
      const obj = requireRecord(item, label);
      const dependency: DependencyConfig = {
        id: requireString(obj, 'id', label),
        scope: oneOf(requireString(obj, 'scope', label), [...DEPENDENCY_SCOPES], `${label}.scope`),
        path: requireString(obj, 'path', label),
      };
      if (obj['module'] !== undefined) {
        const mod = requireRecord(obj['module'], `${label}.module`);
        const name = requireModuleName(requireString(mod, 'name', `${label}.module`), `${label}.module.name`);
        const requires = optionalStringArray(mod['requires'], `${label}.module.requires`);
        dependency.module = requires !== undefined ? { name, requires } : { name };
      }
      return dependency;
    });
  }

  // ---------------------------------------------------------------------------
  // Plan
  // ---------------------------------------------------------------------------

  static validatePlan(plan: CompilePlan): void {
    for (let i = 1; i < plan.units.length; i++) {
      const previous = plan.units[i - 1];
      const current = plan.units[i];
      if (previous !== undefined && current !== undefined && previous.release >= current.release) {
        throw new ValidationError(
          `Plan violation: unit for release ${current.release} follows release ${previous.release}`,
        );
      }
    }

    const addModules = plan.moduleOptions.filter((o) => o.name === '--add-modules');
    if (addModules.length > 1) {
      throw new ValidationError(
        `Plan violation: --add-modules written ${addModules.length} times`,
      );
    }

    const seen = new Set<string>();
    for (const option of plan.moduleOptions) {
      if (!PER_MODULE_OPTIONS.has(option.name)) continue;
      const key = `${option.name} ${option.value ?? ''}`;
      if (seen.has(key)) {
        throw new ValidationError(`Plan violation: duplicated option "${key}"`);
      }
      seen.add(key);
    }
  }
}

// ---------------------------------------------------------------------------
// Field helpers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function field(key: string, parent?: string): string {
  return parent !== undefined ? `${parent}.${key}` : key;
}

function requireRecord(value: unknown, label: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new ValidationError(`Invalid plan configuration: "${label}" must be an object`);
  }
  return value;
}

function requireString(obj: Record<string, unknown>, key: string, parent?: string): string {
  const value = obj[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(
      `Invalid plan configuration: "${field(key, parent)}" must be a non-empty string`,
    );
  }
  return value;
}

function optionalString(obj: Record<string, unknown>, key: string, parent?: string): string | undefined {
  return obj[key] === undefined ? undefined : requireString(obj, key, parent);
}

function optionalStringArray(value: unknown, label: string): string[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new ValidationError(`Invalid plan configuration: "${label}" must be an array of strings`);
  }
  return [...value];
}

function optionalRelease(value: unknown, label: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`Invalid plan configuration: "${label}" must be a positive integer`);
  }
  return value;
}

function requireModuleName(value: string, label: string): string {
  if (!isValidQualifiedName(value)) {
    throw new ValidationError(`Invalid plan configuration: "${label}" is not a valid module name: "${value}"`);
  }
  return value;
}

function oneOf<T extends string>(value: string, allowed: readonly T[], label: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ValidationError(
      `Invalid plan configuration: "${label}" must be one of ${allowed.join(', ')} (got "${value}")`,
    );
  }
  return match;
}

// ---------------------------------------------------------------------------
// Error type
// ---------------------------------------------------------------------------

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}
