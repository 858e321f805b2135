/**
 * module-patch.ts
 * In-memory form of a `module-info-patch.txt` file for one module.
 *
 * Lifecycle:
 *   1. new ModulePatch(defaultModule, context)  - both TEST-MODULE-PATH shorthands on
 *   2. load(text)                               - optional; shorthands off unless re-requested
 *   3. addTestModulePath(resolution, runtime)   - expand the shorthands
 *   4. writeTo(options, context, opens)         - once per compilation
 *
 * Modules without their own patch file can reuse the reads of an implicit
 * patch through `patchWithSameReads`, which returns a ReadsOnlyModulePatch.
 */

import type { CompilerOptions } from '../models/compiler-options.js';
import type { DependencyResolution } from '../models/dependency.js';
import { PatchParser, TEST_MODULE_PATH } from '../parsers/patch/patch-parser.js';
import type { PatchDeclaration } from '../parsers/patch/patch-parser.js';
import { TestModulePathClassifier } from '../analyzers/dependencies/test-module-path-classifier.js';
import type { ClassificationSummary } from '../analyzers/dependencies/test-module-path-classifier.js';
import type { AddModulesContext } from './add-modules-context.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';

/** Common capability of full and reads-only patches. */
export interface ModulePatchWriter {
  readonly moduleName: string | undefined;
  /**
   * Append this patch's options to `target`.
   *
   * @param context - Shared `--add-modules` state of the compilation.
   * @param opens   - Whether to write `--add-opens` (test compilation only).
   */
  writeTo(target: CompilerOptions, context: AddModulesContext, opens: boolean): void;
}

export class ModulePatch implements ModulePatchWriter {
  private _moduleName: string | undefined;
  private _addAllTestModulePath = true;
  private _readAllTestModulePath = true;

  readonly addModules: AddModulesContext;
  readonly limitModules = new Set<string>();
  readonly addReads = new Set<string>();
  /** Package → target modules. */
  readonly addExports = new Map<string, Set<string>>();
  /** Package → target modules. */
  readonly addOpens = new Map<string, Set<string>>();
  /** Packages exported to every module of the test module path. */
  readonly exportsToTestModulePath = new Set<string>();

  /**
   * @param defaultModule - Module to patch when no file says otherwise; blank means none.
   * @param addModules    - `--add-modules` context shared by the whole compilation.
   */
  constructor(defaultModule: string | undefined, addModules: AddModulesContext) {
    if (defaultModule !== undefined && defaultModule.trim() !== '') {
      this._moduleName = defaultModule;
    }
    this.addModules = addModules;
  }

  get moduleName(): string | undefined {
    return this._moduleName;
  }

  /** Whether every test module should be added to the module graph. */
  get addAllTestModulePath(): boolean {
    return this._addAllTestModulePath;
  }

  /** Whether this module should read every test module. */
  get readAllTestModulePath(): boolean {
    return this._readAllTestModulePath;
  }

  /**
   * Parse and apply a patch file. Nothing is applied if the text has a
   * syntax error.
   */
  load(source: string, file?: string): void {
    this.apply(PatchParser.parse(source, file));
  }

  /** Apply an already parsed declaration. */
  apply(declaration: PatchDeclaration): void {
    this._moduleName = declaration.moduleName;
    this._addAllTestModulePath = false;
    this._readAllTestModulePath = false;

    for (const directive of declaration.directives) {
      switch (directive.kind) {
        case 'add-modules':
          for (const name of directive.modules) {
            if (name === TEST_MODULE_PATH) {
              this._addAllTestModulePath = true;
            } else {
              this.addModules.add(name);
            }
          }
          break;
        case 'limit-modules':
          addAll(this.limitModules, directive.modules);
          break;
        case 'add-reads':
          for (const name of directive.modules) {
            if (name === TEST_MODULE_PATH) {
              this._readAllTestModulePath = true;
            } else {
              this.addReads.add(name);
            }
          }
          break;
        case 'add-exports': {
          const targets = getOrCreate(this.addExports, directive.packageName);
          for (const name of directive.targets) {
            if (name === TEST_MODULE_PATH) {
              this.exportsToTestModulePath.add(directive.packageName);
            } else {
              targets.add(name);
            }
          }
          break;
        }
        case 'add-opens':
          addAll(getOrCreate(this.addOpens, directive.packageName), directive.targets);
          break;
      }
    }
  }

  /**
   * Expand the TEST-MODULE-PATH shorthands using the resolved dependencies.
   * Does nothing when `resolution` is undefined or no shorthand is active.
   *
   * @param runtime - true when planning execution rather than compilation.
   */
  addTestModulePath(
    resolution: DependencyResolution | undefined,
    runtime: boolean,
    logger: Logger = new SilentLogger(),
  ): ClassificationSummary {
    return new TestModulePathClassifier(logger).classify(this, resolution, runtime);
  }

  /**
   * A patch for another module carrying the same `--add-reads` values
   * (shared, not copied) and nothing else. Undefined for a blank module name.
   */
  patchWithSameReads(otherModule: string | undefined): ReadsOnlyModulePatch | undefined {
    if (otherModule === undefined || otherModule.trim() === '') return undefined;
    return new ReadsOnlyModulePatch(this.addReads, otherModule);
  }

  writeTo(target: CompilerOptions, context: AddModulesContext, opens: boolean): void {
    writeAddModules(target, context);
    writeOption(target, '--limit-modules', undefined, this.limitModules);
    const moduleName = this._moduleName;
    if (moduleName === undefined) return;
    writeOption(target, '--add-reads', moduleName, this.addReads);
    writeQualified(target, '--add-exports', moduleName, this.addExports);
    if (opens) {
      writeQualified(target, '--add-opens', moduleName, this.addOpens);
    }
  }
}

/**
 * Patch derived from another one: same `--add-reads` set, different module,
 * no other option.
 */
export class ReadsOnlyModulePatch implements ModulePatchWriter {
  readonly moduleName: string;
  readonly addReads: ReadonlySet<string>;

  constructor(addReads: ReadonlySet<string>, moduleName: string) {
    this.addReads = addReads;
    this.moduleName = moduleName;
  }

  writeTo(target: CompilerOptions, context: AddModulesContext, _opens: boolean): void {
    writeAddModules(target, context);
    writeOption(target, '--add-reads', this.moduleName, this.addReads);
  }
}

// ---------------------------------------------------------------------------
// Option writing
// ---------------------------------------------------------------------------

function writeAddModules(target: CompilerOptions, context: AddModulesContext): void {
  writeOption(target, '--add-modules', undefined, context.drain());
}

/** Write `name prefix=v1,v2` (or `name v1,v2` without prefix); skip when empty. */
function writeOption(
  target: CompilerOptions,
  name: string,
  prefix: string | undefined,
  values: Iterable<string>,
): void {
  const joined = [...values].join(',');
  if (joined === '') return;
  target.addIfNonBlank(name, prefix !== undefined ? `${prefix}=${joined}` : joined);
}

/** One `name module/package=targets` option per package. */
function writeQualified(
  target: CompilerOptions,
  name: string,
  moduleName: string,
  values: ReadonlyMap<string, ReadonlySet<string>>,
): void {
  for (const [packageName, targets] of values) {
    writeOption(target, name, `${moduleName}/${packageName}`, targets);
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

function addAll(target: Set<string>, values: Iterable<string>): void {
  for (const value of values) target.add(value);
}
