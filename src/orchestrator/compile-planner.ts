/**
 * compile-planner.ts
 * Single entry-point for a complete planning run.
 *
 * Pipeline order:
 *   1. SourceDirectoryBuilder.build(cfg)          - existing roots only
 *   2. SourceScanner.scan(directories)            - include/exclude filters
 *   3. SourcesForReleaseBuilder.groupByReleaseAndModule(files)
 *   4. Module patches (test scope, modular sources only)
 *   5. ModuleOptionsBuilder.build(patches)        - module-graph options, once
 *   6. PathOptionsBuilder.build(...)              - module path / class path
 *   7. One CompilationUnit per release
 *   8. PlanValidator.validatePlan(plan)
 *   9. Optional disk output (argument files + compile-plan.json)
 */

import * as path from 'node:path';
import type { CompilationUnit, CompilePlan } from '../models/compile-plan.js';
import { CompilerOptions } from '../models/compiler-options.js';
import type { DependencyResolution } from '../models/dependency.js';
import type { PlannerConfig } from '../models/planner-config.js';
import type { SourceDirectory, SourcesForRelease } from '../models/source.js';
import { NO_RELEASE } from '../models/source.js';
import { AddModulesContext } from '../patch/add-modules-context.js';
import { ModulePatch } from '../patch/module-patch.js';
import type { ModulePatchWriter } from '../patch/module-patch.js';
import { StaticDependencyResolution } from '../analyzers/dependencies/static-dependency-resolution.js';
import { SourceDirectoryBuilder } from '../builders/source-directory-builder.js';
import { SourcesForReleaseBuilder } from '../builders/sources-for-release-builder.js';
import { ModuleOptionsBuilder } from '../builders/module-options-builder.js';
import { PathOptionsBuilder } from '../builders/path-options-builder.js';
import { FileService } from '../services/file-service.js';
import { SourceScanner } from '../services/source-scanner.js';
import { PlanValidator } from '../services/plan-validator.js';
import { PlanExporter } from '../services/plan-exporter.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';

export const PATCH_FILE_NAME = 'module-info-patch.txt';
export const MODULE_INFO_FILE = 'module-info.java';
export const PLAN_FILE_NAME = 'compile-plan.json';

export interface CompilePlannerOptions {
  /** Directory for argument files and compile-plan.json; nothing is written when absent. */
  outputDir?: string;
  skipValidation?: boolean;
  logger?: Logger;
  /** Dependency view to use instead of the configuration's `dependencies`. */
  resolution?: DependencyResolution;
}

interface ModulePatches {
  patches: ModulePatchWriter[];
  context: AddModulesContext;
  patchFiles: number;
}

export class CompilePlanner {
  private readonly _cfg: PlannerConfig;
  private readonly _options: CompilePlannerOptions;
  private readonly _log: Logger;

  constructor(cfg: PlannerConfig, options: CompilePlannerOptions = {}) {
    this._cfg = cfg;
    this._options = options;
    this._log = options.logger ?? new SilentLogger();
  }

  run(): CompilePlan {
    const cfg = this._cfg;
    const scope = cfg.scope ?? 'main';
    const mode = cfg.mode ?? 'compile';
    const files = new FileService(cfg.projectRoot);
    this._log.info('Planning starting', { scope, mode, projectRoot: files.root });

    // Step 1 - Source directories
    this._log.info('Step 1/7  Resolving source roots', { configured: cfg.sourceRoots.length });
    const directories = new SourceDirectoryBuilder(this._log).build(
      cfg.sourceRoots,
      cfg.outputDirectory,
      files,
    );
    this._log.info('Step 1/7  Done', { existing: directories.length });

    // Step 2 - Source files
    this._log.info('Step 2/7  Scanning source files');
    const scanner = new SourceScanner(
      files,
      {
        ...(cfg.includes !== undefined && { includes: cfg.includes }),
        ...(cfg.excludes !== undefined && { excludes: cfg.excludes }),
      },
      this._log,
    );
    const sources = scanner.scan(directories);
    this._log.info('Step 2/7  Done', { files: sources.length });

    // Step 3 - Grouping
    this._log.info('Step 3/7  Grouping by release and module');
    const groups = SourcesForReleaseBuilder.groupByReleaseAndModule(sources);
    for (const group of groups) {
      this._log.debug('  release', {
        release: group.release,
        files: group.files.length,
        modules: [...group.roots.keys()],
      });
    }
    this._log.info('Step 3/7  Done', { releases: groups.length });

    const hasModuleInfo = sources.some((s) => path.basename(s.file) === MODULE_INFO_FILE);
    const modular =
      directories.some((d) => d.moduleName !== undefined) ||
      cfg.mainModuleName !== undefined ||
      hasModuleInfo;
    const patchSources = scope === 'test' && modular && !hasModuleInfo;
    const resolution = this._options.resolution
      ?? (cfg.dependencies !== undefined ? new StaticDependencyResolution(cfg.dependencies) : undefined);

    // Step 4 - Module patches
    this._log.info('Step 4/7  Building module patches');
    let patches: ModulePatches = { patches: [], context: new AddModulesContext(), patchFiles: 0 };
    if (scope === 'test' && hasModuleInfo) {
      this._log.warn(
        `The test sources contain a ${MODULE_INFO_FILE} file; module patches and ` +
        'TEST-MODULE-PATH expansion are skipped. Prefer a module-info-patch.txt file.',
      );
    } else if (patchSources) {
      patches = this._buildPatches(directories, files, resolution, mode === 'runtime');
    }
    this._log.info('Step 4/7  Done', {
      patches: patches.patches.length,
      patchFiles: patches.patchFiles,
    });

    // Step 5 - Module-graph options
    this._log.info('Step 5/7  Writing module options');
    const moduleOptions = new ModuleOptionsBuilder(this._log).build(
      patches.patches,
      patches.context,
      scope === 'test',
    );
    this._log.info('Step 5/7  Done', { options: moduleOptions.size });

    // Step 6 - Path options
    this._log.info('Step 6/7  Writing path options');
    const mainOutputDirectory =
      scope === 'test' && cfg.mainOutputDirectory !== undefined && files.isDirectory(cfg.mainOutputDirectory)
        ? files.resolve(cfg.mainOutputDirectory)
        : undefined;
    const pathOptions = new PathOptionsBuilder(this._log).build({
      ...(resolution !== undefined && { resolution }),
      scope,
      mode,
      modular,
      ...(mainOutputDirectory !== undefined && { mainOutputDirectory }),
    });
    this._log.info('Step 6/7  Done', { options: pathOptions.size });

    // Step 7 - Compilation units
    this._log.info('Step 7/7  Building compilation units');
    const units = groups.map((group) => this._buildUnit(group, directories, patchSources));
    this._log.info('Step 7/7  Done', { units: units.length });

    const plan: CompilePlan = {
      scope,
      mode,
      modular,
      moduleOptions: [...moduleOptions.entries],
      pathOptions: [...pathOptions.entries],
      units,
      stats: {
        sourceRoots: directories.length,
        sourceFiles: sources.length,
        units: units.length,
        modulePatches: patches.patches.length,
        patchFiles: patches.patchFiles,
      },
    };

    if (this._options.skipValidation !== true) {
      this._log.info('Validating plan invariants');
      PlanValidator.validatePlan(plan);
      this._log.info('Validation passed');
    }

    if (this._options.outputDir !== undefined) {
      const outDir = this._options.outputDir;
      const baseName = cfg.debugFileName ?? (scope === 'test' ? 'javac-test.args' : 'javac.args');
      const written = PlanExporter.writeArgsFiles(plan, outDir, baseName);
      this._log.info('Argument files written', { files: written });
      PlanExporter.writePlan(plan, path.join(outDir, PLAN_FILE_NAME));
      this._log.info('Plan JSON written', { path: path.join(outDir, PLAN_FILE_NAME) });
    }

    this._log.info('Planning complete');
    return plan;
  }

  // ---------------------------------------------------------------------------
  // Module patches
  // ---------------------------------------------------------------------------

  /**
   * One patch per module, in order of first appearance among the source
   * roots. A module with a patch file gets a full patch loaded from it; the
   * first module without one gets an implicit patch (TEST-MODULE-PATH
   * shorthands on) and later ones share its reads.
   */
  private _buildPatches(
    directories: readonly SourceDirectory[],
    files: FileService,
    resolution: DependencyResolution | undefined,
    runtime: boolean,
  ): ModulePatches {
    const context = new AddModulesContext();
    const mainModule = this._cfg.mainModuleName;
    const rootsByModule = new Map<string, SourceDirectory[]>();
    for (const directory of directories) {
      const name = directory.moduleName ?? mainModule;
      if (name === undefined) continue;
      const roots = rootsByModule.get(name) ?? [];
      roots.push(directory);
      rootsByModule.set(name, roots);
    }
    if (rootsByModule.size === 0 && mainModule !== undefined) {
      rootsByModule.set(mainModule, []);
    }

    const patches: ModulePatchWriter[] = [];
    let implicit: ModulePatch | undefined;
    let patchFiles = 0;

    for (const [moduleName, roots] of rootsByModule) {
      const patchFile = this._findPatchFile(roots, files);
      if (patchFile !== undefined) {
        const patch = new ModulePatch(moduleName, context);
        patch.load(patchFile.text, patchFile.file);
        patch.addTestModulePath(resolution, runtime, this._log);
        this._log.debug('Patch file loaded', { module: patch.moduleName ?? null, file: patchFile.file });
        patches.push(patch);
        patchFiles++;
      } else if (implicit !== undefined) {
        const derived = implicit.patchWithSameReads(moduleName);
        if (derived !== undefined) patches.push(derived);
      } else {
        implicit = new ModulePatch(moduleName, context);
        implicit.addTestModulePath(resolution, runtime, this._log);
        patches.push(implicit);
      }
    }

    return { patches, context, patchFiles };
  }

  private _findPatchFile(
    roots: readonly SourceDirectory[],
    files: FileService,
  ): { file: string; text: string } | undefined {
    for (const root of roots) {
      const file = path.join(root.root, PATCH_FILE_NAME);
      const text = files.readTextIfExists(file);
      if (text !== null) return { file, text };
    }
    return undefined;
  }

  // ---------------------------------------------------------------------------
  // Units
  // ---------------------------------------------------------------------------

  private _buildUnit(
    group: SourcesForRelease,
    directories: readonly SourceDirectory[],
    patchSources: boolean,
  ): CompilationUnit {
    const contributing = directories.filter(
      (d) =>
        (d.release ?? NO_RELEASE) === group.release &&
        (group.roots.get(d.moduleName ?? '')?.has(d.root) ?? false),
    );
    const outputDirectories = [...new Set(contributing.map((d) => d.outputDirectory))];

    const options = new CompilerOptions();
    const release = group.release !== NO_RELEASE ? group.release : this._cfg.release;
    if (release !== undefined) options.add('--release', String(release));
    const [onlyOutput] = outputDirectories;
    if (outputDirectories.length === 1 && onlyOutput !== undefined) options.add('-d', onlyOutput);
    if (patchSources) {
      options.addAll(PathOptionsBuilder.patchModuleOptions(contributing, this._cfg.mainModuleName));
    }

    return {
      release: group.release,
      files: [...group.files],
      roots: Object.fromEntries([...group.roots].map(([moduleName, paths]) => [moduleName, [...paths]])),
      outputDirectories,
      options: [...options.entries],
    };
  }
}
