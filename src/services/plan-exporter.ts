/**
 * plan-exporter.ts
 * Writes a CompilePlan to disk: one compiler argument file per unit and a
 * deterministic JSON dump of the whole plan.
 *
 * Argument files hold one argument per line, in the order
 *   module options, path options, unit options, source files
 * and can be passed to the compiler as `@<file>`.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { CompilePlan, CompilationUnit } from '../models/compile-plan.js';
import { CompilerOptions } from '../models/compiler-options.js';
import type { CompilerOption } from '../models/compiler-options.js';
import { NO_RELEASE } from '../models/source.js';

const NEEDS_QUOTES = /[\s"'#]/;

export class PlanExporter {
  /** Serialize with recursively sorted object keys and 2-space indentation. */
  static toJson(plan: CompilePlan): string {
    return JSON.stringify(plan, PlanExporter._stableSortReplacer(), 2);
  }

  static writePlan(plan: CompilePlan, outPath: string): void {
    const resolved = path.resolve(outPath);
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    fs.writeFileSync(resolved, PlanExporter.toJson(plan), 'utf-8');
  }

  /** All arguments of one unit, flattened. */
  static unitArguments(plan: CompilePlan, unit: CompilationUnit): string[] {
    return [
      ...toArgs(plan.moduleOptions),
      ...toArgs(plan.pathOptions),
      ...toArgs(unit.options),
      ...unit.files,
    ];
  }

  /**
   * File name of a unit's argument file: `javac-test.args` for the default
   * release, `javac-test-11.args` for release 11.
   */
  static argsFileName(baseName: string, release: number): string {
    if (release === NO_RELEASE) return baseName;
    const ext = path.extname(baseName);
    const stem = ext === '' ? baseName : baseName.slice(0, -ext.length);
    return `${stem}-${release}${ext}`;
  }

  /** Quote an argument for an `@argfile` when it contains whitespace, quotes or `#`. */
  static quote(arg: string): string {
    if (arg !== '' && !NEEDS_QUOTES.test(arg)) return arg;
    return '"' + arg.replace(/\\/g, '\\\\').replace(/"/g, '\\"') + '"';
  }

  static formatArgsFile(args: readonly string[]): string {
    return args.map((arg) => PlanExporter.quote(arg) + '\n').join('');
  }

  /**
   * Write one argument file per unit into `outDir`.
   * Returns the written paths in unit order.
   */
  static writeArgsFiles(plan: CompilePlan, outDir: string, baseName: string): string[] {
    const resolved = path.resolve(outDir);
    fs.mkdirSync(resolved, { recursive: true });
    return plan.units.map((unit) => {
      const file = path.join(resolved, PlanExporter.argsFileName(baseName, unit.release));
      fs.writeFileSync(
        file,
        PlanExporter.formatArgsFile(PlanExporter.unitArguments(plan, unit)),
        'utf-8',
      );
      return file;
    });
  }

  // ---------------------------------------------------------------------------
  // Stable sort replacer
  // ---------------------------------------------------------------------------

  /**
   * JSON.stringify replacer that sorts object keys alphabetically.
   * Arrays keep their order (option and file order is meaningful).
   */
  private static _stableSortReplacer(): (key: string, value: unknown) => unknown {
    return (_key: string, value: unknown): unknown => {
      if (!isRecord(value)) return value;
      return Object.fromEntries(Object.keys(value).sort().map((k) => [k, value[k]]));
    };
  }
}

function toArgs(options: readonly CompilerOption[]): string[] {
  const list = new CompilerOptions();
  list.addAll(options);
  return list.toArgs();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
