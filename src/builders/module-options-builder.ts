/**
 * module-options-builder.ts
 * Writes the module-graph options of every module patch of a compilation.
 *
 * Patches are written in the given order; whichever comes first writes the
 * global `--add-modules` option and drains the shared context.
 */

import { CompilerOptions } from '../models/compiler-options.js';
import type { AddModulesContext } from '../patch/add-modules-context.js';
import type { ModulePatchWriter } from '../patch/module-patch.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';

export class ModuleOptionsBuilder {
  private readonly _log: Logger;

  constructor(logger?: Logger) {
    this._log = logger ?? new SilentLogger();
  }

  /**
   * @param opens  - Whether `--add-opens` is wanted (test compilation).
   * @param target - List to append to; a new one by default.
   */
  build(
    patches: readonly ModulePatchWriter[],
    context: AddModulesContext,
    opens: boolean,
    target: CompilerOptions = new CompilerOptions(),
  ): CompilerOptions {
    for (const patch of patches) {
      const before = target.size;
      patch.writeTo(target, context, opens);
      this._log.debug('Module patch written', {
        module: patch.moduleName ?? '(unnamed)',
        options: target.size - before,
      });
    }
    return target;
  }
}
