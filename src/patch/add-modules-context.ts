/**
 * add-modules-context.ts
 * The `--add-modules` values of one compilation.
 *
 * `--add-modules` is a global compiler option, not a per-module one, so all
 * module patches of a compilation contribute to a single context. The option
 * is written exactly once: the first writer drains the context and marks it
 * emitted; later writers find nothing to write.
 */

export class AddModulesContext {
  private readonly _modules = new Set<string>();
  private _emitted = false;

  /**
   * Add a module. Returns whether the set changed. Once the option has been
   * emitted nothing more can be written, so the value is ignored.
   */
  add(moduleName: string): boolean {
    if (this._emitted || this._modules.has(moduleName)) return false;
    this._modules.add(moduleName);
    return true;
  }

  /** Pending values in insertion order. */
  get modules(): readonly string[] {
    return [...this._modules];
  }

  get emitted(): boolean {
    return this._emitted;
  }

  /**
   * Take the pending values and mark the option as emitted.
   * Returns an empty list if it was already emitted.
   */
  drain(): string[] {
    if (this._emitted) return [];
    this._emitted = true;
    const values = [...this._modules];
    this._modules.clear();
    return values;
  }
}
