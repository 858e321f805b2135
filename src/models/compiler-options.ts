/**
 * compiler-options.ts
 * Ordered list of compiler options handed to the (external) compiler.
 */

export interface CompilerOption {
  /** Option name including leading dashes, e.g. `--add-reads`. */
  name: string;
  value?: string;
}

export class CompilerOptions {
  private readonly _entries: CompilerOption[] = [];

  /** Append an option. */
  add(name: string, value?: string): void {
    this._entries.push(value !== undefined ? { name, value } : { name });
  }

  /**
   * Append an option only if its value is non-blank.
   * Returns whether the option was added.
   */
  addIfNonBlank(name: string, value: string): boolean {
    if (value.trim() === '') return false;
    this.add(name, value);
    return true;
  }

  /** Append every option of another list. */
  addAll(options: Iterable<CompilerOption>): void {
    for (const option of options) {
      this.add(option.name, option.value);
    }
  }

  get entries(): readonly CompilerOption[] {
    return this._entries;
  }

  get size(): number {
    return this._entries.length;
  }

  /** Flatten into command-line arguments: `[name, value, name, ...]`. */
  toArgs(): string[] {
    const args: string[] = [];
    for (const { name, value } of this._entries) {
      args.push(name);
      if (value !== undefined) args.push(value);
    }
    return args;
  }
}
