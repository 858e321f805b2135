/**
 * source-directory-builder.ts
 * Builds immutable SourceDirectory records from configured source roots.
 *
 * Output directory layout, relative to the base output directory:
 *   module + release  →  <module>/META-INF/versions/<release>
 *   release only      →  META-INF/versions/<release>
 *   module only       →  <module>
 *   neither           →  (base itself)
 */

import * as path from 'node:path';
import type { FileKind, SourceDirectory } from '../models/source.js';
import type { SourceRootConfig } from '../models/planner-config.js';
import type { FileService } from '../services/file-service.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';

export interface SourceDirectoryInit {
  root: string;
  fileKind?: FileKind;
  moduleName?: string;
  release?: number;
  outputFileKind?: FileKind;
}

export class SourceDirectoryBuilder {
  private readonly _log: Logger;

  constructor(logger?: Logger) {
    this._log = logger ?? new SilentLogger();
  }

  /**
   * Source directories for the configured roots that exist on disk.
   * Missing roots are skipped with a debug message.
   */
  build(
    roots: readonly SourceRootConfig[],
    outputDirectory: string,
    files: FileService,
  ): SourceDirectory[] {
    const result: SourceDirectory[] = [];
    for (const root of roots) {
      const absolute = files.resolve(root.path);
      if (!files.isDirectory(absolute)) {
        this._log.debug('Source root does not exist, skipped', { root: absolute });
        continue;
      }
      const directory = SourceDirectoryBuilder.create(
        {
          root: absolute,
          ...(root.module !== undefined && { moduleName: root.module }),
          ...(root.release !== undefined && { release: root.release }),
        },
        outputDirectory,
      );
      this._log.debug('Source root', {
        root: directory.root,
        module: directory.moduleName ?? null,
        release: directory.release ?? null,
        output: directory.outputDirectory,
      });
      result.push(directory);
    }
    return result;
  }

  /** Create a frozen SourceDirectory, computing its output directory. */
  static create(init: SourceDirectoryInit, outputDirectory: string): SourceDirectory {
    const moduleName = blankToUndefined(init.moduleName);
    const directory: SourceDirectory = {
      root: init.root,
      fileKind: init.fileKind ?? 'source',
      ...(moduleName !== undefined && { moduleName }),
      ...(init.release !== undefined && { release: init.release }),
      outputDirectory: SourceDirectoryBuilder.outputDirectoryFor(outputDirectory, moduleName, init.release),
      outputFileKind: init.outputFileKind ?? 'class',
    };
    return Object.freeze(directory);
  }

  static outputDirectoryFor(base: string, moduleName?: string, release?: number): string {
    const segments: string[] = [];
    const name = blankToUndefined(moduleName);
    if (name !== undefined) segments.push(name);
    if (release !== undefined) segments.push('META-INF', 'versions', String(release));
    return segments.length === 0 ? path.normalize(base) : path.join(base, ...segments);
  }

  /** Same root, module name, release and output directory. */
  static equals(a: SourceDirectory, b: SourceDirectory): boolean {
    return (
      a.release === b.release &&
      a.moduleName === b.moduleName &&
      a.root === b.root &&
      a.outputDirectory === b.outputDirectory
    );
  }

  /** `"<root>" for module "<name>" on release <n>` - for log and error messages. */
  static describe(directory: SourceDirectory): string {
    let text = `"${directory.root}"`;
    if (directory.moduleName !== undefined) text += ` for module "${directory.moduleName}"`;
    if (directory.release !== undefined) text += ` on release ${directory.release}`;
    return text;
  }
}

function blankToUndefined(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value : undefined;
}
