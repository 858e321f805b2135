/**
 * source-scanner.ts
 * Discovers the source files of a set of source directories.
 *
 * A file is kept when its path relative to the root (POSIX separators)
 * matches at least one include glob and no exclude glob. Without explicit
 * includes, source roots take `**\/*.java` and other roots take everything.
 */

import * as path from 'node:path';
import { minimatch } from 'minimatch';
import type { SourceDirectory, SourceFile } from '../models/source.js';
import type { FileService } from './file-service.js';
import { SilentLogger } from './logger.js';
import type { Logger } from './logger.js';

export const DEFAULT_SOURCE_INCLUDES: readonly string[] = ['**/*.java'];
const DEFAULT_OTHER_INCLUDES: readonly string[] = ['**/*'];

export interface SourceScanOptions {
  includes?: readonly string[];
  excludes?: readonly string[];
}

export class SourceScanner {
  private readonly _files: FileService;
  private readonly _includes: readonly string[] | undefined;
  private readonly _excludes: readonly string[];
  private readonly _log: Logger;

  constructor(files: FileService, options: SourceScanOptions = {}, logger?: Logger) {
    this._files = files;
    this._includes = options.includes !== undefined && options.includes.length > 0
      ? options.includes
      : undefined;
    this._excludes = options.excludes ?? [];
    this._log = logger ?? new SilentLogger();
  }

  /** Files of every directory, directory by directory, each sorted by path. */
  scan(directories: readonly SourceDirectory[]): SourceFile[] {
    const result: SourceFile[] = [];
    for (const directory of directories) {
      const includes = this._includes
        ?? (directory.fileKind === 'source' ? DEFAULT_SOURCE_INCLUDES : DEFAULT_OTHER_INCLUDES);
      let kept = 0;
      for (const file of this._files.listFiles(directory.root)) {
        const relative = path.relative(directory.root, file).split(path.sep).join('/');
        if (!SourceScanner.matches(relative, includes, this._excludes)) continue;
        result.push({ file, directory });
        kept++;
      }
      this._log.debug('Source root scanned', { root: directory.root, files: kept });
    }
    return result;
  }

  /** Whether a root-relative POSIX path passes the include/exclude filters. */
  static matches(
    relativePath: string,
    includes: readonly string[],
    excludes: readonly string[],
  ): boolean {
    const options = { dot: true };
    if (!includes.some((pattern) => minimatch(relativePath, pattern, options))) return false;
    return !excludes.some((pattern) => minimatch(relativePath, pattern, options));
  }
}
