/**
 * file-service.ts
 * File access within the project root.
 *
 * Constraints:
 * - Paths outside projectRoot are treated as absent.
 * - A missing file is not an error (`readTextIfExists` returns null); any
 *   other I/O failure throws FileReadError.
 * - Directory listings are sorted so that every run sees the same order.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

export class FileService {
  private readonly _root: string;

  constructor(projectRoot: string) {
    this._root = path.resolve(projectRoot);
  }

  get root(): string {
    return this._root;
  }

  /** Absolute, normalized form of a project-relative or absolute path. */
  resolve(relOrAbsPath: string): string {
    return path.isAbsolute(relOrAbsPath)
      ? path.normalize(relOrAbsPath)
      : path.resolve(this._root, relOrAbsPath);
  }

  /**
   * Read a file as UTF-8 text.
   * Returns null if the file does not exist or is outside projectRoot.
   */
  readTextIfExists(relOrAbsPath: string): string | null {
    const resolved = this._sandboxed(relOrAbsPath);
    if (resolved === null) return null;
    try {
      return fs.readFileSync(resolved, 'utf-8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return null;
      throw new FileReadError(resolved, err);
    }
  }

  /** Return true if the path is a directory within projectRoot. */
  isDirectory(relOrAbsPath: string): boolean {
    const resolved = this._sandboxed(relOrAbsPath);
    if (resolved === null) return false;
    try {
      return fs.statSync(resolved).isDirectory();
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return false;
      throw new FileReadError(resolved, err);
    }
  }

  /**
   * All regular files below a directory, recursively, as absolute paths.
   * Entries are visited in name order; symbolic links are not followed.
   */
  listFiles(relOrAbsDir: string): string[] {
    const resolved = this._sandboxed(relOrAbsDir);
    if (resolved === null) return [];
    const files: string[] = [];
    this._walk(resolved, files);
    return files;
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  private _walk(dir: string, out: string[]): void {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch (err) {
      throw new FileReadError(dir, err);
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        this._walk(full, out);
      } else if (entry.isFile()) {
        out.push(full);
      }
    }
  }

  private _sandboxed(relOrAbsPath: string): string | null {
    const abs = this.resolve(relOrAbsPath);
    if (!abs.startsWith(this._root + path.sep) && abs !== this._root) {
      return null;
    }
    return abs;
  }
}

// ---------------------------------------------------------------------------
// Error type
// ---------------------------------------------------------------------------

export class FileReadError extends Error {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot read "${filePath}": ${detail}`, { cause });
    this.name = 'FileReadError';
    this.filePath = filePath;
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
