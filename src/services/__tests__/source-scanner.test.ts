/**
 * source-scanner.test.ts
 *
 * File discovery on a temporary directory tree: include/exclude globs,
 * listing order and the project-root sandbox of FileService.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { SourceScanner } from '../source-scanner.js';
import { FileService } from '../file-service.js';
import { SourceDirectoryBuilder } from '../../builders/source-directory-builder.js';

let tmpDir: string;

function touch(relPath: string, content = ''): void {
  const full = path.join(tmpDir, relPath);
  fs.mkdirSync(path.dirname(full), { recursive: true });
  fs.writeFileSync(full, content, 'utf-8');
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'compile-planner-scan-'));
  touch('src/a/A.java');
  touch('src/a/B.txt');
  touch('src/gen/G.java');
  touch('src/.hidden/H.java');
  touch('res/app.properties');
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function relative(files: string[]): string[] {
  return files.map((f) => path.relative(tmpDir, f).split(path.sep).join('/'));
}

describe('SourceScanner', () => {
  it('keeps Java sources by default and honours excludes', () => {
    const files = new FileService(tmpDir);
    const src = SourceDirectoryBuilder.create({ root: files.resolve('src') }, 'out');
    const found = new SourceScanner(files, { excludes: ['gen/**'] }).scan([src]);

    expect(relative(found.map((s) => s.file))).toEqual(['src/.hidden/H.java', 'src/a/A.java']);
    expect(found.every((s) => s.directory === src)).toBe(true);
  });

  it('keeps every file of non-source roots by default', () => {
    const files = new FileService(tmpDir);
    const res = SourceDirectoryBuilder.create({ root: files.resolve('res'), fileKind: 'other' }, 'out');
    expect(relative(new SourceScanner(files).scan([res]).map((s) => s.file))).toEqual(['res/app.properties']);
  });

  it('applies explicit includes to every root', () => {
    const files = new FileService(tmpDir);
    const src = SourceDirectoryBuilder.create({ root: files.resolve('src') }, 'out');
    const found = new SourceScanner(files, { includes: ['**/*.txt'] }).scan([src]);
    expect(relative(found.map((s) => s.file))).toEqual(['src/a/B.txt']);
  });

  it('matches root-relative POSIX paths', () => {
    expect(SourceScanner.matches('a/b/C.java', ['**/*.java'], [])).toBe(true);
    expect(SourceScanner.matches('C.java', ['**/*.java'], [])).toBe(true);
    expect(SourceScanner.matches('x/C.kt', ['**/*.java'], [])).toBe(false);
    expect(SourceScanner.matches('gen/G.java', ['**/*.java'], ['gen/**'])).toBe(false);
  });
});

describe('FileService', () => {
  it('reads files inside the project root and reports missing ones as null', () => {
    touch('notes.txt', 'hello');
    const files = new FileService(tmpDir);
    expect(files.readTextIfExists('notes.txt')).toBe('hello');
    expect(files.readTextIfExists('absent.txt')).toBeNull();
  });

  it('treats paths outside the project root as absent', () => {
    const files = new FileService(path.join(tmpDir, 'src'));
    expect(files.isDirectory('../res')).toBe(false);
    expect(files.readTextIfExists(path.join(tmpDir, 'res', 'app.properties'))).toBeNull();
    expect(files.listFiles('../res')).toEqual([]);
  });

  it('lists files recursively in name order', () => {
    const files = new FileService(tmpDir);
    expect(relative(files.listFiles('src'))).toEqual([
      'src/.hidden/H.java',
      'src/a/A.java',
      'src/a/B.txt',
      'src/gen/G.java',
    ]);
  });

  it('distinguishes directories from files', () => {
    const files = new FileService(tmpDir);
    expect(files.isDirectory('src/a')).toBe(true);
    expect(files.isDirectory('src/a/A.java')).toBe(false);
    expect(files.isDirectory('nowhere')).toBe(false);
  });
});
