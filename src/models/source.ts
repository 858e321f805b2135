/**
 * source.ts
 * Source roots, discovered source files and their grouping per release.
 */

/** Kind of files found in, or written to, a directory. */
export type FileKind = 'source' | 'class' | 'other';

/**
 * Release used for sources that target no specific release.
 * Sorts before every real release number.
 */
export const NO_RELEASE = 0;

/**
 * A root directory of source files.
 * Instances are frozen; build them with `SourceDirectoryBuilder.create`.
 */
export interface SourceDirectory {
  readonly root: string;
  readonly fileKind: FileKind;
  /** Name of the module the sources belong to, if any. */
  readonly moduleName?: string;
  /** Target release for multi-release output, if any. */
  readonly release?: number;
  /**
   * Where compiled files go: the base output directory, then the module
   * name (if any), then `META-INF/versions/<release>` (if any).
   */
  readonly outputDirectory: string;
  readonly outputFileKind: FileKind;
}

/** A discovered source file with a back-reference to its root. */
export interface SourceFile {
  readonly file: string;
  readonly directory: SourceDirectory;
}

/**
 * All source files of one release.
 * `roots` keys are module names; the empty string stands for "no module".
 */
export interface SourcesForRelease {
  release: number;
  files: string[];
  roots: Map<string, Set<string>>;
}
