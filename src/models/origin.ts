/**
 * origin.ts
 * Position of a token or directive inside a patch file.
 */

export interface Origin {
  /** Path of the patch file, when parsed from disk. */
  file?: string;
  /** 1-based line. */
  line: number;
  /** 1-based column. */
  column: number;
}

/** Render an origin as `file:line:column` (or `line N` without a file). */
export function formatOrigin(origin: Origin): string {
  if (origin.file === undefined) return `line ${origin.line}`;
  return `${origin.file}:${origin.line}:${origin.column}`;
}
