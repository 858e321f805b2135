/**
 * patch-syntax-error.ts
 * Error thrown for any grammar violation in a patch file.
 */

import type { Origin } from '../../models/origin.js';
import { formatOrigin } from '../../models/origin.js';

export class PatchSyntaxError extends Error {
  readonly line: number;
  readonly column: number;
  readonly fileName: string | undefined;
  /** Message without the position suffix. */
  readonly reason: string;

  constructor(reason: string, origin: Origin) {
    super(`${reason} (${formatOrigin(origin)})`);
    this.name = 'PatchSyntaxError';
    this.reason = reason;
    this.line = origin.line;
    this.column = origin.column;
    this.fileName = origin.file;
  }
}
