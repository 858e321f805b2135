/**
 * sources-for-release-builder.ts
 * Groups discovered source files by release, then by module.
 *
 * One pass in input order. Within a bucket, a root is registered only when
 * the owning directory changes from the previous file of that bucket, which
 * avoids a map lookup per file for long runs from the same root. Buckets come
 * back in ascending release order, NO_RELEASE first.
 */

import type { SourceDirectory, SourceFile, SourcesForRelease } from '../models/source.js';
import { NO_RELEASE } from '../models/source.js';

interface Bucket {
  sources: SourcesForRelease;
  lastDirectory: SourceDirectory | undefined;
}

export class SourcesForReleaseBuilder {
  static groupByReleaseAndModule(sources: readonly SourceFile[]): SourcesForRelease[] {
    const buckets = new Map<number, Bucket>();

    for (const source of sources) {
      const directory = source.directory;
      const release = directory.release ?? NO_RELEASE;

      let bucket = buckets.get(release);
      if (bucket === undefined) {
        bucket = { sources: { release, files: [], roots: new Map() }, lastDirectory: undefined };
        buckets.set(release, bucket);
      }

      if (bucket.lastDirectory !== directory) {
        bucket.lastDirectory = directory;
        const moduleName = directory.moduleName ?? '';
        let roots = bucket.sources.roots.get(moduleName);
        if (roots === undefined) {
          roots = new Set<string>();
          bucket.sources.roots.set(moduleName, roots);
        }
        roots.add(directory.root);
      }
      bucket.sources.files.push(source.file);
    }

    return [...buckets.values()]
      .map((bucket) => bucket.sources)
      .sort((a, b) => a.release - b.release);
  }
}
