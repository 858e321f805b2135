/**
 * builders/index.ts
 * Barrel export for the planner builders.
 */

export { SourceDirectoryBuilder } from './source-directory-builder.js';
export type { SourceDirectoryInit } from './source-directory-builder.js';
export { SourcesForReleaseBuilder } from './sources-for-release-builder.js';
export { ModuleOptionsBuilder } from './module-options-builder.js';
export { PathOptionsBuilder } from './path-options-builder.js';
export type { PathOptionsInput } from './path-options-builder.js';
