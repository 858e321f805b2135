/**
 * analyzers/dependencies/index.ts
 * Barrel export for dependency analysis.
 */

export { TestModulePathClassifier } from './test-module-path-classifier.js';
export type { ClassificationSummary, TestModulePathTarget } from './test-module-path-classifier.js';
export { StaticDependencyResolution } from './static-dependency-resolution.js';
export { isTestModulePathScope, isPathScope } from './dependency-scopes.js';
