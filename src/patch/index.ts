/**
 * patch/index.ts
 * Barrel export for the module patch model.
 */

export { AddModulesContext } from './add-modules-context.js';
export { ModulePatch, ReadsOnlyModulePatch } from './module-patch.js';
export type { ModulePatchWriter } from './module-patch.js';
