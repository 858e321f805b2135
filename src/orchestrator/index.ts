/**
 * orchestrator/index.ts
 * Barrel export for the compile planner.
 */

export { CompilePlanner, PATCH_FILE_NAME, MODULE_INFO_FILE, PLAN_FILE_NAME } from './compile-planner.js';
export type { CompilePlannerOptions } from './compile-planner.js';
