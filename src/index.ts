/**
 * index.ts
 * Public API of the compile planner.
 */

export * from './models/index.js';
export type { Origin } from './models/origin.js';
export { PatchLexer } from './parsers/patch/patch-lexer.js';
export type { PatchToken, PatchTokenKind } from './parsers/patch/patch-lexer.js';
export {
  PatchParser,
  TEST_MODULE_PATH,
  ALL_UNNAMED,
  ALL_MODULE_PATH,
  SPECIAL_CASES,
} from './parsers/patch/patch-parser.js';
export type {
  PatchDeclaration,
  PatchDirective,
  ModuleListDirective,
  QualifiedDirective,
  DirectiveKeyword,
} from './parsers/patch/patch-parser.js';
export { PatchSyntaxError } from './parsers/patch/patch-syntax-error.js';
export { isValidQualifiedName } from './parsers/patch/identifiers.js';
export * from './patch/index.js';
export * from './analyzers/dependencies/index.js';
export * from './builders/index.js';
export * from './services/index.js';
export * from './orchestrator/index.js';
